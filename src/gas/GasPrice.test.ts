import { DynamicFee, EstimatedGasPrice } from './GasPrice';

const dynamic = (base: number, max: number, priority: number, legacy = 0) =>
  new EstimatedGasPrice(legacy, new DynamicFee(base, max, priority));

describe('EstimatedGasPrice', () => {
  describe('effectivePrice', () => {
    it('charges base fee plus tip when that is under the max fee', () => {
      expect(dynamic(20, 100, 2).effectivePrice()).toBe(22);
    });

    it('is bounded by the max fee', () => {
      expect(dynamic(20, 21, 2).effectivePrice()).toBe(21);
    });

    it('returns the legacy price without a dynamic fee', () => {
      expect(EstimatedGasPrice.legacyOnly(42).effectivePrice()).toBe(42);
    });

    it('falls back to the max fee when the comparison is unordered', () => {
      expect(dynamic(Number.NaN, 100, 2).effectivePrice()).toBe(100);
    });
  });

  describe('cap', () => {
    it('is the max fee for dynamic-fee prices and the legacy price otherwise', () => {
      expect(dynamic(20, 100, 2, 30).cap()).toBe(100);
      expect(EstimatedGasPrice.legacyOnly(30).cap()).toBe(30);
    });
  });

  describe('scaleUp', () => {
    it('is the identity for a factor of 1', () => {
      const legacy = EstimatedGasPrice.legacyOnly(10);
      const withFee = dynamic(5, 50, 2, 10);

      expect(legacy.scaleUp(1).equals(legacy)).toBe(true);
      expect(withFee.scaleUp(1).equals(withFee)).toBe(true);
    });

    it('scales the legacy price', () => {
      expect(EstimatedGasPrice.legacyOnly(10).scaleUp(2).legacy).toBe(20);
    });

    it('scales max and priority fee but leaves the base fee alone', () => {
      const scaled = dynamic(5, 50, 2).scaleUp(2);

      expect(scaled.eip1559?.toJSON()).toEqual({
        baseFeePerGas: 5,
        maxFeePerGas: 100,
        maxPriorityFeePerGas: 4,
      });
    });

    it('rejects non-positive factors', () => {
      expect(() => EstimatedGasPrice.legacyOnly(10).scaleUp(0)).toThrow(RangeError);
      expect(() => EstimatedGasPrice.legacyOnly(10).scaleUp(-1)).toThrow(RangeError);
      expect(() => EstimatedGasPrice.legacyOnly(10).scaleUp(Number.NaN)).toThrow(RangeError);
    });
  });

  describe('roundUp', () => {
    it('rounds legacy, max and priority fee up to whole wei', () => {
      const rounded = dynamic(1.5, 10.1, 2.3, 10.2).roundUp();

      expect(rounded.toJSON()).toEqual({
        legacy: 11,
        eip1559: { baseFeePerGas: 1.5, maxFeePerGas: 11, maxPriorityFeePerGas: 3 },
      });
    });

    it('is idempotent', () => {
      const price = dynamic(1.5, 10.1, 2.3, 10.2);

      expect(price.roundUp().roundUp().equals(price.roundUp())).toBe(true);
    });
  });

  describe('limitCap', () => {
    it('clamps the legacy price', () => {
      expect(EstimatedGasPrice.legacyOnly(80).limitCap(50).legacy).toBe(50);
      expect(EstimatedGasPrice.legacyOnly(40).limitCap(50).legacy).toBe(40);
    });

    it('clamps the max fee and pulls the priority fee under it', () => {
      const capped = dynamic(10, 100, 60).limitCap(50);

      expect(capped.eip1559?.maxFeePerGas).toBe(50);
      expect(capped.eip1559?.maxPriorityFeePerGas).toBe(50);
      expect(capped.eip1559?.baseFeePerGas).toBe(10);
    });

    it('repairs an oracle value whose priority fee exceeds its max fee', () => {
      const capped = dynamic(10, 30, 45).limitCap(1_000);

      expect(capped.eip1559?.maxFeePerGas).toBe(30);
      expect(capped.eip1559?.maxPriorityFeePerGas).toBe(30);
    });

    it('replaces a NaN price with the ceiling', () => {
      expect(EstimatedGasPrice.legacyOnly(Number.NaN).limitCap(50).legacy).toBe(50);

      const nanMax = new DynamicFee(7, Number.NaN, 3).limitCap(50);
      expect(nanMax.maxFeePerGas).toBe(50);
      expect(nanMax.maxPriorityFeePerGas).toBe(3);

      const nanPriority = new DynamicFee(7, 40, Number.NaN).limitCap(50);
      expect(nanPriority.maxFeePerGas).toBe(40);
      expect(nanPriority.maxPriorityFeePerGas).toBe(40);
    });

    it('leaves the price alone for a NaN ceiling', () => {
      expect(EstimatedGasPrice.legacyOnly(40).limitCap(Number.NaN).legacy).toBe(40);
      expect(new DynamicFee(7, 40, 3).limitCap(Number.NaN).toJSON()).toEqual({
        baseFeePerGas: 7,
        maxFeePerGas: 40,
        maxPriorityFeePerGas: 3,
      });
    });

    it('holds max <= cap and priority <= max across a grid of values', () => {
      const values = [0, 1, 2.5, 21, 99.9, 100, 1e9, 3.7e10];
      const withNaN = [...values, Number.NaN];
      for (const max of withNaN) {
        for (const priority of withNaN) {
          for (const ceiling of values) {
            const fee = new DynamicFee(7, max, priority).limitCap(ceiling);
            expect(fee.maxFeePerGas).toBeLessThanOrEqual(ceiling);
            expect(fee.maxPriorityFeePerGas).toBeLessThanOrEqual(fee.maxFeePerGas);
          }
        }
      }
    });
  });

  it('keeps priority <= max through any chain of transformations from a valid fee', () => {
    let price = dynamic(12.5, 40.2, 3.3, 41);
    const steps: Array<(p: EstimatedGasPrice) => EstimatedGasPrice> = [
      (p) => p.scaleUp(1.125),
      (p) => p.roundUp(),
      (p) => p.limitCap(45),
      (p) => p.scaleUp(3),
      (p) => p.limitCap(100.5),
      (p) => p.roundUp(),
      (p) => p.scaleUp(1.1),
    ];
    for (const step of steps) {
      price = step(price);
      const fee = price.eip1559;
      expect(fee).toBeDefined();
      if (fee) {
        expect(fee.maxPriorityFeePerGas).toBeLessThanOrEqual(fee.maxFeePerGas);
      }
    }
  });

  it('returns new frozen instances', () => {
    const price = dynamic(5, 50, 2, 10);
    const scaled = price.scaleUp(2);

    expect(scaled).not.toBe(price);
    expect(Object.isFrozen(scaled)).toBe(true);
    expect(Object.isFrozen(scaled.eip1559)).toBe(true);
    expect(price.legacy).toBe(10);
  });

  it('exposes a tagged fee model', () => {
    expect(EstimatedGasPrice.legacyOnly(9).toFeeModel()).toEqual({ type: 'legacy', gasPrice: 9 });
    expect(dynamic(1, 3, 2, 9).toFeeModel()).toEqual({
      type: 'eip1559',
      baseFeePerGas: 1,
      maxFeePerGas: 3,
      maxPriorityFeePerGas: 2,
    });
  });

  it('produces integer transaction fields', () => {
    expect(EstimatedGasPrice.legacyOnly(10.2).toTransactionFields()).toEqual({ gasPrice: 11n });
    expect(dynamic(1.5, 10.1, 2.3, 10.2).toTransactionFields()).toEqual({
      maxFeePerGas: 11n,
      maxPriorityFeePerGas: 3n,
    });
  });

  it('reads back what it serializes', () => {
    const price = dynamic(5, 50, 2, 10);

    expect(EstimatedGasPrice.fromJSON(price.toJSON()).equals(price)).toBe(true);
    expect(EstimatedGasPrice.fromJSON({ legacy: 7 }).eip1559).toBeUndefined();
  });
});
