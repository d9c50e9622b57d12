import { GasPriceService } from './GasPriceService';
import { DynamicFee, EstimatedGasPrice } from '../gas/GasPrice';
import { TransportFailure } from '../gas/errors';
import type { GasConfig } from '../config/gas';
import type { JsonRpcSender } from '../oracles/NodeGasPriceEstimator';
import type { HttpTransport } from '../transport/HttpTransport';
import type { EstimationLimits, GasPriceEstimating } from '../types/gasEstimation';

const DEFAULTS: EstimationLimits = { gasLimit: 21_000, timeLimitMs: 30_000 };

const makeEstimator = (price: EstimatedGasPrice) => {
  const estimateWithLimits = jest.fn(
    async (_limits: EstimationLimits, _signal?: AbortSignal) => price,
  );
  const estimator: GasPriceEstimating = {
    name: 'stub',
    estimate: () => estimateWithLimits(DEFAULTS),
    estimateWithLimits,
  };
  return { estimator, estimateWithLimits };
};

const CONFIG: GasConfig = {
  limits: DEFAULTS,
  budgetPolicy: 'remaining',
  sources: ['gasstation', 'node'],
  node: {
    rpcUrl: 'http://127.0.0.1:8545',
    chainId: 1,
    rewardPercentile: 20,
    blockCount: 10,
    baseFeeMultiplier: 2,
  },
  gasStation: {
    url: 'https://gas-station.test/v2',
    tierWaitsMs: { fast: 15_000, standard: 30_000, safeLow: 60_000 },
  },
};

describe('GasPriceService', () => {
  describe('getGasPrice', () => {
    it('quotes the estimate with costs for the default limits', async () => {
      const { estimator, estimateWithLimits } = makeEstimator(
        new EstimatedGasPrice(30, new DynamicFee(20, 100, 2)),
      );
      const service = new GasPriceService(estimator, DEFAULTS);

      const quote = await service.getGasPrice();

      expect(quote).toEqual({
        gasPrice: {
          legacy: 30,
          eip1559: { baseFeePerGas: 20, maxFeePerGas: 100, maxPriorityFeePerGas: 2 },
        },
        feeModel: 'eip1559',
        effectivePrice: 22,
        cap: 100,
        gasLimit: 21_000,
        timeLimitMs: 30_000,
        estimatedCostWei: '462000',
        maxCostWei: '2100000',
      });
      expect(estimateWithLimits.mock.calls[0][0]).toEqual(DEFAULTS);
    });

    it('applies per-request overrides', async () => {
      const { estimator, estimateWithLimits } = makeEstimator(EstimatedGasPrice.legacyOnly(10.5));
      const service = new GasPriceService(estimator, DEFAULTS);

      const quote = await service.getGasPrice({ timeLimitMs: 5_000 });

      expect(estimateWithLimits.mock.calls[0][0]).toEqual({ gasLimit: 21_000, timeLimitMs: 5_000 });
      expect(quote.feeModel).toBe('legacy');
      expect(quote.estimatedCostWei).toBe('231000');
    });

    it('keeps cost arithmetic exact beyond the float range', async () => {
      const { estimator } = makeEstimator(EstimatedGasPrice.legacyOnly(3e12));
      const service = new GasPriceService(estimator, DEFAULTS);

      const quote = await service.getGasPrice({ gasLimit: 30_000_000 });

      expect(quote.maxCostWei).toBe('90000000000000000000');
    });
  });

  describe('bump', () => {
    const previous = new EstimatedGasPrice(10, new DynamicFee(5, 50, 2));

    it('scales up and rounds to whole wei', () => {
      const { estimator } = makeEstimator(previous);
      const bumped = new GasPriceService(estimator, DEFAULTS).bump(previous, { factor: 1.125 });

      expect(bumped.toJSON()).toEqual({
        legacy: 12,
        eip1559: { baseFeePerGas: 5, maxFeePerGas: 57, maxPriorityFeePerGas: 3 },
      });
    });

    it('clamps to the caller ceiling', () => {
      const { estimator } = makeEstimator(previous);
      const bumped = new GasPriceService(estimator, DEFAULTS).bump(previous, {
        factor: 1.125,
        maxCap: 55,
      });

      expect(bumped.toJSON()).toEqual({
        legacy: 12,
        eip1559: { baseFeePerGas: 5, maxFeePerGas: 55, maxPriorityFeePerGas: 3 },
      });
    });

    it('stays in whole wei under a fractional ceiling', () => {
      const { estimator } = makeEstimator(previous);
      const service = new GasPriceService(estimator, DEFAULTS);

      expect(service.bump(previous, { factor: 1.125, maxCap: 55.9 }).toJSON()).toEqual({
        legacy: 12,
        eip1559: { baseFeePerGas: 5, maxFeePerGas: 55, maxPriorityFeePerGas: 3 },
      });
      expect(service.bump(previous, { factor: 1.125, maxCap: 11.5 }).toJSON()).toEqual({
        legacy: 11,
        eip1559: { baseFeePerGas: 5, maxFeePerGas: 11, maxPriorityFeePerGas: 3 },
      });
    });
  });

  describe('fromConfig', () => {
    const gasStationDown = (): HttpTransport => ({
      getJson: jest.fn(async () => {
        throw new TransportFailure('GET https://gas-station.test/v2 failed with status 502', {
          status: 502,
        });
      }),
    });

    it('lists sources in configured priority order', () => {
      const provider: JsonRpcSender = { send: jest.fn() };
      const service = GasPriceService.fromConfig(CONFIG, { provider, transport: gasStationDown() });

      expect(service.sourceNames).toEqual(['gasstation', 'node']);
    });

    it('falls back to the node when the gas station fails', async () => {
      const send = jest.fn(async (method: string): Promise<unknown> =>
        method === 'eth_gasPrice' ? '0x3b9aca00' : { baseFeePerGas: [], reward: [] },
      );
      const service = GasPriceService.fromConfig(CONFIG, {
        provider: { send },
        transport: gasStationDown(),
      });

      const quote = await service.getGasPrice();

      expect(quote.gasPrice).toEqual({ legacy: 1e9 });
      expect(quote.estimatedCostWei).toBe('21000000000000');
    });

    it('needs a provider for the node source', () => {
      expect(() => GasPriceService.fromConfig(CONFIG, { transport: gasStationDown() })).toThrow(
        'The node gas price source needs an Ethereum provider',
      );
    });

    it('does not need a provider without the node source', () => {
      const service = GasPriceService.fromConfig(
        { ...CONFIG, sources: ['gasstation'] },
        { transport: gasStationDown() },
      );

      expect(service.sourceNames).toEqual(['gasstation']);
    });
  });
});
