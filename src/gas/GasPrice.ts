import type {
  DynamicFeeJson,
  FeeModel,
  GasPriceJson,
  TransactionFeeFields,
} from '../types/gasEstimation';

// NaN on either side yields the other operand.
const clamp = (value: number, ceiling: number): number => {
  if (Number.isNaN(value)) return ceiling;
  if (Number.isNaN(ceiling)) return value;
  return Math.min(value, ceiling);
};

const assertFactor = (factor: number): void => {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new RangeError(`Scale factor must be a positive finite number, got ${factor}`);
  }
};

/**
 * EIP-1559 components of an estimate. All values are wei per unit of gas.
 *
 * `maxPriorityFeePerGas <= maxFeePerGas` is restored by `limitCap`; an oracle may
 * hand back a value that violates it.
 */
export class DynamicFee {
  constructor(
    /** Estimated base fee of the pending block. Set by the network, not the sender. */
    public readonly baseFeePerGas: number,
    /** Most the sender will pay per unit of gas. */
    public readonly maxFeePerGas: number,
    /** Tip to the block producer. */
    public readonly maxPriorityFeePerGas: number,
  ) {
    Object.freeze(this);
  }

  scaleUp(factor: number): DynamicFee {
    assertFactor(factor);
    return new DynamicFee(
      this.baseFeePerGas,
      this.maxFeePerGas * factor,
      this.maxPriorityFeePerGas * factor,
    );
  }

  roundUp(): DynamicFee {
    return new DynamicFee(
      this.baseFeePerGas,
      Math.ceil(this.maxFeePerGas),
      Math.ceil(this.maxPriorityFeePerGas),
    );
  }

  limitCap(ceiling: number): DynamicFee {
    const maxFeePerGas = clamp(this.maxFeePerGas, ceiling);
    return new DynamicFee(
      this.baseFeePerGas,
      maxFeePerGas,
      clamp(this.maxPriorityFeePerGas, maxFeePerGas),
    );
  }

  equals(other: DynamicFee): boolean {
    return (
      this.baseFeePerGas === other.baseFeePerGas &&
      this.maxFeePerGas === other.maxFeePerGas &&
      this.maxPriorityFeePerGas === other.maxPriorityFeePerGas
    );
  }

  toJSON(): DynamicFeeJson {
    return {
      baseFeePerGas: this.baseFeePerGas,
      maxFeePerGas: this.maxFeePerGas,
      maxPriorityFeePerGas: this.maxPriorityFeePerGas,
    };
  }
}

/**
 * Gas price estimate for both legacy and EIP-1559 transactions.
 *
 * When `eip1559` is set, `legacy` is only a fallback for senders that cannot
 * submit type-2 transactions.
 */
export class EstimatedGasPrice {
  constructor(
    public readonly legacy: number,
    public readonly eip1559?: DynamicFee,
  ) {
    Object.freeze(this);
  }

  static legacyOnly(gasPrice: number): EstimatedGasPrice {
    return new EstimatedGasPrice(gasPrice);
  }

  static fromJSON(json: GasPriceJson): EstimatedGasPrice {
    const fee = json.eip1559
      ? new DynamicFee(
          json.eip1559.baseFeePerGas,
          json.eip1559.maxFeePerGas,
          json.eip1559.maxPriorityFeePerGas,
        )
      : undefined;
    return new EstimatedGasPrice(json.legacy, fee);
  }

  toFeeModel(): FeeModel {
    if (!this.eip1559) {
      return { type: 'legacy', gasPrice: this.legacy };
    }
    return { type: 'eip1559', ...this.eip1559.toJSON() };
  }

  /**
   * Price per unit of gas the transaction is expected to be charged.
   *
   * For EIP-1559 this is `min(maxFeePerGas, maxPriorityFeePerGas + baseFeePerGas)`.
   * The mined price can differ, since the base fee may move between estimation
   * and inclusion.
   */
  effectivePrice(): number {
    const model = this.toFeeModel();
    switch (model.type) {
      case 'legacy':
        return model.gasPrice;
      case 'eip1559': {
        const tipped = model.maxPriorityFeePerGas + model.baseFeePerGas;
        // unordered (NaN) counts as equal, which keeps maxFeePerGas
        return tipped < model.maxFeePerGas ? tipped : model.maxFeePerGas;
      }
    }
  }

  /** Most the sender is willing to pay per unit of gas. */
  cap(): number {
    const model = this.toFeeModel();
    switch (model.type) {
      case 'legacy':
        return model.gasPrice;
      case 'eip1559':
        return model.maxFeePerGas;
    }
  }

  /** Bump for resubmission. The base fee is left alone; re-estimating gives a fresher one. */
  scaleUp(factor: number): EstimatedGasPrice {
    assertFactor(factor);
    return new EstimatedGasPrice(this.legacy * factor, this.eip1559?.scaleUp(factor));
  }

  roundUp(): EstimatedGasPrice {
    return new EstimatedGasPrice(Math.ceil(this.legacy), this.eip1559?.roundUp());
  }

  limitCap(ceiling: number): EstimatedGasPrice {
    return new EstimatedGasPrice(clamp(this.legacy, ceiling), this.eip1559?.limitCap(ceiling));
  }

  equals(other: EstimatedGasPrice): boolean {
    if (this.legacy !== other.legacy) return false;
    if (!this.eip1559 || !other.eip1559) return this.eip1559 === other.eip1559;
    return this.eip1559.equals(other.eip1559);
  }

  /** Integer wei fields ready to spread into an ethers `TransactionRequest`. */
  toTransactionFields(): TransactionFeeFields {
    const model = this.roundUp().toFeeModel();
    switch (model.type) {
      case 'legacy':
        return { gasPrice: BigInt(model.gasPrice) };
      case 'eip1559':
        return {
          maxFeePerGas: BigInt(model.maxFeePerGas),
          maxPriorityFeePerGas: BigInt(model.maxPriorityFeePerGas),
        };
    }
  }

  toJSON(): GasPriceJson {
    return this.eip1559
      ? { legacy: this.legacy, eip1559: this.eip1559.toJSON() }
      : { legacy: this.legacy };
  }
}
