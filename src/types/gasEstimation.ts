import type { EstimatedGasPrice } from '../gas/GasPrice';

/** Inputs every estimation takes: how much gas, and how long the caller will wait. */
export interface EstimationLimits {
  /** Units of gas the transaction is expected to use. */
  gasLimit: number;
  /** Time the caller is willing to wait for the estimate, and the target inclusion window. */
  timeLimitMs: number;
}

/** A plain value transfer, estimated within a generous window. */
export const DEFAULT_ESTIMATION_LIMITS: Readonly<EstimationLimits> = Object.freeze({
  gasLimit: 21_000,
  timeLimitMs: 30_000,
});

export interface GasPriceEstimating {
  /** Label used in logs and failure reports. */
  readonly name: string;

  /** Estimate with the estimator's configured limits. */
  estimate(): Promise<EstimatedGasPrice>;

  /**
   * Estimate the gas price for a transaction using `limits.gasLimit` gas to be mined
   * within `limits.timeLimitMs`. Rejects with a `GasEstimationError`.
   */
  estimateWithLimits(limits: EstimationLimits, signal?: AbortSignal): Promise<EstimatedGasPrice>;
}

export type BudgetPolicy = 'remaining' | 'even-split';

export type FeeModel =
  | { type: 'legacy'; gasPrice: number }
  | {
      type: 'eip1559';
      baseFeePerGas: number;
      maxFeePerGas: number;
      maxPriorityFeePerGas: number;
    };

export interface DynamicFeeJson {
  baseFeePerGas: number;
  maxFeePerGas: number;
  maxPriorityFeePerGas: number;
}

export interface GasPriceJson {
  legacy: number;
  eip1559?: DynamicFeeJson;
}

export type TransactionFeeFields =
  | { gasPrice: bigint }
  | { maxFeePerGas: bigint; maxPriorityFeePerGas: bigint };
