import type { EstimatedGasPrice } from './GasPrice';
import {
  DEFAULT_ESTIMATION_LIMITS,
  type EstimationLimits,
  type GasPriceEstimating,
} from '../types/gasEstimation';

/**
 * Supplies the zero-argument `estimate()` on top of `estimateWithLimits()`.
 * Subclasses keep no per-call state.
 */
export abstract class GasPriceEstimator implements GasPriceEstimating {
  protected constructor(
    public readonly name: string,
    protected readonly limits: EstimationLimits = DEFAULT_ESTIMATION_LIMITS,
  ) {}

  public estimate(): Promise<EstimatedGasPrice> {
    return this.estimateWithLimits(this.limits);
  }

  public abstract estimateWithLimits(
    limits: EstimationLimits,
    signal?: AbortSignal,
  ): Promise<EstimatedGasPrice>;
}
