import { GasPriceEstimator } from './GasPriceEstimator';
import type { EstimatedGasPrice } from './GasPrice';
import {
  AllSourcesExhaustedError,
  TimeoutFailure,
  toGasEstimationError,
  type SourceFailure,
} from './errors';
import { abortedError, allotSlice, withDeadline } from './timeBudget';
import {
  DEFAULT_ESTIMATION_LIMITS,
  type BudgetPolicy,
  type EstimationLimits,
  type GasPriceEstimating,
} from '../types/gasEstimation';
import { Logger } from '../utils/logger';

export interface PriorityGasPriceEstimatorOptions {
  name?: string;
  /** How the overall time budget is split across sources. Defaults to `remaining`. */
  budgetPolicy?: BudgetPolicy;
  /** Limits used by the zero-argument `estimate()`. */
  limits?: EstimationLimits;
  now?: () => number;
}

/**
 * Tries its sources one after another, most preferred first, and returns the first
 * estimate that arrives within its slice of the time budget.
 *
 * Sources are never raced: a slow trusted source beats a fast untrusted one as
 * long as it answers in time. The estimator is itself a `GasPriceEstimating`, so
 * it can be nested inside another one.
 */
export class PriorityGasPriceEstimator extends GasPriceEstimator {
  private readonly logger = new Logger('PriorityGasPriceEstimator');
  private readonly sources: readonly GasPriceEstimating[];
  private readonly budgetPolicy: BudgetPolicy;
  private readonly now: () => number;

  constructor(
    sources: readonly GasPriceEstimating[],
    options: PriorityGasPriceEstimatorOptions = {},
  ) {
    super(
      options.name ?? `priority(${sources.map((s) => s.name).join(',')})`,
      options.limits ?? DEFAULT_ESTIMATION_LIMITS,
    );
    if (sources.length === 0) {
      throw new RangeError('PriorityGasPriceEstimator needs at least one source');
    }
    this.sources = Object.freeze([...sources]);
    this.budgetPolicy = options.budgetPolicy ?? 'remaining';
    this.now = options.now ?? Date.now;
  }

  public get sourceNames(): string[] {
    return this.sources.map((s) => s.name);
  }

  public async estimateWithLimits(
    limits: EstimationLimits,
    signal?: AbortSignal,
  ): Promise<EstimatedGasPrice> {
    const deadline = this.now() + limits.timeLimitMs;
    const failures: SourceFailure[] = [];

    for (let index = 0; index < this.sources.length; index++) {
      const source = this.sources[index];

      if (signal?.aborted) {
        failures.push({ index, source: source.name, error: abortedError(signal) });
        continue;
      }

      const sliceMs = allotSlice(
        this.budgetPolicy,
        deadline - this.now(),
        this.sources.length - index,
      );
      if (sliceMs <= 0) {
        failures.push({ index, source: source.name, error: new TimeoutFailure(source.name, 0) });
        continue;
      }

      const startedAt = this.now();
      try {
        const price = await withDeadline(
          (sourceSignal) => source.estimateWithLimits(limits, sourceSignal),
          sliceMs,
          { signal, onTimeout: () => new TimeoutFailure(source.name, sliceMs) },
        );
        this.logger.debug('gas.priority.success', {
          source: source.name,
          index,
          durationMs: this.now() - startedAt,
          effectivePrice: price.effectivePrice(),
        });
        return price;
      } catch (e) {
        const error = toGasEstimationError(e);
        failures.push({ index, source: source.name, error });
        this.logger.warn('gas.priority.sourceFailed', {
          source: source.name,
          index,
          code: error.code,
          message: error.message,
          sliceMs,
        });
      }
    }

    throw new AllSourcesExhaustedError(failures);
  }
}
