import { getBigInt, isHexString, toQuantity } from 'ethers';
import { GasPriceEstimator } from '../gas/GasPriceEstimator';
import { DynamicFee, EstimatedGasPrice } from '../gas/GasPrice';
import { ParseFailure, TransportFailure, isGasEstimationError } from '../gas/errors';
import { abortedError, raceAbort } from '../gas/timeBudget';
import { DEFAULT_ESTIMATION_LIMITS, type EstimationLimits } from '../types/gasEstimation';

/** The slice of an ethers `JsonRpcProvider` this estimator needs. */
export interface JsonRpcSender {
  send(method: string, params: unknown[]): Promise<unknown>;
}

export interface NodeGasPriceEstimatorOptions {
  name?: string;
  /** Reward percentile requested from `eth_feeHistory`. */
  rewardPercentile?: number;
  /** Number of recent blocks sampled for the priority fee. */
  blockCount?: number;
  /** `maxFeePerGas = baseFee * baseFeeMultiplier + priorityFee` */
  baseFeeMultiplier?: number;
  limits?: EstimationLimits;
}

interface FeeHistory {
  baseFeePerGas: string[];
  reward: string[][];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === 'string');

export const parseQuantity = (value: unknown, field: string): number => {
  if (typeof value !== 'string' || !isHexString(value)) {
    throw new ParseFailure(`Expected a hex quantity for ${field}, got ${JSON.stringify(value)}`);
  }
  return Number(getBigInt(value));
};

const parseFeeHistory = (raw: unknown): FeeHistory => {
  if (!isRecord(raw)) {
    throw new ParseFailure('eth_feeHistory returned a non-object result');
  }
  const baseFeePerGas = raw.baseFeePerGas ?? [];
  if (!isStringArray(baseFeePerGas)) {
    throw new ParseFailure('eth_feeHistory baseFeePerGas is not a list of quantities');
  }
  const reward = raw.reward ?? [];
  if (!Array.isArray(reward) || !reward.every(isStringArray)) {
    throw new ParseFailure('eth_feeHistory reward is not a list of quantity lists');
  }
  return { baseFeePerGas, reward };
};

const median = (values: number[]): number => {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
};

/**
 * Estimates from an Ethereum node's own view of the fee market.
 *
 * The legacy price is `eth_gasPrice`. For EIP-1559 the base fee of the pending
 * block comes from `eth_feeHistory`, and the priority fee is the median of the
 * requested reward percentile over the last `blockCount` blocks. A node that
 * reports no base fee yields a legacy-only estimate.
 *
 * ethers `send` cannot be cancelled. An already aborted signal stops the calls
 * from going out; an abort after that only drops their results.
 */
export class NodeGasPriceEstimator extends GasPriceEstimator {
  private readonly rewardPercentile: number;
  private readonly blockCount: number;
  private readonly baseFeeMultiplier: number;

  constructor(
    private readonly provider: JsonRpcSender,
    options: NodeGasPriceEstimatorOptions = {},
  ) {
    super(options.name ?? 'node', options.limits ?? DEFAULT_ESTIMATION_LIMITS);
    this.rewardPercentile = options.rewardPercentile ?? 20;
    this.blockCount = options.blockCount ?? 10;
    this.baseFeeMultiplier = options.baseFeeMultiplier ?? 2;
  }

  public async estimateWithLimits(
    _limits: EstimationLimits,
    signal?: AbortSignal,
  ): Promise<EstimatedGasPrice> {
    if (signal?.aborted) {
      throw abortedError(signal);
    }
    const [rawGasPrice, rawHistory] = await raceAbort(
      Promise.all([
        this.call('eth_gasPrice', []),
        this.call('eth_feeHistory', [
          toQuantity(this.blockCount),
          'pending',
          [this.rewardPercentile],
        ]),
      ]),
      signal,
    );

    const gasPrice = parseQuantity(rawGasPrice, 'eth_gasPrice');
    const history = parseFeeHistory(rawHistory);

    const nextBaseFee = history.baseFeePerGas[history.baseFeePerGas.length - 1];
    if (nextBaseFee === undefined) {
      return EstimatedGasPrice.legacyOnly(gasPrice);
    }
    const baseFeePerGas = parseQuantity(nextBaseFee, 'baseFeePerGas');
    if (baseFeePerGas === 0) {
      return EstimatedGasPrice.legacyOnly(gasPrice);
    }

    const rewards = history.reward
      .filter((row) => row.length > 0)
      .map((row) => parseQuantity(row[0], 'reward'));
    const maxPriorityFeePerGas =
      rewards.length > 0 ? median(rewards) : Math.max(0, gasPrice - baseFeePerGas);

    return new EstimatedGasPrice(
      gasPrice,
      new DynamicFee(
        baseFeePerGas,
        baseFeePerGas * this.baseFeeMultiplier + maxPriorityFeePerGas,
        maxPriorityFeePerGas,
      ),
    );
  }

  private async call(method: string, params: unknown[]): Promise<unknown> {
    try {
      return await this.provider.send(method, params);
    } catch (error) {
      if (isGasEstimationError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportFailure(`${method} failed: ${message}`, { cause: error });
    }
  }
}
