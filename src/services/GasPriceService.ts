import { EstimatedGasPrice } from '../gas/GasPrice';
import { PriorityGasPriceEstimator } from '../gas/PriorityGasPriceEstimator';
import type { GasConfig, GasSourceKind } from '../config/gas';
import { NodeGasPriceEstimator, type JsonRpcSender } from '../oracles/NodeGasPriceEstimator';
import { GasStationEstimator } from '../oracles/GasStationEstimator';
import { AxiosHttpTransport, type HttpTransport } from '../transport/HttpTransport';
import type {
  EstimationLimits,
  FeeModel,
  GasPriceEstimating,
  GasPriceJson,
} from '../types/gasEstimation';
import { Logger } from '../utils/logger';

export interface GasPriceQuote {
  gasPrice: GasPriceJson;
  feeModel: FeeModel['type'];
  effectivePrice: number;
  cap: number;
  gasLimit: number;
  timeLimitMs: number;
  /** gasLimit * effectivePrice, rounded up, in wei. */
  estimatedCostWei: string;
  /** gasLimit * cap, rounded up, in wei. */
  maxCostWei: string;
}

export interface BumpOptions {
  factor: number;
  /** Ceiling applied after scaling; omitted means uncapped. */
  maxCap?: number;
}

export interface GasSourceDependencies {
  /** Needed when the `node` source is configured. */
  provider?: JsonRpcSender;
  transport?: HttpTransport;
}

const weiCost = (gasLimit: number, price: number): string =>
  (BigInt(Math.ceil(gasLimit)) * BigInt(Math.ceil(price))).toString();

export class GasPriceService {
  private readonly logger = new Logger('GasPriceService');

  constructor(
    private readonly estimator: GasPriceEstimating,
    private readonly defaults: EstimationLimits,
    private readonly sources: string[] = [estimator.name],
  ) {}

  static fromConfig(config: GasConfig, deps: GasSourceDependencies = {}): GasPriceService {
    const transport = deps.transport ?? new AxiosHttpTransport();

    const build = (kind: GasSourceKind): GasPriceEstimating => {
      switch (kind) {
        case 'node': {
          if (!deps.provider) {
            throw new Error('The node gas price source needs an Ethereum provider');
          }
          return new NodeGasPriceEstimator(deps.provider, {
            rewardPercentile: config.node.rewardPercentile,
            blockCount: config.node.blockCount,
            baseFeeMultiplier: config.node.baseFeeMultiplier,
            limits: config.limits,
          });
        }
        case 'gasstation':
          return new GasStationEstimator(transport, {
            url: config.gasStation.url,
            apiKey: config.gasStation.apiKey,
            tierWaitsMs: config.gasStation.tierWaitsMs,
            limits: config.limits,
          });
      }
    };

    const sources = config.sources.map(build);
    const estimator = new PriorityGasPriceEstimator(sources, {
      budgetPolicy: config.budgetPolicy,
      limits: config.limits,
    });
    return new GasPriceService(estimator, config.limits, estimator.sourceNames);
  }

  public get sourceNames(): string[] {
    return [...this.sources];
  }

  async getGasPrice(
    overrides: Partial<EstimationLimits> = {},
    signal?: AbortSignal,
  ): Promise<GasPriceQuote> {
    const limits: EstimationLimits = {
      gasLimit: overrides.gasLimit ?? this.defaults.gasLimit,
      timeLimitMs: overrides.timeLimitMs ?? this.defaults.timeLimitMs,
    };
    const price = await this.estimator.estimateWithLimits(limits, signal);
    const effectivePrice = price.effectivePrice();
    const cap = price.cap();

    this.logger.info('gas.quote', {
      feeModel: price.toFeeModel().type,
      effectivePrice,
      cap,
      ...limits,
    });

    return {
      gasPrice: price.toJSON(),
      feeModel: price.toFeeModel().type,
      effectivePrice,
      cap,
      gasLimit: limits.gasLimit,
      timeLimitMs: limits.timeLimitMs,
      estimatedCostWei: weiCost(limits.gasLimit, effectivePrice),
      maxCostWei: weiCost(limits.gasLimit, cap),
    };
  }

  /**
   * Price for resubmitting a stuck transaction: scale up, round to whole wei,
   * then clamp to the caller's ceiling rounded down to whole wei. The result is
   * whole wei and never above `maxCap`. The factor itself is the caller's policy.
   */
  bump(previous: EstimatedGasPrice, { factor, maxCap }: BumpOptions): EstimatedGasPrice {
    const scaled = previous.scaleUp(factor).roundUp();
    return maxCap === undefined ? scaled : scaled.limitCap(Math.floor(maxCap));
  }
}
