import { GasPriceEstimator } from '../gas/GasPriceEstimator';
import { DynamicFee, EstimatedGasPrice } from '../gas/GasPrice';
import { ParseFailure } from '../gas/errors';
import { interpolate, type InterpolationPoint } from '../gas/linearInterpolation';
import type { HttpHeaders, HttpTransport } from '../transport/HttpTransport';
import { DEFAULT_ESTIMATION_LIMITS, type EstimationLimits } from '../types/gasEstimation';

const GWEI = 1_000_000_000;

export const GAS_STATION_TIERS = ['fast', 'standard', 'safeLow'] as const;
export type GasStationTier = (typeof GAS_STATION_TIERS)[number];

/** Expected time to inclusion for each tier. */
export type GasStationTierWaits = Record<GasStationTier, number>;

export const DEFAULT_TIER_WAITS_MS: Readonly<GasStationTierWaits> = Object.freeze({
  fast: 15_000,
  standard: 30_000,
  safeLow: 60_000,
});

// Prices in gwei.
interface GasStationLevel {
  maxPriorityFee: number;
  maxFee: number;
}

export type GasStationDocument = Record<GasStationTier, GasStationLevel> & {
  estimatedBaseFee: number;
};

export interface GasStationEstimatorOptions {
  url: string;
  apiKey?: string;
  name?: string;
  tierWaitsMs?: GasStationTierWaits;
  limits?: EstimationLimits;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readNumber = (value: unknown, field: string): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ParseFailure(`Gas station field ${field} is not a number`);
  }
  return value;
};

export const parseGasStationDocument = (raw: unknown): GasStationDocument => {
  if (!isRecord(raw)) {
    throw new ParseFailure('Gas station response is not an object');
  }
  const level = (tier: GasStationTier): GasStationLevel => {
    const entry = raw[tier];
    if (!isRecord(entry)) {
      throw new ParseFailure(`Gas station response is missing the ${tier} tier`);
    }
    return {
      maxPriorityFee: readNumber(entry.maxPriorityFee, `${tier}.maxPriorityFee`),
      maxFee: readNumber(entry.maxFee, `${tier}.maxFee`),
    };
  };
  return {
    fast: level('fast'),
    standard: level('standard'),
    safeLow: level('safeLow'),
    estimatedBaseFee: readNumber(raw.estimatedBaseFee, 'estimatedBaseFee'),
  };
};

/**
 * Gas station (v2 document shape) client. The station publishes a few speed
 * tiers; the estimate for a given time limit is interpolated between the tiers
 * whose expected wait brackets it.
 */
export class GasStationEstimator extends GasPriceEstimator {
  private readonly url: string;
  private readonly headers: HttpHeaders;
  private readonly tierWaitsMs: GasStationTierWaits;

  constructor(
    private readonly transport: HttpTransport,
    options: GasStationEstimatorOptions,
  ) {
    super(options.name ?? 'gasstation', options.limits ?? DEFAULT_ESTIMATION_LIMITS);
    this.url = options.url;
    this.headers = options.apiKey ? { 'x-api-key': options.apiKey } : {};
    this.tierWaitsMs = options.tierWaitsMs ?? DEFAULT_TIER_WAITS_MS;
  }

  public async estimateWithLimits(
    limits: EstimationLimits,
    signal?: AbortSignal,
  ): Promise<EstimatedGasPrice> {
    const raw = await this.transport.getJson(this.url, this.headers, { signal });
    const doc = parseGasStationDocument(raw);

    const points = (pick: (level: GasStationLevel) => number): InterpolationPoint[] =>
      GAS_STATION_TIERS.map((tier) => ({ x: this.tierWaitsMs[tier], y: pick(doc[tier]) })).sort(
        (a, b) => a.x - b.x,
      );

    const maxFeePerGas = interpolate(limits.timeLimitMs, points((l) => l.maxFee)) * GWEI;
    const maxPriorityFeePerGas =
      interpolate(limits.timeLimitMs, points((l) => l.maxPriorityFee)) * GWEI;

    return new EstimatedGasPrice(
      maxFeePerGas,
      new DynamicFee(doc.estimatedBaseFee * GWEI, maxFeePerGas, maxPriorityFeePerGas),
    );
  }
}
