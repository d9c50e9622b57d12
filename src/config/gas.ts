import './env';
import type { BudgetPolicy, EstimationLimits } from '../types/gasEstimation';
import { DEFAULT_ESTIMATION_LIMITS } from '../types/gasEstimation';
import {
  DEFAULT_TIER_WAITS_MS,
  type GasStationTierWaits,
} from '../oracles/GasStationEstimator';
import {
  parseEnumEnv,
  parseListEnv,
  parseNumberEnv,
  parseStringEnv,
  type Env,
} from './parse';

export const GAS_SOURCE_KINDS = ['node', 'gasstation'] as const;
export type GasSourceKind = (typeof GAS_SOURCE_KINDS)[number];

const BUDGET_POLICIES: readonly BudgetPolicy[] = ['remaining', 'even-split'];

/** Upper bound for `GAS_DEFAULT_TIME_LIMIT_MS`, matching the HTTP query schema. */
export const MAX_TIME_LIMIT_MS = 600_000;

export const DEFAULT_ETH_RPC_URL = 'https://ethereum-rpc.publicnode.com';
export const DEFAULT_GAS_STATION_URL = 'https://gasstation.polygon.technology/v2';

export interface GasConfig {
  limits: EstimationLimits;
  budgetPolicy: BudgetPolicy;
  /** Priority order, most preferred first. */
  sources: GasSourceKind[];
  node: {
    rpcUrl: string;
    chainId: number;
    rewardPercentile: number;
    blockCount: number;
    baseFeeMultiplier: number;
  };
  gasStation: {
    url: string;
    apiKey?: string;
    tierWaitsMs: GasStationTierWaits;
  };
}

const isSourceKind = (value: string): value is GasSourceKind =>
  GAS_SOURCE_KINDS.some((kind) => kind === value);

export const loadGasConfig = (env: Env = process.env): GasConfig => {
  const requested = parseListEnv(env, 'GAS_SOURCES', [...GAS_SOURCE_KINDS]);
  const unknown = requested.filter((entry) => !isSourceKind(entry));
  if (unknown.length > 0) {
    throw new Error(
      `Unknown gas price source(s) in GAS_SOURCES: ${unknown.join(', ')} (expected ${GAS_SOURCE_KINDS.join(', ')})`,
    );
  }

  return {
    limits: {
      gasLimit: Math.max(
        0,
        parseNumberEnv(env, 'GAS_DEFAULT_GAS_LIMIT', DEFAULT_ESTIMATION_LIMITS.gasLimit),
      ),
      timeLimitMs: Math.min(
        MAX_TIME_LIMIT_MS,
        Math.max(
          1,
          parseNumberEnv(env, 'GAS_DEFAULT_TIME_LIMIT_MS', DEFAULT_ESTIMATION_LIMITS.timeLimitMs),
        ),
      ),
    },
    budgetPolicy: parseEnumEnv(env, 'GAS_BUDGET_POLICY', BUDGET_POLICIES, 'remaining'),
    sources: requested.filter(isSourceKind),
    node: {
      rpcUrl: parseStringEnv(env, 'ETH_RPC_URL') ?? DEFAULT_ETH_RPC_URL,
      chainId: parseNumberEnv(env, 'ETH_CHAIN_ID', 1),
      rewardPercentile: parseNumberEnv(env, 'GAS_NODE_REWARD_PERCENTILE', 20),
      blockCount: Math.max(1, Math.floor(parseNumberEnv(env, 'GAS_NODE_BLOCK_COUNT', 10))),
      baseFeeMultiplier: parseNumberEnv(env, 'GAS_NODE_BASE_FEE_MULTIPLIER', 2),
    },
    gasStation: {
      url: parseStringEnv(env, 'GAS_STATION_URL') ?? DEFAULT_GAS_STATION_URL,
      apiKey: parseStringEnv(env, 'GAS_STATION_API_KEY'),
      tierWaitsMs: {
        fast: parseNumberEnv(env, 'GAS_STATION_FAST_WAIT_MS', DEFAULT_TIER_WAITS_MS.fast),
        standard: parseNumberEnv(env, 'GAS_STATION_STANDARD_WAIT_MS', DEFAULT_TIER_WAITS_MS.standard),
        safeLow: parseNumberEnv(env, 'GAS_STATION_SAFELOW_WAIT_MS', DEFAULT_TIER_WAITS_MS.safeLow),
      },
    },
  };
};

const gasConfig: GasConfig = loadGasConfig();

export default gasConfig;
