import { config as loadEnv } from 'dotenv';
import axios from 'axios';
import { formatUnits } from 'ethers';
import type { GasPriceQuote } from '../../src/services/GasPriceService';

loadEnv();

const DEFAULT_GAS_PRICE_URL = 'http://localhost:3000/gas-price';
const gasPriceUrl = (process.env.GAS_SMOKE_URL ?? DEFAULT_GAS_PRICE_URL).trim();

interface Scenario {
  label: string;
  gasLimit: number;
  timeLimitMs: number;
}

const scenarios: Scenario[] = [
  { label: 'transfer, 15s', gasLimit: 21_000, timeLimitMs: 15_000 },
  { label: 'transfer, 30s', gasLimit: 21_000, timeLimitMs: 30_000 },
  { label: 'swap, 2m', gasLimit: 250_000, timeLimitMs: 120_000 },
];

const gwei = (wei: number): string => formatUnits(BigInt(Math.ceil(wei)), 'gwei');

const runScenario = async (scenario: Scenario): Promise<void> => {
  const response = await axios.get<GasPriceQuote>(gasPriceUrl, {
    params: { gasLimit: scenario.gasLimit, timeLimitMs: scenario.timeLimitMs },
    timeout: scenario.timeLimitMs + 5_000,
  });
  const quote = response.data;

  if (quote.effectivePrice > quote.cap) {
    throw new Error(`effectivePrice ${quote.effectivePrice} exceeds cap ${quote.cap}`);
  }
  const fee = quote.gasPrice.eip1559;
  if (fee && fee.maxPriorityFeePerGas > fee.maxFeePerGas) {
    throw new Error(
      `maxPriorityFeePerGas ${fee.maxPriorityFeePerGas} exceeds maxFeePerGas ${fee.maxFeePerGas}`,
    );
  }

  console.log(
    `[PASS] ${scenario.label} -> ${quote.feeModel} effective=${gwei(quote.effectivePrice)} gwei cap=${gwei(quote.cap)} gwei`,
  );
  console.log(
    `       cost=${formatUnits(quote.estimatedCostWei, 'ether')} ETH (max ${formatUnits(quote.maxCostWei, 'ether')} ETH)`,
  );
};

const main = async (): Promise<void> => {
  console.log('Gas price smoke test');
  console.log('Endpoint:', gasPriceUrl);
  let failures = 0;
  for (const scenario of scenarios) {
    try {
      await runScenario(scenario);
    } catch (error) {
      failures += 1;
      console.error(`[FAIL] ${scenario.label}:`, error instanceof Error ? error.message : error);
    }
  }
  if (failures > 0) {
    console.error(`Gas price smoke test completed with ${failures} failures.`);
    process.exitCode = 1;
    return;
  }
  console.log('All gas price smoke checks passed.');
};

void main();
