import '../config/env';
import { JsonRpcProvider, Network } from 'ethers';
import type { GasConfig } from '../config/gas';
import { Logger } from '../utils/logger';

const logger = new Logger('EthereumRPC');

let provider: JsonRpcProvider | null = null;

export const initializeEthereumRpcProvider = (config: GasConfig['node']): JsonRpcProvider => {
  if (provider) {
    provider.destroy();
  }
  provider = new JsonRpcProvider(config.rpcUrl, Network.from(config.chainId), {
    staticNetwork: true,
  });
  logger.info('eth.rpc.initialized', { url: config.rpcUrl, chainId: config.chainId });
  return provider;
};

export const shutdownEthereumRpcProvider = (): void => {
  provider?.destroy();
  provider = null;
};
