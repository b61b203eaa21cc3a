/**
 * Substrate chain client
 * One shared WebSocket connection for every chain query
 */

import { ApiPromise, WsProvider } from '@polkadot/api';
import { logger } from '../logger';

let apiPromise: Promise<ApiPromise> | null = null;

async function connect(rpcUrl: string): Promise<ApiPromise> {
  logger.info({ rpcUrl }, 'Connecting to chain');
  try {
    const api = await ApiPromise.create({ provider: new WsProvider(rpcUrl), noInitWarn: true });
    logger.info({ chain: api.runtimeChain.toString() }, 'Chain client initialized');
    return api;
  } catch (error) {
    logger.error({ error, rpcUrl }, 'Chain connection failed');
    apiPromise = null;
    throw error;
  }
}

/**
 * Connect once; later calls reuse the pending or open connection
 */
export function getChainApi(rpcUrl: string): Promise<ApiPromise> {
  if (!apiPromise) {
    apiPromise = connect(rpcUrl);
  }
  return apiPromise;
}

export async function disconnectChain(): Promise<void> {
  if (!apiPromise) {
    return;
  }
  const pending = apiPromise;
  apiPromise = null;
  const api = await pending;
  await api.disconnect();
  logger.info('Chain client disconnected');
}
