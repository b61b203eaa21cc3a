/**
 * @keyshare-gate/auth - Chain query plumbing
 * Bounded, classified access to the chain oracles
 */

import { DEFAULT_CHAIN_QUERY_TIMEOUT_MS } from './constants';
import { logger as defaultLogger } from './logger';
import type { ChainQueryOptions, ChainStateOracle, KeyshareHolder } from './types';
import { ChainQueryError, extractErrorMessage } from './verification_errors';

/**
 * Run one chain query under a timeout
 * Any failure, including the timeout, surfaces as a ChainQueryError
 */
export async function queryChain<T>(
  operation: string,
  query: () => Promise<T>,
  options: ChainQueryOptions = {}
): Promise<T> {
  const timeoutMs = options.queryTimeoutMs ?? DEFAULT_CHAIN_QUERY_TIMEOUT_MS;
  const log = options.logger ?? defaultLogger;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new ChainQueryError(operation, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([query(), timeout]);
  } catch (error) {
    const failure =
      error instanceof ChainQueryError
        ? error
        : new ChainQueryError(operation, extractErrorMessage(error), { cause: error });
    log.error({ operation, error: failure.message }, 'Chain query failed');
    throw failure;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Current delegatee of an asset, as a key-share holder
 */
export async function getOnchainDelegatee(
  chain: ChainStateOracle,
  nftId: number,
  options: ChainQueryOptions = {}
): Promise<KeyshareHolder> {
  const account = await queryChain('delegateeOf', () => chain.delegateeOf(nftId), options);
  return account ? { kind: 'Delegatee', account } : { kind: 'NotFound' };
}

/**
 * Current rentee of an asset's rent contract, as a key-share holder
 */
export async function getOnchainRentee(
  chain: ChainStateOracle,
  nftId: number,
  options: ChainQueryOptions = {}
): Promise<KeyshareHolder> {
  const account = await queryChain('renteeOf', () => chain.renteeOf(nftId), options);
  return account ? { kind: 'Rentee', account } : { kind: 'NotFound' };
}
