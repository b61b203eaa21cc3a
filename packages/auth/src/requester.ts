/**
 * @keyshare-gate/auth - Requester authorization
 * The single place where a claimed relationship is checked against chain state
 */

import { u8aEq } from '@polkadot/util';
import { RequesterType } from '@keyshare-gate/shared';
import { getOnchainDelegatee, getOnchainRentee } from './chain';
import { decodeAccount } from './codec';
import { logger as defaultLogger } from './logger';
import type { ChainQueryOptions, ChainStateOracle, KeyshareHolder } from './types';

export interface RequesterAuthorizationOptions extends ChainQueryOptions {
  chain: ChainStateOracle;
}

/**
 * Two addresses name the same account when their public keys match,
 * whatever SS58 network prefix they were encoded with
 */
export function isSameAccount(left: string, right: string): boolean {
  const leftKey = decodeAccount(left);
  const rightKey = decodeAccount(right);
  return leftKey !== null && rightKey !== null && u8aEq(leftKey, rightKey);
}

function holderMatches(holder: KeyshareHolder, requester: string): boolean {
  switch (holder.kind) {
    case 'Delegatee':
    case 'Rentee':
    case 'Owner':
      return isSameAccount(holder.account, requester);
    case 'NotFound':
      return false;
  }
}

async function resolveHolder(
  nftId: number,
  onChainOwner: string,
  claimedType: RequesterType,
  options: RequesterAuthorizationOptions
): Promise<KeyshareHolder> {
  switch (claimedType) {
    // NONE is treated exactly as OWNER
    case RequesterType.OWNER:
    case RequesterType.NONE:
      return { kind: 'Owner', account: onChainOwner };
    case RequesterType.DELEGATEE:
      return getOnchainDelegatee(options.chain, nftId, options);
    case RequesterType.RENTEE:
      return getOnchainRentee(options.chain, nftId, options);
  }
}

/**
 * Decide whether `requester` really holds the claimed relationship to `nftId`
 *
 * OWNER and NONE compare against the on-chain owner; DELEGATEE and RENTEE
 * query the chain on every call. Chain failures throw ChainQueryError.
 */
export async function authorizeRequester(
  requester: string,
  nftId: number,
  onChainOwner: string,
  claimedType: RequesterType,
  options: RequesterAuthorizationOptions
): Promise<boolean> {
  const log = options.logger ?? defaultLogger;
  const holder = await resolveHolder(nftId, onChainOwner, claimedType, options);

  const authorized = holderMatches(holder, requester);
  log.debug({ nftId, requester, claimedType, holder: holder.kind, authorized }, 'Requester authorization');
  return authorized;
}
