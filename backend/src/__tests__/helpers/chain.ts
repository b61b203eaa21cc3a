/**
 * Packets with windows that are open at the fake chain's default height
 */

import type { KeyringPair } from '@polkadot/keyring/types';
import type { RequesterType, RetrieveKeysharePacket, StoreKeysharePacket } from '@keyshare-gate/shared';
import { buildRetrievePacket, buildStorePacket, type TestAccounts } from '@keyshare-gate/auth/testing';

export function storePacket(accounts: TestAccounts, nftId: number, keyshare: string): StoreKeysharePacket {
  return buildStorePacket({
    owner: accounts.owner,
    signer: accounts.signer,
    nftId,
    keyshare,
    signerWindow: [990, 100],
    dataWindow: [995, 20],
  });
}

export function retrievePacket(
  requester: KeyringPair,
  requesterType: RequesterType,
  nftId: number
): RetrieveKeysharePacket {
  return buildRetrievePacket(requester, requesterType, nftId, [995, 20]);
}
