/**
 * Test accounts, packet builders and an in-process chain oracle
 * Imported by this package's tests and by the backend route tests
 */

import { Keyring } from '@polkadot/keyring';
import type { KeyringPair } from '@polkadot/keyring/types';
import { u8aToHex } from '@polkadot/util';
import { cryptoWaitReady } from '@polkadot/util-crypto';
import type {
  FetchIdPacket,
  RequesterType,
  RetrieveKeysharePacket,
  StoreKeysharePacket,
} from '@keyshare-gate/shared';
import type { AssetRecord, ChainOracle } from './types';

export interface TestAccounts {
  owner: KeyringPair;
  signer: KeyringPair;
  delegatee: KeyringPair;
  rentee: KeyringPair;
  stranger: KeyringPair;
  admin: KeyringPair;
}

export async function createAccounts(): Promise<TestAccounts> {
  await cryptoWaitReady();
  const keyring = new Keyring({ type: 'sr25519' });

  return {
    owner: keyring.addFromUri('//Owner'),
    signer: keyring.addFromUri('//Signer'),
    delegatee: keyring.addFromUri('//Delegatee'),
    rentee: keyring.addFromUri('//Rentee'),
    stranger: keyring.addFromUri('//Stranger'),
    admin: keyring.addFromUri('//Admin'),
  };
}

export function sign(pair: KeyringPair, message: string): string {
  return u8aToHex(pair.sign(message));
}

export function wrap(field: string): string {
  return `<Bytes>${field}</Bytes>`;
}

export class FakeChain implements ChainOracle {
  height = 1000;
  readonly assets = new Map<number, AssetRecord>();
  readonly delegatees = new Map<number, string>();
  readonly rentees = new Map<number, string>();

  async currentFinalizedBlock(): Promise<number> {
    return this.height;
  }

  async assetRecord(nftId: number): Promise<AssetRecord | null> {
    return this.assets.get(nftId) ?? null;
  }

  async delegateeOf(nftId: number): Promise<string | null> {
    return this.delegatees.get(nftId) ?? null;
  }

  async renteeOf(nftId: number): Promise<string | null> {
    return this.rentees.get(nftId) ?? null;
  }
}

export interface StorePacketInput {
  owner: KeyringPair;
  signer: KeyringPair;
  nftId: number;
  keyshare: string;
  signerWindow: [number, number];
  dataWindow: [number, number];
  wrapped?: boolean;
}

/**
 * Owner signs the signer grant, signer signs the data
 */
export function buildStorePacket(input: StorePacketInput): StoreKeysharePacket {
  const signerField = `${input.signer.address}_${input.signerWindow[0]}_${input.signerWindow[1]}`;
  const dataField = `${input.nftId}_${input.keyshare}_${input.dataWindow[0]}_${input.dataWindow[1]}`;
  const signerAddress = input.wrapped ? wrap(signerField) : signerField;
  const data = input.wrapped ? wrap(dataField) : dataField;

  return {
    owner_address: input.owner.address,
    signer_address: signerAddress,
    signersig: sign(input.owner, signerAddress),
    data,
    signature: sign(input.signer, data),
  };
}

export function buildRetrievePacket(
  requester: KeyringPair,
  requesterType: RequesterType,
  nftId: number,
  window: [number, number]
): RetrieveKeysharePacket {
  const data = `${nftId}_${window[0]}_${window[1]}`;
  return {
    requester_address: requester.address,
    requester_type: requesterType,
    data,
    signature: sign(requester, data),
  };
}

export function buildFetchIdPacket(
  admin: KeyringPair,
  nftidVec: string,
  token: { block_number: number; block_validation: number; data_hash: string },
  wrapped = false
): FetchIdPacket {
  const json = JSON.stringify(token);
  const authToken = wrapped ? wrap(json) : json;
  return {
    admin_address: admin.address,
    nftid_vec: nftidVec,
    auth_token: authToken,
    signature: sign(admin, authToken),
  };
}
