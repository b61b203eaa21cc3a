/**
 * Chain oracle backed by the NFT and rent pallets
 * Storage values are read as JSON and validated before use
 */

import type { ApiPromise } from '@polkadot/api';
import { z } from 'zod';
import type { AssetRecord, ChainOracle } from '@keyshare-gate/auth';

const NftStateSchema = z.object({
  isCapsule: z.boolean(),
  isSecret: z.boolean(),
  isDelegated: z.boolean().optional(),
  isRented: z.boolean().optional(),
});

const NftDataSchema = z.object({
  owner: z.string(),
  state: NftStateSchema,
});

const AccountSchema = z.string().min(1);

const RentContractSchema = z.object({
  rentee: z.string().nullable().optional(),
});

/**
 * `nft.nfts` entry -> AssetRecord; null when the asset does not exist
 */
export function parseNftData(json: unknown): AssetRecord | null {
  if (json === null || json === undefined) {
    return null;
  }

  const parsed = NftDataSchema.parse(json);
  return {
    owner: parsed.owner,
    isSecret: parsed.state.isSecret,
    isCapsule: parsed.state.isCapsule,
  };
}

/**
 * `nft.delegatedNFTs` entry -> delegatee address
 */
export function parseDelegatee(json: unknown): string | null {
  if (json === null || json === undefined) {
    return null;
  }
  return AccountSchema.parse(json);
}

/**
 * `rent.contracts` entry -> rentee address, null until the contract is taken
 */
export function parseRentee(json: unknown): string | null {
  if (json === null || json === undefined) {
    return null;
  }
  return RentContractSchema.parse(json).rentee ?? null;
}

export class SubstrateChainOracle implements ChainOracle {
  constructor(private readonly api: ApiPromise) {}

  async currentFinalizedBlock(): Promise<number> {
    const hash = await this.api.rpc.chain.getFinalizedHead();
    const header = await this.api.rpc.chain.getHeader(hash);
    return header.number.toNumber();
  }

  async assetRecord(nftId: number): Promise<AssetRecord | null> {
    const entry = await this.api.query.nft.nfts(nftId);
    return parseNftData(entry.toJSON());
  }

  async delegateeOf(nftId: number): Promise<string | null> {
    const entry = await this.api.query.nft.delegatedNFTs(nftId);
    return parseDelegatee(entry.toJSON());
  }

  async renteeOf(nftId: number): Promise<string | null> {
    const entry = await this.api.query.rent.contracts(nftId);
    return parseRentee(entry.toJSON());
  }
}
