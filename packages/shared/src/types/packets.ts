/**
 * Wire packets accepted by the enclave
 * Field names are snake_case exactly as clients send them
 */

import { z } from 'zod';

/**
 * Relationship a requester claims to hold with an asset
 */
export enum RequesterType {
  OWNER = 'OWNER',
  DELEGATEE = 'DELEGATEE',
  RENTEE = 'RENTEE',
  NONE = 'NONE',
}

/**
 * Store request: owner delegates to a signer, signer signs the key-share data
 */
export const StoreKeysharePacketSchema = z.object({
  owner_address: z.string().min(1, 'owner_address is required'),
  // "<ss58>_<block_number>_<block_validation>", signed by the owner
  signer_address: z.string(),
  signersig: z.string(),
  // "<nft_id>_<keyshare>_<block_number>_<block_validation>", signed by the signer
  data: z.string(),
  signature: z.string(),
});

export type StoreKeysharePacket = z.infer<typeof StoreKeysharePacketSchema>;

/**
 * Retrieve request: signed directly by the requester
 */
export const RetrieveKeysharePacketSchema = z.object({
  requester_address: z.string().min(1, 'requester_address is required'),
  requester_type: z.nativeEnum(RequesterType),
  // "<nft_id>_<block_number>_<block_validation>"
  data: z.string(),
  signature: z.string(),
});

export type RetrieveKeysharePacket = z.infer<typeof RetrieveKeysharePacketSchema>;

/**
 * Admin bulk request
 *
 * `nftid_vec` is the JSON text of a u32 array and `auth_token` the JSON text of
 * `{ block_number, block_validation, data_hash }` where data_hash is the
 * sha256 hex digest of `nftid_vec`.
 */
export const FetchIdPacketSchema = z.object({
  admin_address: z.string().min(1, 'admin_address is required'),
  nftid_vec: z.string(),
  auth_token: z.string(),
  signature: z.string(),
});

export type FetchIdPacket = z.infer<typeof FetchIdPacketSchema>;
