/**
 * @keyshare-gate/auth - Type Definitions
 */

import type pino from 'pino';

// ============================================================================
// Tokens
// ============================================================================

/**
 * Anything carrying a block-height validity window
 */
export interface ValidityWindow {
  /** Block height the window is anchored at */
  readonly blockNumber: number;
  /** Number of blocks the window stays open */
  readonly blockValidation: number;
}

/**
 * Per-secret token, signed as part of a store/retrieve field
 */
export interface AuthenticationToken extends ValidityWindow {
  readonly kind: 'keyshare';
}

/**
 * Admin token, bound to the digest of the bulk payload it accompanies
 */
export interface AdminAuthenticationToken extends ValidityWindow {
  readonly kind: 'admin';
  /** Lowercase hex sha256 of the accompanying payload */
  readonly dataHash: string;
}

/**
 * Outcome of an admin window check
 */
export enum ValidationResult {
  SUCCESS = 'Success',
  ERROR_RPC_CALL = 'ErrorRpcCall',
  EXPIRED_BLOCK_NUMBER = 'ExpiredBlockNumber',
  FUTURE_BLOCK_NUMBER = 'FutureBlockNumber',
  INVALID_PERIOD = 'InvalidPeriod',
}

// ============================================================================
// Parsed payloads
// ============================================================================

/**
 * Delegation: the account allowed to sign a store request's data
 */
export interface Signer {
  /** SS58 address as it appeared in the packet */
  readonly account: string;
  readonly publicKey: Uint8Array;
  readonly authToken: AuthenticationToken;
}

export interface StoreKeyshareData {
  readonly nftId: number;
  readonly keyshare: Uint8Array;
  readonly authToken: AuthenticationToken;
}

export interface RetrieveKeyshareData {
  readonly nftId: number;
  readonly authToken: AuthenticationToken;
}

export interface ParsedAdminPayload {
  readonly adminAddress: string;
  readonly nftIds: number[];
  readonly authToken: AdminAuthenticationToken;
}

/**
 * Which secret-bearing flag the asset must carry
 */
export type NftKind = 'secret-nft' | 'capsule';

/**
 * Holder of a key-share as observed on chain
 */
export type KeyshareHolder =
  | { kind: 'Owner'; account: string }
  | { kind: 'Delegatee'; account: string }
  | { kind: 'Rentee'; account: string }
  | { kind: 'NotFound' };

// ============================================================================
// Chain collaborators
// ============================================================================

export interface AssetRecord {
  /** SS58 address of the current owner */
  owner: string;
  isSecret: boolean;
  isCapsule: boolean;
}

export interface ChainHeightOracle {
  currentFinalizedBlock(): Promise<number>;
}

export interface ChainStateOracle {
  assetRecord(nftId: number): Promise<AssetRecord | null>;
  delegateeOf(nftId: number): Promise<string | null>;
  renteeOf(nftId: number): Promise<string | null>;
}

export type ChainOracle = ChainHeightOracle & ChainStateOracle;

// ============================================================================
// Options
// ============================================================================

/**
 * Logging surface the verifiers need; pino and fastify loggers both fit
 */
export type AuthLogger = Pick<pino.BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface ChainQueryOptions {
  /** Per-query timeout (default: 10000) */
  queryTimeoutMs?: number;
  logger?: AuthLogger;
}

export interface VerifierOptions extends ChainQueryOptions {
  chain: ChainOracle;
}
