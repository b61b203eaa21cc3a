/**
 * @keyshare-gate/auth - Verification error taxonomy
 * Closed sets of failure codes for the key-share and admin flows
 */

import type { ValidationResult } from './types';

/**
 * Why a hex signature could not be turned into signature bytes
 */
export enum SignatureErrorCode {
  PREFIX_ERROR = 'PREFIX_ERROR',
  LENGTH_ERROR = 'LENGTH_ERROR',
  TYPE_ERROR = 'TYPE_ERROR',
}

export enum VerificationErrorCode {
  // Format
  MALFORMED_DATA = 'MALFORMED_DATA',
  MALFORMED_SIGNER = 'MALFORMED_SIGNER',
  INVALID_SIGNER_ADDRESS = 'INVALID_SIGNER_ADDRESS',
  INVALID_OWNER_ADDRESS = 'INVALID_OWNER_ADDRESS',
  INVALID_NFT_ID = 'INVALID_NFT_ID',
  INVALID_KEYSHARE = 'INVALID_KEYSHARE',
  INVALID_AUTH_TOKEN = 'INVALID_AUTH_TOKEN',
  INVALID_SIGNER_SIG = 'INVALID_SIGNER_SIG',
  INVALID_DATA_SIG = 'INVALID_DATA_SIG',

  // Authenticity
  SIGNER_VERIFICATION_FAILED = 'SIGNER_VERIFICATION_FAILED',
  DATA_VERIFICATION_FAILED = 'DATA_VERIFICATION_FAILED',

  // Authorization
  OWNERSHIP_VERIFICATION_FAILED = 'OWNERSHIP_VERIFICATION_FAILED',
  REQUESTER_VERIFICATION_FAILED = 'REQUESTER_VERIFICATION_FAILED',

  // Freshness
  EXPIRED_SIGNER = 'EXPIRED_SIGNER',
  EXPIRED_DATA = 'EXPIRED_DATA',

  // Domain mismatch
  ID_IS_NOT_SECRET_NFT = 'ID_IS_NOT_SECRET_NFT',
  ID_IS_NOT_CAPSULE = 'ID_IS_NOT_CAPSULE',

  // Infrastructure
  CHAIN_QUERY_FAILED = 'CHAIN_QUERY_FAILED',
}

type SignatureFormatCode =
  | VerificationErrorCode.INVALID_SIGNER_SIG
  | VerificationErrorCode.INVALID_DATA_SIG;

type PlainVerificationCode = Exclude<
  VerificationErrorCode,
  SignatureFormatCode | VerificationErrorCode.CHAIN_QUERY_FAILED
>;

export type VerificationError =
  | { code: SignatureFormatCode; reason: SignatureErrorCode }
  | { code: VerificationErrorCode.CHAIN_QUERY_FAILED; operation: string; message: string }
  | { code: PlainVerificationCode };

export type VerificationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: VerificationError };

export function verified<T>(value: T): VerificationResult<T> {
  return { ok: true, value };
}

export function rejected<T>(error: VerificationError): VerificationResult<T> {
  return { ok: false, error };
}

export enum AdminErrorCode {
  NOT_WHITELISTED = 'NOT_WHITELISTED',
  TOKEN_WRAPPER_MISMATCH = 'TOKEN_WRAPPER_MISMATCH',
  TOKEN_UNPARSABLE = 'TOKEN_UNPARSABLE',
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  TOKEN_INVALID = 'TOKEN_INVALID',
  DATA_HASH_MISMATCH = 'DATA_HASH_MISMATCH',
  INVALID_ID_LIST = 'INVALID_ID_LIST',
}

export type AdminError =
  | { code: AdminErrorCode.NOT_WHITELISTED; account: string }
  | { code: AdminErrorCode.TOKEN_INVALID; validity: ValidationResult }
  | { code: AdminErrorCode.TOKEN_UNPARSABLE | AdminErrorCode.INVALID_ID_LIST; detail: string }
  | {
      code:
        | AdminErrorCode.TOKEN_WRAPPER_MISMATCH
        | AdminErrorCode.INVALID_SIGNATURE
        | AdminErrorCode.DATA_HASH_MISMATCH;
    };

export type AdminResult<T> = { ok: true; value: T } | { ok: false; error: AdminError };

/**
 * Message logged and returned for a failed admin request
 */
export function describeAdminError(error: AdminError): string {
  switch (error.code) {
    case AdminErrorCode.NOT_WHITELISTED:
      return `Requester is not whitelisted : ${error.account}`;
    case AdminErrorCode.TOKEN_WRAPPER_MISMATCH:
      return 'Authentication token has an unmatched <Bytes> wrapper marker';
    case AdminErrorCode.TOKEN_UNPARSABLE:
      return `Authentication token is not parsable : ${error.detail}`;
    case AdminErrorCode.INVALID_SIGNATURE:
      return 'Invalid Signature';
    case AdminErrorCode.TOKEN_INVALID:
      return `Authentication Token is not valid, or expired : ${error.validity}`;
    case AdminErrorCode.DATA_HASH_MISMATCH:
      return 'Mismatch Data Hash';
    case AdminErrorCode.INVALID_ID_LIST:
      return `Unable to deserialize nftid vector : ${error.detail}`;
  }
}

/**
 * A chain query failed or timed out
 * Kept apart from every verification outcome: the request was not judged
 */
export class ChainQueryError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.name = 'ChainQueryError';
    this.operation = operation;
  }
}

/**
 * Extract error message from various error types
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
