/**
 * @keyshare-gate/auth - Packet codec
 * Flat, delimiter-separated fields that minimal wallet UIs can sign as text
 */

import { isHex, stringToU8a, u8aToString } from '@polkadot/util';
import { decodeAddress } from '@polkadot/util-crypto';
import { FIELD_DELIMITER, PUBLIC_KEY_LENGTH, U32_MAX, WRAPPER_PREFIX, WRAPPER_SUFFIX } from './constants';
import { createAuthToken, serializeAuthToken } from './token';
import type { RetrieveKeyshareData, Signer, StoreKeyshareData } from './types';
import { rejected, verified, VerificationErrorCode, type VerificationResult } from './verification_errors';

const DECIMAL_PATTERN = /^\d+$/;

/**
 * Remove one <Bytes>...</Bytes> wrapper
 * Returns null when only one of the two markers is present
 */
export function stripWrapper(field: string): string | null {
  const hasPrefix = field.startsWith(WRAPPER_PREFIX);
  const hasSuffix = field.endsWith(WRAPPER_SUFFIX);

  if (hasPrefix && hasSuffix && field.length >= WRAPPER_PREFIX.length + WRAPPER_SUFFIX.length) {
    return field.slice(WRAPPER_PREFIX.length, field.length - WRAPPER_SUFFIX.length);
  }

  if (hasPrefix || hasSuffix) {
    return null;
  }

  return field;
}

/**
 * Strict decimal u32
 */
export function parseU32(text: string): number | null {
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }

  const value = Number(text);
  return Number.isSafeInteger(value) && value <= U32_MAX ? value : null;
}

/**
 * Decode an SS58 account into its public key
 * Raw hex keys and short account indices are not accepted
 */
export function decodeAccount(address: string): Uint8Array | null {
  if (address.length === 0 || isHex(address)) {
    return null;
  }

  let decoded: Uint8Array;
  try {
    decoded = decodeAddress(address);
  } catch {
    return null;
  }
  return decoded.length === PUBLIC_KEY_LENGTH ? decoded : null;
}

function splitField(field: string): string[] | null {
  const content = stripWrapper(field);
  if (content === null || !content.includes(FIELD_DELIMITER)) {
    return null;
  }
  return content.split(FIELD_DELIMITER);
}

/**
 * "<ss58>_<block_number>_<block_validation>"; extra trailing parts are ignored
 */
export function parseSigner(field: string): VerificationResult<Signer> {
  const parts = splitField(field);
  if (!parts || parts.length < 3) {
    return rejected({ code: VerificationErrorCode.MALFORMED_SIGNER });
  }

  const [account, blockNumberText, blockValidationText] = parts;

  const publicKey = decodeAccount(account);
  if (!publicKey) {
    return rejected({ code: VerificationErrorCode.INVALID_SIGNER_ADDRESS });
  }

  const blockNumber = parseU32(blockNumberText);
  const blockValidation = parseU32(blockValidationText);
  if (blockNumber === null || blockValidation === null) {
    return rejected({ code: VerificationErrorCode.INVALID_AUTH_TOKEN });
  }

  return verified({
    account,
    publicKey,
    authToken: createAuthToken(blockNumber, blockValidation),
  });
}

/**
 * "<nft_id>_<keyshare>_<block_number>_<block_validation>"
 */
export function parseStoreData(field: string): VerificationResult<StoreKeyshareData> {
  const parts = splitField(field);
  if (!parts || parts.length !== 4) {
    return rejected({ code: VerificationErrorCode.MALFORMED_DATA });
  }

  const [nftIdText, keyshareText, blockNumberText, blockValidationText] = parts;

  const nftId = parseU32(nftIdText);
  if (nftId === null) {
    return rejected({ code: VerificationErrorCode.INVALID_NFT_ID });
  }

  if (keyshareText.length === 0) {
    return rejected({ code: VerificationErrorCode.INVALID_KEYSHARE });
  }

  const blockNumber = parseU32(blockNumberText);
  const blockValidation = parseU32(blockValidationText);
  if (blockNumber === null || blockValidation === null) {
    return rejected({ code: VerificationErrorCode.INVALID_AUTH_TOKEN });
  }

  return verified({
    nftId,
    keyshare: stringToU8a(keyshareText),
    authToken: createAuthToken(blockNumber, blockValidation),
  });
}

/**
 * "<nft_id>_<block_number>_<block_validation>"
 */
export function parseRetrieveData(field: string): VerificationResult<RetrieveKeyshareData> {
  const parts = splitField(field);
  if (!parts || parts.length !== 3) {
    return rejected({ code: VerificationErrorCode.MALFORMED_DATA });
  }

  const [nftIdText, blockNumberText, blockValidationText] = parts;

  const nftId = parseU32(nftIdText);
  if (nftId === null) {
    return rejected({ code: VerificationErrorCode.INVALID_NFT_ID });
  }

  const blockNumber = parseU32(blockNumberText);
  const blockValidation = parseU32(blockValidationText);
  if (blockNumber === null || blockValidation === null) {
    return rejected({ code: VerificationErrorCode.INVALID_AUTH_TOKEN });
  }

  return verified({ nftId, authToken: createAuthToken(blockNumber, blockValidation) });
}

function assertNoDelimiter(label: string, value: string): void {
  if (value.includes(FIELD_DELIMITER)) {
    throw new Error(`${label} cannot contain "${FIELD_DELIMITER}"`);
  }
}

export function serializeSigner(signer: Pick<Signer, 'account' | 'authToken'>): string {
  assertNoDelimiter('Signer account', signer.account);
  return `${signer.account}${FIELD_DELIMITER}${serializeAuthToken(signer.authToken)}`;
}

export function serializeStoreData(data: StoreKeyshareData): string {
  const keyshare = u8aToString(data.keyshare);
  assertNoDelimiter('Key-share', keyshare);
  return [data.nftId, keyshare, serializeAuthToken(data.authToken)].join(FIELD_DELIMITER);
}

export function serializeRetrieveData(data: RetrieveKeyshareData): string {
  return `${data.nftId}${FIELD_DELIMITER}${serializeAuthToken(data.authToken)}`;
}
