/**
 * @keyshare-gate/auth - Verification error -> client status
 */

import { ReturnStatus, type ApiCall, type StatusResponse } from '@keyshare-gate/shared';
import { logger as defaultLogger } from './logger';
import type { AuthLogger } from './types';
import { VerificationErrorCode, type VerificationError } from './verification_errors';

interface StatusEntry {
  status: ReturnStatus;
  describe: (error: VerificationError) => string;
}

const fixed = (status: ReturnStatus, text: string): StatusEntry => ({ status, describe: () => text });

function detailOf(error: VerificationError): string {
  if ('reason' in error) {
    return error.reason;
  }
  if ('message' in error) {
    return error.message;
  }
  return '';
}

const STATUS_TABLE: Record<VerificationErrorCode, StatusEntry> = {
  [VerificationErrorCode.MALFORMED_DATA]: fixed(ReturnStatus.INVALIDDATAFORMAT, 'Failed to parse data field.'),
  [VerificationErrorCode.MALFORMED_SIGNER]: fixed(ReturnStatus.INVALIDSIGNERFORMAT, 'Failed to parse Signer field.'),
  [VerificationErrorCode.INVALID_SIGNER_ADDRESS]: fixed(
    ReturnStatus.INVALIDSIGNERADDRESS,
    'Invalid signer address format'
  ),
  [VerificationErrorCode.INVALID_OWNER_ADDRESS]: fixed(ReturnStatus.INVALIDOWNERADDRESS, 'Invalid owner address format'),
  [VerificationErrorCode.INVALID_NFT_ID]: fixed(
    ReturnStatus.INVALIDNFTID,
    'The nft-id is not a valid number or nft does not exist.'
  ),
  [VerificationErrorCode.INVALID_KEYSHARE]: fixed(
    ReturnStatus.INVALIDKEYSHARE,
    'The key-share is empty or not a valid string.'
  ),
  [VerificationErrorCode.INVALID_AUTH_TOKEN]: fixed(ReturnStatus.INVALIDAUTHTOKEN, 'Invalid authentication-token format.'),
  [VerificationErrorCode.INVALID_SIGNER_SIG]: {
    status: ReturnStatus.INVALIDSIGNERSIGNATURE,
    describe: (error) => `Invalid request signature format, ${detailOf(error)}`,
  },
  [VerificationErrorCode.INVALID_DATA_SIG]: {
    status: ReturnStatus.INVALIDDATASIGNATURE,
    describe: (error) => `Invalid request data signature format, ${detailOf(error)}`,
  },
  [VerificationErrorCode.SIGNER_VERIFICATION_FAILED]: fixed(
    ReturnStatus.SIGNERSIGVERIFICATIONFAILED,
    'Signer signature verification failed, Signer is not approved by NFT owner'
  ),
  [VerificationErrorCode.DATA_VERIFICATION_FAILED]: fixed(
    ReturnStatus.DATASIGVERIFICATIONFAILED,
    'Data signature verification failed.'
  ),
  [VerificationErrorCode.OWNERSHIP_VERIFICATION_FAILED]: fixed(
    ReturnStatus.OWNERSHIPVERIFICATIONFAILED,
    'The nft-id is not owned by this owner.'
  ),
  [VerificationErrorCode.REQUESTER_VERIFICATION_FAILED]: fixed(
    ReturnStatus.REQUESTERVERIFICATIONFAILED,
    'The requester is not either owner, delegatee or rentee.'
  ),
  [VerificationErrorCode.EXPIRED_SIGNER]: fixed(
    ReturnStatus.EXPIREDSIGNER,
    'The signer account has been expired or is not in valid range.'
  ),
  [VerificationErrorCode.EXPIRED_DATA]: fixed(
    ReturnStatus.EXPIREDREQUEST,
    'The request data field has been expired or is not in valid range.'
  ),
  [VerificationErrorCode.ID_IS_NOT_SECRET_NFT]: fixed(ReturnStatus.IDISNOTASECRETNFT, 'The nft-id is not a secret-nft.'),
  [VerificationErrorCode.ID_IS_NOT_CAPSULE]: fixed(ReturnStatus.IDISNOTACAPSULE, 'The nft-id is not a capsule.'),
  [VerificationErrorCode.CHAIN_QUERY_FAILED]: {
    status: ReturnStatus.ORACLEFAILURE,
    describe: (error) => `Chain query failed, ${detailOf(error)}`,
  },
};

/**
 * Status tag a verification error is reported under
 */
export function statusFor(code: VerificationErrorCode): ReturnStatus {
  return STATUS_TABLE[code].status;
}

/**
 * Build the client payload for a rejected request and log it with the caller
 */
export function expressVerificationError(
  error: VerificationError,
  call: ApiCall,
  caller: string,
  nftId: number,
  enclaveId: string,
  logger: AuthLogger = defaultLogger
): StatusResponse {
  const entry = STATUS_TABLE[error.code];
  const description = `TEE Key-share ${call}: ${entry.describe(error)}`;
  logger.info({ requester: caller, nftId, status: entry.status }, description);

  return {
    status: entry.status,
    nft_id: nftId,
    enclave_id: enclaveId,
    description,
  };
}
