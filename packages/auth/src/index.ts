/**
 * @keyshare-gate/auth
 * Authentication and authorization for TEE key-share requests
 */

export { RequesterType } from '@keyshare-gate/shared';

export * from './constants';
export * from './types';
export * from './verification_errors';

export { queryChain, getOnchainDelegatee, getOnchainRentee } from './chain';
export {
  createAuthToken,
  isTokenValid,
  checkAdminTokenWindow,
  validateAdminToken,
  serializeAuthToken,
} from './token';
export {
  stripWrapper,
  parseU32,
  decodeAccount,
  parseSigner,
  parseStoreData,
  parseRetrieveData,
  serializeSigner,
  serializeStoreData,
  serializeRetrieveData,
} from './codec';
export {
  ensureCryptoReady,
  parseSignature,
  selectStoreSignature,
  verifySignature,
  type SignatureParseResult,
} from './signature';
export { authorizeRequester, isSameAccount, type RequesterAuthorizationOptions } from './requester';
export {
  verifyStoreRequest,
  verifyRetrieveRequest,
  verifyFreeStoreRequest,
  verifyFreeRetrieveRequest,
  type FreeVerifierOptions,
} from './delegation';
export { verifyAdminRequest, sha256Hex, ADMIN_MAINTENANCE_MESSAGE, type AdminVerifierOptions } from './admin';
export { MaintenanceStatus } from './maintenance';
export { expressVerificationError, statusFor } from './status';
export { logger } from './logger';
