/**
 * API request/response types
 */

/**
 * Endpoint family a verification outcome belongs to
 */
export enum ApiCall {
  NFTSTORE = 'NFTSTORE',
  NFTRETRIEVE = 'NFTRETRIEVE',
  CAPSULESET = 'CAPSULESET',
  CAPSULERETRIEVE = 'CAPSULERETRIEVE',
}

/**
 * Status tags returned to clients
 * Clients match on these strings, never rename them
 */
export enum ReturnStatus {
  STORESUCCESS = 'STORESUCCESS',
  RETRIEVESUCCESS = 'RETRIEVESUCCESS',
  REMOVESUCCESS = 'REMOVESUCCESS',

  SIGNERSIGVERIFICATIONFAILED = 'SIGNERSIGVERIFICATIONFAILED',
  DATASIGVERIFICATIONFAILED = 'DATASIGVERIFICATIONFAILED',

  OWNERSHIPVERIFICATIONFAILED = 'OWNERSHIPVERIFICATIONFAILED',
  REQUESTERVERIFICATIONFAILED = 'REQUESTERVERIFICATIONFAILED',

  INVALIDDATAFORMAT = 'INVALIDDATAFORMAT',
  INVALIDSIGNERFORMAT = 'INVALIDSIGNERFORMAT',

  INVALIDSIGNERSIGNATURE = 'INVALIDSIGNERSIGNATURE',
  INVALIDDATASIGNATURE = 'INVALIDDATASIGNATURE',

  INVALIDOWNERADDRESS = 'INVALIDOWNERADDRESS',
  INVALIDSIGNERADDRESS = 'INVALIDSIGNERADDRESS',
  INVALIDAUTHTOKEN = 'INVALIDAUTHTOKEN',
  INVALIDKEYSHARE = 'INVALIDKEYSHARE',
  INVALIDNFTID = 'INVALIDNFTID',

  EXPIREDSIGNER = 'EXPIREDSIGNER',
  EXPIREDREQUEST = 'EXPIREDREQUEST',

  NFTIDEXISTS = 'NFTIDEXISTS',

  DATABASEFAILURE = 'DATABASEFAILURE',
  ORACLEFAILURE = 'ORACLEFAILURE',

  KEYNOTEXIST = 'KEYNOTEXIST',
  KEYNOTACCESSIBLE = 'KEYNOTACCESSIBLE',
  KEYNOTREADABLE = 'KEYNOTREADABLE',

  IDISNOTASECRETNFT = 'IDISNOTASECRETNFT',
  IDISNOTACAPSULE = 'IDISNOTACAPSULE',
  IDISNOTENCRYPTED = 'IDISNOTENCRYPTED',

  NOTBURNT = 'NOTBURNT',
  NOTSYNCING = 'NOTSYNCING',
}

/**
 * Body returned for every key-share call, successful or not
 */
export interface StatusResponse {
  status: ReturnStatus;
  nft_id: number;
  enclave_id: string;
  description: string;
}

/**
 * Successful retrieve: the key-share travels as a UTF-8 string
 */
export interface RetrieveResponse extends StatusResponse {
  keyshare_data: string;
}

/**
 * Admin endpoint failure body
 */
export interface AdminErrorResponse {
  error: string;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'ok' | 'maintenance';
  enclave_id: string;
  maintenance: string;
  timestamp: string;
  uptime: number;
}

/**
 * Error codes for request-level failures outside the key-share protocol
 */
export enum ErrorCode {
  INVALID_REQUEST = 'INVALID_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  ATTESTATION_ERROR = 'ATTESTATION_ERROR',
  MAINTENANCE = 'MAINTENANCE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Body returned for request-level failures
 */
export interface ErrorResponse {
  error: ErrorCode;
  code: ErrorCode;
  message: string;
  details?: unknown;
}

/**
 * Successful backup id fetch: requested ids that hold a key-share
 */
export interface FetchIdResponse {
  enclave_id: string;
  nft_ids: number[];
  capsule_ids: number[];
}

/**
 * Attestation quote, hex encoded
 */
export interface QuoteResponse {
  enclave_id: string;
  quote: string;
}
