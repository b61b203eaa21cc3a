/**
 * @keyshare-gate/auth - Constants
 * Wire format markers and validity window bounds
 */

/**
 * Separator between fields of a signed flat string
 * Field content cannot contain it (there is no escaping)
 */
export const FIELD_DELIMITER = '_';

/**
 * Wrapper some wallet UIs (polkadot.js extension) add around signed text
 */
export const WRAPPER_PREFIX = '<Bytes>';
export const WRAPPER_SUFFIX = '</Bytes>';

/**
 * Mandatory prefix of hex-encoded signatures
 */
export const SIGNATURE_PREFIX = '0x';

/**
 * sr25519 signature size in bytes
 */
export const SIGNATURE_LENGTH = 64;

/**
 * sr25519 public key size in bytes
 */
export const PUBLIC_KEY_LENGTH = 32;

/**
 * Blocks of tolerance on both ends of a per-secret token window
 * Absorbs finalization lag between the client and the enclave
 */
export const BLOCK_GRACE = 3;

/**
 * Admin token bounds: tighter, finite windows for bulk operations
 */
export const MAX_VALIDATION_PERIOD = 20;
export const MAX_BLOCK_VARIATION = 5;

export const U32_MAX = 4_294_967_295;
export const U8_MAX = 255;

/**
 * Upper bound for any single chain query
 */
export const DEFAULT_CHAIN_QUERY_TIMEOUT_MS = 10_000;

/**
 * Returned by the attestation producer outside an enclave
 */
export const NOT_IN_ENCLAVE_SENTINEL = 'This is NOT inside an Enclave!';
