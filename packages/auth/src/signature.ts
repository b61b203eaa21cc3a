/**
 * @keyshare-gate/auth - Signature verification
 * sr25519 (Schnorr over Ristretto25519), the scheme behind Substrate account keys
 */

import { hexToU8a } from '@polkadot/util';
import { cryptoWaitReady, sr25519Verify } from '@polkadot/util-crypto';
import type { StoreKeysharePacket } from '@keyshare-gate/shared';
import { SIGNATURE_LENGTH, SIGNATURE_PREFIX } from './constants';
import { logger as defaultLogger } from './logger';
import type { AuthLogger } from './types';
import { SignatureErrorCode } from './verification_errors';

const SIGNATURE_HEX_PATTERN = new RegExp(`^[0-9a-fA-F]{${SIGNATURE_LENGTH * 2}}$`);

export type SignatureParseResult =
  | { ok: true; signature: Uint8Array }
  | { ok: false; reason: SignatureErrorCode };

/**
 * Wait for the WASM crypto backend; cheap once initialised
 */
export async function ensureCryptoReady(): Promise<void> {
  await cryptoWaitReady();
}

/**
 * "0x" + 128 hex digits -> 64 signature bytes
 */
export function parseSignature(hex: string): SignatureParseResult {
  if (!hex.startsWith(SIGNATURE_PREFIX)) {
    return { ok: false, reason: SignatureErrorCode.PREFIX_ERROR };
  }

  const digits = hex.slice(SIGNATURE_PREFIX.length);
  if (!SIGNATURE_HEX_PATTERN.test(digits)) {
    return { ok: false, reason: SignatureErrorCode.LENGTH_ERROR };
  }

  return { ok: true, signature: hexToU8a(hex) };
}

/**
 * Read a store packet signature by slot name
 * "signer" is the owner's grant (signersig), "owner" the data signature
 */
export function selectStoreSignature(
  packet: Pick<StoreKeysharePacket, 'signature' | 'signersig'>,
  slot: string
): SignatureParseResult {
  switch (slot) {
    case 'owner':
      return parseSignature(packet.signature);
    case 'signer':
      return parseSignature(packet.signersig);
    default:
      return { ok: false, reason: SignatureErrorCode.TYPE_ERROR };
  }
}

/**
 * Never throws: malformed keys or signatures verify as false
 */
export function verifySignature(
  signature: Uint8Array,
  message: string | Uint8Array,
  publicKey: Uint8Array,
  logger: AuthLogger = defaultLogger
): boolean {
  try {
    return sr25519Verify(message, signature, publicKey);
  } catch (error) {
    logger.debug({ error }, 'sr25519 verification raised, treating as invalid');
    return false;
  }
}
