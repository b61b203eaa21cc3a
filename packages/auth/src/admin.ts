/**
 * @keyshare-gate/auth - Admin authentication
 * Gate for bulk operations (backup id fetch) run by whitelisted accounts
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import type { FetchIdPacket } from '@keyshare-gate/shared';
import { U32_MAX, U8_MAX } from './constants';
import { decodeAccount, stripWrapper } from './codec';
import { logger as defaultLogger } from './logger';
import type { MaintenanceStatus } from './maintenance';
import { isSameAccount } from './requester';
import { ensureCryptoReady, parseSignature, verifySignature } from './signature';
import { validateAdminToken } from './token';
import {
  ValidationResult,
  type AdminAuthenticationToken,
  type AuthLogger,
  type ChainHeightOracle,
  type ChainQueryOptions,
  type ParsedAdminPayload,
} from './types';
import { AdminErrorCode, describeAdminError, extractErrorMessage, type AdminError, type AdminResult } from './verification_errors';

export const ADMIN_MAINTENANCE_MESSAGE = 'Admin bulk operation in progress';

const u32 = z.number().int().min(0).max(U32_MAX);

const AdminTokenSchema = z.object({
  block_number: u32,
  block_validation: z.number().int().min(0).max(U8_MAX),
  data_hash: z.string(),
});

const NftIdListSchema = z.array(u32);

export interface AdminVerifierOptions extends ChainQueryOptions {
  chain: ChainHeightOracle;
  maintenance: MaintenanceStatus;
}

/**
 * Lowercase hex sha256 of a payload string
 */
export function sha256Hex(payload: string): string {
  return createHash('sha256').update(payload).digest('hex');
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; detail: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, detail: extractErrorMessage(error) };
  }
}

function parseAdminToken(content: string): AdminResult<AdminAuthenticationToken> {
  const json = parseJson(content);
  if (!json.ok) {
    return { ok: false, error: { code: AdminErrorCode.TOKEN_UNPARSABLE, detail: json.detail } };
  }

  const parsed = AdminTokenSchema.safeParse(json.value);
  if (!parsed.success) {
    return {
      ok: false,
      error: { code: AdminErrorCode.TOKEN_UNPARSABLE, detail: parsed.error.issues[0]?.message ?? 'invalid token' },
    };
  }

  return {
    ok: true,
    value: {
      kind: 'admin',
      blockNumber: parsed.data.block_number,
      blockValidation: parsed.data.block_validation,
      dataHash: parsed.data.data_hash,
    },
  };
}

function parseNftIds(text: string): AdminResult<number[]> {
  const json = parseJson(text);
  if (!json.ok) {
    return { ok: false, error: { code: AdminErrorCode.INVALID_ID_LIST, detail: json.detail } };
  }

  const parsed = NftIdListSchema.safeParse(json.value);
  if (!parsed.success) {
    return {
      ok: false,
      error: { code: AdminErrorCode.INVALID_ID_LIST, detail: parsed.error.issues[0]?.message ?? 'invalid id list' },
    };
  }

  return { ok: true, value: parsed.data };
}

async function authenticate(
  packet: FetchIdPacket,
  whitelist: readonly string[],
  options: AdminVerifierOptions,
  log: AuthLogger
): Promise<AdminResult<ParsedAdminPayload>> {
  const fail = (error: AdminError): AdminResult<ParsedAdminPayload> => {
    log.warn({ code: error.code, admin: packet.admin_address }, describeAdminError(error));
    return { ok: false, error };
  };

  if (!whitelist.some((entry) => isSameAccount(entry, packet.admin_address))) {
    return fail({ code: AdminErrorCode.NOT_WHITELISTED, account: packet.admin_address });
  }

  const content = stripWrapper(packet.auth_token);
  if (content === null) {
    return fail({ code: AdminErrorCode.TOKEN_WRAPPER_MISMATCH });
  }

  const token = parseAdminToken(content);
  if (!token.ok) {
    return fail(token.error);
  }

  const adminKey = decodeAccount(packet.admin_address);
  const signature = parseSignature(packet.signature);
  if (!adminKey || !signature.ok || !verifySignature(signature.signature, packet.auth_token, adminKey, log)) {
    return fail({ code: AdminErrorCode.INVALID_SIGNATURE });
  }

  const validity = await validateAdminToken(token.value, options.chain, options);
  if (validity !== ValidationResult.SUCCESS) {
    return fail({ code: AdminErrorCode.TOKEN_INVALID, validity });
  }

  if (sha256Hex(packet.nftid_vec) !== token.value.dataHash) {
    return fail({ code: AdminErrorCode.DATA_HASH_MISMATCH });
  }

  const nftIds = parseNftIds(packet.nftid_vec);
  if (!nftIds.ok) {
    return fail(nftIds.error);
  }

  log.info({ admin: packet.admin_address, count: nftIds.value.length }, 'Admin request authenticated');
  return {
    ok: true,
    value: { adminAddress: packet.admin_address, nftIds: nftIds.value, authToken: token.value },
  };
}

/**
 * Authenticate a bulk admin request
 *
 * Checks run in a fixed order (whitelist, wrapper, token, signature, window,
 * payload hash, id list) and stop at the first failure. The maintenance
 * status is held for the whole check, whatever its outcome.
 */
export async function verifyAdminRequest(
  packet: FetchIdPacket,
  whitelist: readonly string[],
  options: AdminVerifierOptions
): Promise<AdminResult<ParsedAdminPayload>> {
  const log = options.logger ?? defaultLogger;
  await ensureCryptoReady();

  return options.maintenance.during(ADMIN_MAINTENANCE_MESSAGE, () =>
    authenticate(packet, whitelist, options, log)
  );
}
