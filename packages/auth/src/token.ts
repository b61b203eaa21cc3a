/**
 * @keyshare-gate/auth - Token validity windows
 */

import { BLOCK_GRACE, FIELD_DELIMITER, MAX_BLOCK_VARIATION, MAX_VALIDATION_PERIOD } from './constants';
import { queryChain } from './chain';
import { logger as defaultLogger } from './logger';
import {
  ValidationResult,
  type AdminAuthenticationToken,
  type AuthenticationToken,
  type ChainHeightOracle,
  type ChainQueryOptions,
  type ValidityWindow,
} from './types';

export function createAuthToken(blockNumber: number, blockValidation: number): AuthenticationToken {
  return { kind: 'keyshare', blockNumber, blockValidation };
}

/**
 * Per-secret window: [blockNumber - 3, blockNumber + blockValidation + 3)
 */
export function isTokenValid(token: ValidityWindow, currentBlock: number): boolean {
  return (
    currentBlock >= token.blockNumber - BLOCK_GRACE &&
    currentBlock < token.blockNumber + token.blockValidation + BLOCK_GRACE
  );
}

/**
 * Admin window: [blockNumber - 5, blockNumber + blockValidation + 5], period capped at 20
 */
export function checkAdminTokenWindow(
  token: AdminAuthenticationToken,
  currentBlock: number
): ValidationResult {
  if (currentBlock < token.blockNumber - MAX_BLOCK_VARIATION) {
    return ValidationResult.EXPIRED_BLOCK_NUMBER;
  }

  if (token.blockValidation > MAX_VALIDATION_PERIOD) {
    return ValidationResult.INVALID_PERIOD;
  }

  if (currentBlock > token.blockNumber + token.blockValidation + MAX_BLOCK_VARIATION) {
    return ValidationResult.FUTURE_BLOCK_NUMBER;
  }

  return ValidationResult.SUCCESS;
}

/**
 * Check an admin token against the current finalized height
 */
export async function validateAdminToken(
  token: AdminAuthenticationToken,
  chain: ChainHeightOracle,
  options: ChainQueryOptions = {}
): Promise<ValidationResult> {
  const log = options.logger ?? defaultLogger;

  let currentBlock: number;
  try {
    currentBlock = await queryChain('currentFinalizedBlock', () => chain.currentFinalizedBlock(), options);
  } catch (error) {
    log.error({ error }, 'Failed to get current block number');
    return ValidationResult.ERROR_RPC_CALL;
  }

  return checkAdminTokenWindow(token, currentBlock);
}

export function serializeAuthToken(token: ValidityWindow): string {
  return `${token.blockNumber}${FIELD_DELIMITER}${token.blockValidation}`;
}
