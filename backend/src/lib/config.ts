/**
 * Centralized environment configuration for the key-share enclave service.
 * Single source of truth for all environment variables with proper types and defaults.
 *
 * Usage:
 *   import { config } from './lib/config';
 *   console.log(config.chain.rpcUrl);
 */

import { decodeAccount, DEFAULT_CHAIN_QUERY_TIMEOUT_MS } from '@keyshare-gate/auth';
import { logger } from './logger';

type Env = Record<string, string | undefined>;
type NodeEnv = 'development' | 'production' | 'test';

// Helper to parse number env vars
const parseNumber = (value: string | undefined, defaultValue: number): number => {
  if (value === undefined) return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
};

// Helper to parse comma-separated env vars
const parseList = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
};

const parseNodeEnv = (value: string | undefined): NodeEnv => {
  switch (value) {
    case 'production':
      return 'production';
    case 'test':
      return 'test';
    default:
      return 'development';
  }
};

// Helper to get required env var
const getRequired = (env: Env, key: string): string => {
  const value = env[key];
  if (!value) {
    throw new Error(`Required environment variable ${key} is not set`);
  }
  return value;
};

// Helper to get optional env var with default
const getOptional = (env: Env, key: string, defaultValue: string): string => {
  return env[key] || defaultValue;
};

/**
 * Build the typed configuration from an environment
 * Throws when a required variable is missing
 */
export function loadConfig(env: Env = process.env) {
  const whitelistEntries = parseList(env.ADMIN_WHITELIST);
  const adminWhitelist = whitelistEntries.filter((entry) => decodeAccount(entry) !== null);
  const rejectedWhitelistEntries = whitelistEntries.filter((entry) => decodeAccount(entry) === null);

  return {
    // Application
    app: {
      nodeEnv: parseNodeEnv(env.NODE_ENV),
      port: parseNumber(env.PORT, 8000),
      logLevel: getOptional(env, 'LOG_LEVEL', 'info'),
    },

    // Enclave identity and attestation device
    enclave: {
      id: getOptional(env, 'ENCLAVE_ID', 'local-enclave'),
      attestationDeviceRoot: getOptional(env, 'ATTESTATION_DEVICE_ROOT', '/dev/attestation'),
      quotePath: getOptional(env, 'QUOTE_PATH', '/quote/enclave.quote'),
    },

    // Substrate chain
    chain: {
      rpcUrl: getRequired(env, 'CHAIN_RPC_URL'),
      queryTimeoutMs: parseNumber(env.CHAIN_QUERY_TIMEOUT_MS, DEFAULT_CHAIN_QUERY_TIMEOUT_MS),
    },

    // Accounts allowed to run bulk operations
    admin: {
      whitelist: adminWhitelist,
      rejectedWhitelistEntries,
    },
  } as const;
}

/**
 * Type export for use in other files
 */
export type Config = ReturnType<typeof loadConfig>;

export const config = loadConfig();

/**
 * Validate configuration on import.
 * Required variables already threw in loadConfig().
 */
(function validateConfig() {
  for (const entry of config.admin.rejectedWhitelistEntries) {
    logger.warn({ entry }, '[CONFIG] ADMIN_WHITELIST entry is not an SS58 address, ignoring it');
  }

  if (config.admin.whitelist.length === 0) {
    logger.warn('[CONFIG] ADMIN_WHITELIST is empty. Bulk operations are disabled.');
  }
})();
