/**
 * Key-share enclave server
 * Holds asset key-shares and releases them to authorized requesters
 */

import { ensureCryptoReady, MaintenanceStatus } from '@keyshare-gate/auth';
import { buildServer } from './app';
import { config } from './lib/config';
import { logger } from './lib/logger';
import { disconnectChain, getChainApi } from './lib/chain/client';
import { SubstrateChainOracle } from './lib/chain/oracle';
import { InMemoryKeyshareVault } from './services/keyshare-vault';

async function start(): Promise<void> {
  await ensureCryptoReady();

  const api = await getChainApi(config.chain.rpcUrl);

  const fastify = await buildServer({
    chain: new SubstrateChainOracle(api),
    vault: new InMemoryKeyshareVault(),
    maintenance: new MaintenanceStatus(),
    enclaveId: config.enclave.id,
    adminWhitelist: config.admin.whitelist,
    attestation: {
      deviceRoot: config.enclave.attestationDeviceRoot,
      quotePath: config.enclave.quotePath,
    },
    queryTimeoutMs: config.chain.queryTimeoutMs,
    logLevel: config.app.logLevel,
    nodeEnv: config.app.nodeEnv,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} signal received: closing HTTP server`);
    try {
      await fastify.close();
      await disconnectChain();
      process.exit(0);
    } catch (error) {
      logger.error(error, 'Shutdown failed');
      process.exit(1);
    }
  };

  // Graceful shutdown
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  const host = '0.0.0.0';

  try {
    await fastify.listen({ port: config.app.port, host });
    logger.info({ enclaveId: config.enclave.id }, `Server running at http://${host}:${config.app.port}`);
  } catch (error) {
    logger.error(error, 'Failed to bind to port');
    process.exit(1);
  }
}

start().catch((error) => {
  logger.error(error, 'Failed to start server');
  process.exit(1);
});
