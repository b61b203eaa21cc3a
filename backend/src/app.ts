/**
 * Key-share enclave HTTP server
 * Built from its collaborators so tests can run it against in-process fakes
 */

import Fastify, { type FastifyInstance } from 'fastify';
import { randomUUID } from 'crypto';
import { ErrorCode } from '@keyshare-gate/shared';
import type { ChainOracle, MaintenanceStatus } from '@keyshare-gate/auth';
import type { AttestationPaths } from './lib/attestation/quote';
import { isHttpError, toErrorResponse } from './lib/errors';
import type { KeyshareVault } from './services/keyshare-vault';

export interface ServerDeps {
  chain: ChainOracle;
  vault: KeyshareVault;
  maintenance: MaintenanceStatus;
  enclaveId: string;
  adminWhitelist: readonly string[];
  attestation: AttestationPaths;
  queryTimeoutMs: number;
  logLevel?: string;
  nodeEnv?: string;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: deps.logLevel ?? 'info',
      base: { service: 'keyshare-enclave', enclaveId: deps.enclaveId },
    },
    genReqId: () => randomUUID(),
  });

  // Register routes
  const { registerHealthRoutes } = await import('./routes/health');
  const { registerKeyshareRoutes } = await import('./routes/keyshare');
  const { registerAdminRoutes } = await import('./routes/admin');

  await registerHealthRoutes(fastify, deps);
  await registerKeyshareRoutes(fastify, deps);
  await registerAdminRoutes(fastify, deps);

  fastify.log.debug('Routes registered');

  // Error handler
  fastify.setErrorHandler((error, request, reply) => {
    if (isHttpError(error)) {
      request.log.warn({ code: error.code, message: error.message }, 'Request failed');
      const { statusCode, body } = toErrorResponse(error, deps.nodeEnv);
      return reply.code(statusCode).send(body);
    }

    // Body parsing and other client errors raised by fastify itself
    if (error.statusCode !== undefined && error.statusCode < 500) {
      request.log.warn({ message: error.message }, 'Invalid request');
      return reply.code(error.statusCode).send({
        error: ErrorCode.INVALID_REQUEST,
        code: ErrorCode.INVALID_REQUEST,
        message: error.message,
      });
    }

    request.log.error(error, 'Unhandled error');
    const { statusCode, body } = toErrorResponse(error, deps.nodeEnv);
    return reply.code(statusCode).send(body);
  });

  return fastify;
}
