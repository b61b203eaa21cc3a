/**
 * Service routes
 * GET /api/health - Liveness and maintenance state
 * GET /api/quote - Enclave attestation quote (hex)
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { u8aToHex } from '@polkadot/util';
import { ErrorCode, type HealthResponse, type QuoteResponse } from '@keyshare-gate/shared';
import type { ServerDeps } from '../app';
import { generateQuote } from '../lib/attestation/quote';
import { HttpError } from '../lib/errors';

/**
 * Register health and attestation routes
 */
export async function registerHealthRoutes(fastify: FastifyInstance, deps: ServerDeps): Promise<void> {
  fastify.get('/api/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const maintenance = deps.maintenance.current();
    const response: HealthResponse = {
      status: maintenance ? 'maintenance' : 'ok',
      enclave_id: deps.enclaveId,
      maintenance,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
    return reply.send(response);
  });

  fastify.get('/api/quote', async (request: FastifyRequest, reply: FastifyReply) => {
    let quote: Uint8Array;
    try {
      quote = await generateQuote(deps.attestation);
    } catch (error) {
      request.log.error({ error }, 'Quote generation failed');
      throw new HttpError(500, ErrorCode.ATTESTATION_ERROR, 'Failed to generate attestation quote');
    }

    const response: QuoteResponse = { enclave_id: deps.enclaveId, quote: u8aToHex(quote) };
    return reply.send(response);
  });
}
