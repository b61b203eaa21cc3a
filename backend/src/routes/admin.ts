/**
 * Admin routes
 * POST /api/backup/fetch-id - Report which requested ids hold a key-share
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  ErrorCode,
  FetchIdPacketSchema,
  type AdminErrorResponse,
  type FetchIdResponse,
} from '@keyshare-gate/shared';
import { describeAdminError, verifyAdminRequest } from '@keyshare-gate/auth';
import type { ServerDeps } from '../app';
import { HttpError } from '../lib/errors';

/**
 * Register admin routes
 */
export async function registerAdminRoutes(fastify: FastifyInstance, deps: ServerDeps): Promise<void> {
  fastify.post('/api/backup/fetch-id', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = FetchIdPacketSchema.safeParse(request.body);
    if (!parsed.success) {
      throw new HttpError(400, ErrorCode.INVALID_REQUEST, 'Malformed fetch-id request', parsed.error.issues);
    }

    const result = await verifyAdminRequest(parsed.data, deps.adminWhitelist, {
      chain: deps.chain,
      maintenance: deps.maintenance,
      queryTimeoutMs: deps.queryTimeoutMs,
      logger: request.log,
    });

    if (!result.ok) {
      const body: AdminErrorResponse = { error: describeAdminError(result.error) };
      return reply.code(403).send(body);
    }

    const { nftIds, adminAddress } = result.value;
    const response: FetchIdResponse = {
      enclave_id: deps.enclaveId,
      nft_ids: await deps.vault.heldIds('secret-nft', nftIds),
      capsule_ids: await deps.vault.heldIds('capsule', nftIds),
    };

    request.log.info(
      { admin: adminAddress, requested: nftIds.length, secrets: response.nft_ids.length, capsules: response.capsule_ids.length },
      'Backup ids fetched'
    );
    return reply.send(response);
  });
}
