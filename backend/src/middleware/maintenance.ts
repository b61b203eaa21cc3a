/**
 * Fastify guard refusing key-share traffic while a bulk operation runs
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { ErrorCode } from '@keyshare-gate/shared';
import type { MaintenanceStatus } from '@keyshare-gate/auth';
import { HttpError, toErrorResponse } from '../lib/errors';

export function createMaintenanceGuard(maintenance: MaintenanceStatus) {
  return async function maintenanceGuard(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    if (!maintenance.isUnderMaintenance()) {
      return;
    }

    request.log.warn({ maintenance: maintenance.current() }, 'Request refused during maintenance');
    const { statusCode, body } = toErrorResponse(
      new HttpError(503, ErrorCode.MAINTENANCE, `Enclave is in maintenance mode: ${maintenance.current()}`)
    );
    return reply.code(statusCode).send(body);
  };
}
