/**
 * Key-share routes
 * POST /api/secret-nft/store-keyshare - Store a secret-nft key-share
 * POST /api/secret-nft/retrieve-keyshare - Retrieve a secret-nft key-share
 * POST /api/capsule-nft/set-keyshare - Store or replace a capsule key-share
 * POST /api/capsule-nft/retrieve-keyshare - Retrieve a capsule key-share
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { u8aToString } from '@polkadot/util';
import {
  ApiCall,
  ReturnStatus,
  RetrieveKeysharePacketSchema,
  StoreKeysharePacketSchema,
  type RetrieveResponse,
  type StatusResponse,
} from '@keyshare-gate/shared';
import {
  expressVerificationError,
  FIELD_DELIMITER,
  parseU32,
  stripWrapper,
  verifyRetrieveRequest,
  verifyStoreRequest,
  type NftKind,
} from '@keyshare-gate/auth';
import type { ZodError } from 'zod';
import type { ServerDeps } from '../app';
import { createMaintenanceGuard } from '../middleware/maintenance';

interface KeyshareRoute {
  kind: NftKind;
  storePath: string;
  retrievePath: string;
  storeCall: ApiCall;
  retrieveCall: ApiCall;
  /** Capsule key-shares may be replaced, secret-nft key-shares are write-once */
  overwrite: boolean;
}

const ROUTES: KeyshareRoute[] = [
  {
    kind: 'secret-nft',
    storePath: '/api/secret-nft/store-keyshare',
    retrievePath: '/api/secret-nft/retrieve-keyshare',
    storeCall: ApiCall.NFTSTORE,
    retrieveCall: ApiCall.NFTRETRIEVE,
    overwrite: false,
  },
  {
    kind: 'capsule',
    storePath: '/api/capsule-nft/set-keyshare',
    retrievePath: '/api/capsule-nft/retrieve-keyshare',
    storeCall: ApiCall.CAPSULESET,
    retrieveCall: ApiCall.CAPSULERETRIEVE,
    overwrite: true,
  },
];

const HTTP_STATUS: Partial<Record<ReturnStatus, number>> = {
  [ReturnStatus.STORESUCCESS]: 200,
  [ReturnStatus.RETRIEVESUCCESS]: 200,
  [ReturnStatus.INVALIDDATAFORMAT]: 400,
  [ReturnStatus.NFTIDEXISTS]: 409,
  [ReturnStatus.KEYNOTEXIST]: 404,
  [ReturnStatus.ORACLEFAILURE]: 503,
};

/**
 * HTTP code for a status payload; verification rejections are 403
 */
export function httpStatusFor(status: ReturnStatus): number {
  return HTTP_STATUS[status] ?? 403;
}

/**
 * Best-effort id for error payloads, 0 when the data field does not start with one
 */
export function peekNftId(data: unknown): number {
  if (typeof data !== 'string') {
    return 0;
  }
  const content = stripWrapper(data) ?? data;
  return parseU32(content.split(FIELD_DELIMITER)[0] ?? '') ?? 0;
}

function dataOf(body: unknown): unknown {
  return typeof body === 'object' && body !== null && 'data' in body ? body.data : undefined;
}

function statusPayload(
  status: ReturnStatus,
  call: ApiCall,
  nftId: number,
  enclaveId: string,
  text: string
): StatusResponse {
  return { status, nft_id: nftId, enclave_id: enclaveId, description: `TEE Key-share ${call}: ${text}` };
}

function sendStatus(reply: FastifyReply, payload: StatusResponse | RetrieveResponse): FastifyReply {
  return reply.code(httpStatusFor(payload.status)).send(payload);
}

function malformedBody(
  reply: FastifyReply,
  call: ApiCall,
  body: unknown,
  enclaveId: string,
  error: ZodError
): FastifyReply {
  const issue = error.issues[0];
  const detail = issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'invalid body';
  return sendStatus(
    reply,
    statusPayload(
      ReturnStatus.INVALIDDATAFORMAT,
      call,
      peekNftId(dataOf(body)),
      enclaveId,
      `Failed to parse request body, ${detail}`
    )
  );
}

/**
 * Register key-share routes
 */
export async function registerKeyshareRoutes(fastify: FastifyInstance, deps: ServerDeps): Promise<void> {
  const onRequest = createMaintenanceGuard(deps.maintenance);

  for (const route of ROUTES) {
    fastify.post(route.storePath, { onRequest }, async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = StoreKeysharePacketSchema.safeParse(request.body);
      if (!parsed.success) {
        request.log.warn({ path: route.storePath }, 'Malformed store request body');
        return malformedBody(reply, route.storeCall, request.body, deps.enclaveId, parsed.error);
      }

      const packet = parsed.data;
      const result = await verifyStoreRequest(packet, route.kind, {
        chain: deps.chain,
        queryTimeoutMs: deps.queryTimeoutMs,
        logger: request.log,
      });

      if (!result.ok) {
        return sendStatus(
          reply,
          expressVerificationError(
            result.error,
            route.storeCall,
            packet.owner_address,
            peekNftId(packet.data),
            deps.enclaveId,
            request.log
          )
        );
      }

      const { nftId, keyshare } = result.value;
      const stored = await deps.vault.store(route.kind, nftId, keyshare, { overwrite: route.overwrite });
      if (!stored) {
        request.log.info({ nftId, kind: route.kind }, 'Key-share already stored');
        return sendStatus(
          reply,
          statusPayload(
            ReturnStatus.NFTIDEXISTS,
            route.storeCall,
            nftId,
            deps.enclaveId,
            'Key-share for this nft-id is already stored.'
          )
        );
      }

      request.log.info({ nftId, kind: route.kind, owner: packet.owner_address }, 'Key-share stored');
      return sendStatus(
        reply,
        statusPayload(
          ReturnStatus.STORESUCCESS,
          route.storeCall,
          nftId,
          deps.enclaveId,
          'Key-share is successfully stored.'
        )
      );
    });

    fastify.post(route.retrievePath, { onRequest }, async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = RetrieveKeysharePacketSchema.safeParse(request.body);
      if (!parsed.success) {
        request.log.warn({ path: route.retrievePath }, 'Malformed retrieve request body');
        return malformedBody(reply, route.retrieveCall, request.body, deps.enclaveId, parsed.error);
      }

      const packet = parsed.data;
      const result = await verifyRetrieveRequest(packet, route.kind, {
        chain: deps.chain,
        queryTimeoutMs: deps.queryTimeoutMs,
        logger: request.log,
      });

      if (!result.ok) {
        return sendStatus(
          reply,
          expressVerificationError(
            result.error,
            route.retrieveCall,
            packet.requester_address,
            peekNftId(packet.data),
            deps.enclaveId,
            request.log
          )
        );
      }

      const { nftId } = result.value;
      const keyshare = await deps.vault.retrieve(route.kind, nftId);
      if (!keyshare) {
        return sendStatus(
          reply,
          statusPayload(
            ReturnStatus.KEYNOTEXIST,
            route.retrieveCall,
            nftId,
            deps.enclaveId,
            'No key-share is stored for this nft-id.'
          )
        );
      }

      request.log.info(
        { nftId, kind: route.kind, requester: packet.requester_address, as: packet.requester_type },
        'Key-share retrieved'
      );
      const response: RetrieveResponse = {
        ...statusPayload(
          ReturnStatus.RETRIEVESUCCESS,
          route.retrieveCall,
          nftId,
          deps.enclaveId,
          'Key-share is successfully retrieved.'
        ),
        keyshare_data: u8aToString(keyshare),
      };
      return sendStatus(reply, response);
    });
  }
}
