/**
 * @keyshare-gate/auth - Delegation chain verification
 *
 * A store request carries two signed fields: the owner signs a grant naming a
 * signer (`signer_address` -> `signersig`), and that signer signs the data
 * (`data` -> `signature`). A retrieve request carries a single field signed by
 * the requester. Each verifier walks
 *
 *   Parsed -> SignerValid -> SignerSigOk -> DataSigOk -> OwnershipOk -> Accepted
 *
 * and stops at the first rejection. Signatures always cover the raw field as
 * received; parsing works on the unwrapped content.
 */

import { RequesterType, type RetrieveKeysharePacket, type StoreKeysharePacket } from '@keyshare-gate/shared';
import { queryChain } from './chain';
import { decodeAccount, parseRetrieveData, parseSigner, parseStoreData } from './codec';
import { logger as defaultLogger } from './logger';
import { authorizeRequester } from './requester';
import { ensureCryptoReady, parseSignature, selectStoreSignature, verifySignature } from './signature';
import { isTokenValid } from './token';
import type {
  AssetRecord,
  AuthLogger,
  ChainHeightOracle,
  ChainQueryOptions,
  NftKind,
  RetrieveKeyshareData,
  Signer,
  StoreKeyshareData,
  VerifierOptions,
} from './types';
import {
  ChainQueryError,
  rejected,
  verified,
  VerificationErrorCode,
  type VerificationError,
  type VerificationResult,
} from './verification_errors';

type Stage = 'Parsed' | 'SignerValid' | 'SignerSigOk' | 'DataSigOk' | 'OwnershipOk' | 'Accepted';

export interface FreeVerifierOptions extends ChainQueryOptions {
  chain: ChainHeightOracle;
}

function reached(log: AuthLogger, flow: string, stage: Stage, nftId?: number): void {
  log.debug({ flow, stage, nftId }, 'Delegation chain advanced');
}

function refuse<T>(log: AuthLogger, flow: string, error: VerificationError): VerificationResult<T> {
  log.debug({ flow, code: error.code }, 'Delegation chain rejected');
  return rejected(error);
}

/**
 * Chain failures abort the flow without judging the request
 */
async function withChainGuard<T>(
  log: AuthLogger,
  flow: string,
  run: () => Promise<VerificationResult<T>>
): Promise<VerificationResult<T>> {
  await ensureCryptoReady();

  try {
    return await run();
  } catch (error) {
    if (error instanceof ChainQueryError) {
      return refuse(log, flow, {
        code: VerificationErrorCode.CHAIN_QUERY_FAILED,
        operation: error.operation,
        message: error.message,
      });
    }
    throw error;
  }
}

function kindMismatch(record: AssetRecord, nftType: NftKind): VerificationError | null {
  switch (nftType) {
    case 'secret-nft':
      return record.isSecret ? null : { code: VerificationErrorCode.ID_IS_NOT_SECRET_NFT };
    case 'capsule':
      return record.isCapsule ? null : { code: VerificationErrorCode.ID_IS_NOT_CAPSULE };
  }
}

function currentBlock(chain: ChainHeightOracle, options: ChainQueryOptions): Promise<number> {
  return queryChain('currentFinalizedBlock', () => chain.currentFinalizedBlock(), options);
}

/**
 * Steps shared by the paid and free store flows: the owner's grant and the
 * signer's signature over the data. Returns the signer-window height so the
 * caller can check the data token against the same block.
 */
async function verifyStoreSignatures(
  packet: StoreKeysharePacket,
  chain: ChainHeightOracle,
  options: ChainQueryOptions,
  log: AuthLogger,
  flow: string
): Promise<VerificationResult<{ signer: Signer; data: StoreKeyshareData; height: number }>> {
  const signer = parseSigner(packet.signer_address);
  if (!signer.ok) {
    return refuse(log, flow, signer.error);
  }
  reached(log, flow, 'Parsed');

  const height = await currentBlock(chain, options);
  if (!isTokenValid(signer.value.authToken, height)) {
    return refuse(log, flow, { code: VerificationErrorCode.EXPIRED_SIGNER });
  }
  reached(log, flow, 'SignerValid');

  const ownerKey = decodeAccount(packet.owner_address);
  if (!ownerKey) {
    return refuse(log, flow, { code: VerificationErrorCode.INVALID_OWNER_ADDRESS });
  }

  const signerSig = selectStoreSignature(packet, 'signer');
  if (!signerSig.ok) {
    return refuse(log, flow, { code: VerificationErrorCode.INVALID_SIGNER_SIG, reason: signerSig.reason });
  }

  if (!verifySignature(signerSig.signature, packet.signer_address, ownerKey, log)) {
    return refuse(log, flow, { code: VerificationErrorCode.SIGNER_VERIFICATION_FAILED });
  }
  reached(log, flow, 'SignerSigOk');

  const data = parseStoreData(packet.data);
  if (!data.ok) {
    return refuse(log, flow, data.error);
  }

  const dataSig = selectStoreSignature(packet, 'owner');
  if (!dataSig.ok) {
    return refuse(log, flow, { code: VerificationErrorCode.INVALID_DATA_SIG, reason: dataSig.reason });
  }

  if (!verifySignature(dataSig.signature, packet.data, signer.value.publicKey, log)) {
    return refuse(log, flow, { code: VerificationErrorCode.DATA_VERIFICATION_FAILED });
  }
  reached(log, flow, 'DataSigOk', data.value.nftId);

  return verified({ signer: signer.value, data: data.value, height });
}

/**
 * Verify a store request for an asset of kind `nftType`
 *
 * On success the returned data holds the key-share to persist.
 */
export async function verifyStoreRequest(
  packet: StoreKeysharePacket,
  nftType: NftKind,
  options: VerifierOptions
): Promise<VerificationResult<StoreKeyshareData>> {
  const log = options.logger ?? defaultLogger;
  const flow = `store:${nftType}`;

  return withChainGuard<StoreKeyshareData>(log, flow, async () => {
    const signed = await verifyStoreSignatures(packet, options.chain, options, log, flow);
    if (!signed.ok) {
      return signed;
    }

    const { data, height } = signed.value;

    const record = await queryChain('assetRecord', () => options.chain.assetRecord(data.nftId), options);
    if (!record) {
      return refuse(log, flow, { code: VerificationErrorCode.INVALID_NFT_ID });
    }

    const mismatch = kindMismatch(record, nftType);
    if (mismatch) {
      return refuse(log, flow, mismatch);
    }

    if (!isTokenValid(data.authToken, height)) {
      return refuse(log, flow, { code: VerificationErrorCode.EXPIRED_DATA });
    }

    const owns = await authorizeRequester(
      packet.owner_address,
      data.nftId,
      record.owner,
      RequesterType.OWNER,
      options
    );
    if (!owns) {
      return refuse(log, flow, { code: VerificationErrorCode.OWNERSHIP_VERIFICATION_FAILED });
    }
    reached(log, flow, 'OwnershipOk', data.nftId);

    reached(log, flow, 'Accepted', data.nftId);
    return verified(data);
  });
}

/**
 * Verify a retrieve request for an asset of kind `nftType`
 */
export async function verifyRetrieveRequest(
  packet: RetrieveKeysharePacket,
  nftType: NftKind,
  options: VerifierOptions
): Promise<VerificationResult<RetrieveKeyshareData>> {
  const log = options.logger ?? defaultLogger;
  const flow = `retrieve:${nftType}`;

  return withChainGuard<RetrieveKeyshareData>(log, flow, async () => {
    const signed = verifyRetrieveSignature(packet, log, flow);
    if (!signed.ok) {
      return signed;
    }

    const data = signed.value;

    const record = await queryChain('assetRecord', () => options.chain.assetRecord(data.nftId), options);
    if (!record) {
      return refuse(log, flow, { code: VerificationErrorCode.INVALID_NFT_ID });
    }

    const mismatch = kindMismatch(record, nftType);
    if (mismatch) {
      return refuse(log, flow, mismatch);
    }

    const height = await currentBlock(options.chain, options);
    if (!isTokenValid(data.authToken, height)) {
      return refuse(log, flow, { code: VerificationErrorCode.EXPIRED_DATA });
    }

    const authorized = await authorizeRequester(
      packet.requester_address,
      data.nftId,
      record.owner,
      packet.requester_type,
      options
    );
    if (!authorized) {
      return refuse(log, flow, { code: VerificationErrorCode.REQUESTER_VERIFICATION_FAILED });
    }
    reached(log, flow, 'OwnershipOk', data.nftId);

    reached(log, flow, 'Accepted', data.nftId);
    return verified(data);
  });
}

function verifyRetrieveSignature(
  packet: RetrieveKeysharePacket,
  log: AuthLogger,
  flow: string
): VerificationResult<RetrieveKeyshareData> {
  const data = parseRetrieveData(packet.data);
  if (!data.ok) {
    return refuse(log, flow, data.error);
  }
  reached(log, flow, 'Parsed', data.value.nftId);

  const requesterKey = decodeAccount(packet.requester_address);
  if (!requesterKey) {
    return refuse(log, flow, { code: VerificationErrorCode.INVALID_OWNER_ADDRESS });
  }

  const signature = parseSignature(packet.signature);
  if (!signature.ok) {
    return refuse(log, flow, { code: VerificationErrorCode.INVALID_SIGNER_SIG, reason: signature.reason });
  }

  if (!verifySignature(signature.signature, packet.data, requesterKey, log)) {
    return refuse(log, flow, { code: VerificationErrorCode.SIGNER_VERIFICATION_FAILED });
  }
  reached(log, flow, 'DataSigOk', data.value.nftId);

  return verified(data.value);
}

/**
 * Store flow without chain state: signatures and the signer window only
 */
export async function verifyFreeStoreRequest(
  packet: StoreKeysharePacket,
  options: FreeVerifierOptions
): Promise<VerificationResult<StoreKeyshareData>> {
  const log = options.logger ?? defaultLogger;
  const flow = 'store:free';

  return withChainGuard<StoreKeyshareData>(log, flow, async () => {
    const signed = await verifyStoreSignatures(packet, options.chain, options, log, flow);
    if (!signed.ok) {
      return signed;
    }

    reached(log, flow, 'Accepted', signed.value.data.nftId);
    return verified(signed.value.data);
  });
}

/**
 * Retrieve flow without chain state: the requester's signature and the data window
 */
export async function verifyFreeRetrieveRequest(
  packet: RetrieveKeysharePacket,
  options: FreeVerifierOptions
): Promise<VerificationResult<RetrieveKeyshareData>> {
  const log = options.logger ?? defaultLogger;
  const flow = 'retrieve:free';

  return withChainGuard<RetrieveKeyshareData>(log, flow, async () => {
    const signed = verifyRetrieveSignature(packet, log, flow);
    if (!signed.ok) {
      return signed;
    }

    const data = signed.value;
    const height = await currentBlock(options.chain, options);
    if (!isTokenValid(data.authToken, height)) {
      return refuse(log, flow, { code: VerificationErrorCode.EXPIRED_DATA });
    }

    reached(log, flow, 'Accepted', data.nftId);
    return verified(data);
  });
}
