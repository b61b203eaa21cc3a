/**
 * Delegation chain verification against an in-process chain
 */

import { beforeAll, beforeEach, describe, it, expect } from 'vitest';
import { u8aToString } from '@polkadot/util';
import { RequesterType } from '@keyshare-gate/shared';
import {
  verifyFreeRetrieveRequest,
  verifyFreeStoreRequest,
  verifyRetrieveRequest,
  verifyStoreRequest,
} from '../delegation';
import { SignatureErrorCode, VerificationErrorCode } from '../verification_errors';
import {
  buildRetrievePacket,
  buildStorePacket,
  createAccounts,
  FakeChain,
  sign,
  type StorePacketInput,
  type TestAccounts,
} from '../testing';

const NFT_ID = 163;

let accounts: TestAccounts;
let chain: FakeChain;

beforeAll(async () => {
  accounts = await createAccounts();
});

beforeEach(() => {
  chain = new FakeChain();
  chain.height = 1000;
  chain.assets.set(NFT_ID, { owner: accounts.owner.address, isSecret: true, isCapsule: false });
});

function storeInput(overrides: Partial<StorePacketInput> = {}): StorePacketInput {
  return {
    owner: accounts.owner,
    signer: accounts.signer,
    nftId: NFT_ID,
    keyshare: 'keyshareA',
    signerWindow: [995, 100],
    dataWindow: [998, 10],
    ...overrides,
  };
}

describe('verifyStoreRequest', () => {
  it('accepts a fully delegated store request', async () => {
    const result = await verifyStoreRequest(buildStorePacket(storeInput()), 'secret-nft', { chain });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.nftId).toBe(NFT_ID);
      expect(u8aToString(result.value.keyshare)).toBe('keyshareA');
      expect(result.value.authToken).toEqual({ kind: 'keyshare', blockNumber: 998, blockValidation: 10 });
    }
  });

  it('verifies wrapped fields over the raw wrapped text', async () => {
    const result = await verifyStoreRequest(buildStorePacket(storeInput({ wrapped: true })), 'secret-nft', {
      chain,
    });

    expect(result.ok).toBe(true);
  });

  it('reports an expired data token while the signer is still valid', async () => {
    // data window closes at 980 + 16 + 3; the request arrives one block later
    const packet = buildStorePacket(storeInput({ signerWindow: [900, 200], dataWindow: [980, 16] }));

    const result = await verifyStoreRequest(packet, 'secret-nft', { chain });

    expect(result).toEqual({ ok: false, error: { code: VerificationErrorCode.EXPIRED_DATA } });
  });

  it('reports an expired signer before checking anything else', async () => {
    const packet = buildStorePacket(storeInput({ signerWindow: [1100, 10] }));
    packet.signersig = 'garbage';

    const result = await verifyStoreRequest(packet, 'secret-nft', { chain });

    expect(result).toEqual({ ok: false, error: { code: VerificationErrorCode.EXPIRED_SIGNER } });
  });

  it('refuses a signer given as a short account index', async () => {
    const packet = buildStorePacket(storeInput());
    packet.signer_address = 'F7pv_995_100';

    const result = await verifyStoreRequest(packet, 'secret-nft', { chain });

    expect(result).toEqual({ ok: false, error: { code: VerificationErrorCode.INVALID_SIGNER_ADDRESS } });
  });

  it('rejects a signer the owner did not approve', async () => {
    const packet = buildStorePacket(storeInput());
    packet.signersig = sign(accounts.stranger, packet.signer_address);

    const result = await verifyStoreRequest(packet, 'secret-nft', { chain });

    expect(result).toEqual({ ok: false, error: { code: VerificationErrorCode.SIGNER_VERIFICATION_FAILED } });
  });

  it('rejects data that differs from what the signer signed', async () => {
    const packet = buildStorePacket(storeInput());
    packet.data = `${NFT_ID}_keyshareB_998_10`;

    const result = await verifyStoreRequest(packet, 'secret-nft', { chain });

    expect(result).toEqual({ ok: false, error: { code: VerificationErrorCode.DATA_VERIFICATION_FAILED } });
  });

  it('carries the signature format reason', async () => {
    const packet = buildStorePacket(storeInput());
    packet.signersig = packet.signersig.slice(2);

    const result = await verifyStoreRequest(packet, 'secret-nft', { chain });

    expect(result).toEqual({
      ok: false,
      error: { code: VerificationErrorCode.INVALID_SIGNER_SIG, reason: SignatureErrorCode.PREFIX_ERROR },
    });
  });

  it('rejects a data signature of the wrong length', async () => {
    const packet = buildStorePacket(storeInput());
    packet.signature = '0x1234';

    const result = await verifyStoreRequest(packet, 'secret-nft', { chain });

    expect(result).toEqual({
      ok: false,
      error: { code: VerificationErrorCode.INVALID_DATA_SIG, reason: SignatureErrorCode.LENGTH_ERROR },
    });
  });

  it('rejects an undecodable owner address', async () => {
    const packet = buildStorePacket(storeInput());
    packet.owner_address = 'not-an-address';

    const result = await verifyStoreRequest(packet, 'secret-nft', { chain });

    expect(result).toEqual({ ok: false, error: { code: VerificationErrorCode.INVALID_OWNER_ADDRESS } });
  });

  it('rejects an owner who no longer owns the asset', async () => {
    chain.assets.set(NFT_ID, { owner: accounts.stranger.address, isSecret: true, isCapsule: false });

    const result = await verifyStoreRequest(buildStorePacket(storeInput()), 'secret-nft', { chain });

    expect(result).toEqual({ ok: false, error: { code: VerificationErrorCode.OWNERSHIP_VERIFICATION_FAILED } });
  });

  it('rejects unknown assets and the wrong asset kind', async () => {
    const unknown = await verifyStoreRequest(buildStorePacket(storeInput({ nftId: 999 })), 'secret-nft', { chain });
    const capsule = await verifyStoreRequest(buildStorePacket(storeInput()), 'capsule', { chain });

    expect(unknown).toEqual({ ok: false, error: { code: VerificationErrorCode.INVALID_NFT_ID } });
    expect(capsule).toEqual({ ok: false, error: { code: VerificationErrorCode.ID_IS_NOT_CAPSULE } });
  });

  it('reports a hanging chain as a chain failure, not an expiry', async () => {
    chain.currentFinalizedBlock = () => new Promise<number>(() => undefined);

    const result = await verifyStoreRequest(buildStorePacket(storeInput()), 'secret-nft', {
      chain,
      queryTimeoutMs: 20,
    });

    expect(result).toEqual({
      ok: false,
      error: {
        code: VerificationErrorCode.CHAIN_QUERY_FAILED,
        operation: 'currentFinalizedBlock',
        message: 'currentFinalizedBlock: timed out after 20ms',
      },
    });
  });
});

describe('verifyRetrieveRequest', () => {
  it('lets the owner retrieve as OWNER or NONE', async () => {
    for (const type of [RequesterType.OWNER, RequesterType.NONE]) {
      const packet = buildRetrievePacket(accounts.owner, type, NFT_ID, [998, 10]);
      const result = await verifyRetrieveRequest(packet, 'secret-nft', { chain });

      expect(result).toEqual({
        ok: true,
        value: { nftId: NFT_ID, authToken: { kind: 'keyshare', blockNumber: 998, blockValidation: 10 } },
      });
    }
  });

  it('lets the current delegatee retrieve', async () => {
    chain.delegatees.set(NFT_ID, accounts.delegatee.address);
    const packet = buildRetrievePacket(accounts.delegatee, RequesterType.DELEGATEE, NFT_ID, [998, 10]);

    const result = await verifyRetrieveRequest(packet, 'secret-nft', { chain });

    expect(result.ok).toBe(true);
  });

  it('refuses a delegatee claiming to be a rentee', async () => {
    chain.delegatees.set(NFT_ID, accounts.delegatee.address);
    const packet = buildRetrievePacket(accounts.delegatee, RequesterType.RENTEE, NFT_ID, [998, 10]);

    const result = await verifyRetrieveRequest(packet, 'secret-nft', { chain });

    expect(result).toEqual({ ok: false, error: { code: VerificationErrorCode.REQUESTER_VERIFICATION_FAILED } });
  });

  it('reports an expired request', async () => {
    const packet = buildRetrievePacket(accounts.owner, RequesterType.OWNER, NFT_ID, [900, 10]);

    const result = await verifyRetrieveRequest(packet, 'secret-nft', { chain });

    expect(result).toEqual({ ok: false, error: { code: VerificationErrorCode.EXPIRED_DATA } });
  });

  it('maps signature problems to signer-signature statuses', async () => {
    const tampered = buildRetrievePacket(accounts.owner, RequesterType.OWNER, NFT_ID, [998, 10]);
    tampered.data = `${NFT_ID}_998_11`;
    const short = buildRetrievePacket(accounts.owner, RequesterType.OWNER, NFT_ID, [998, 10]);
    short.signature = '0x1234';

    expect(await verifyRetrieveRequest(tampered, 'secret-nft', { chain })).toEqual({
      ok: false,
      error: { code: VerificationErrorCode.SIGNER_VERIFICATION_FAILED },
    });
    expect(await verifyRetrieveRequest(short, 'secret-nft', { chain })).toEqual({
      ok: false,
      error: { code: VerificationErrorCode.INVALID_SIGNER_SIG, reason: SignatureErrorCode.LENGTH_ERROR },
    });
  });

  it('checks the asset kind', async () => {
    const packet = buildRetrievePacket(accounts.owner, RequesterType.OWNER, NFT_ID, [998, 10]);
    chain.assets.set(NFT_ID, { owner: accounts.owner.address, isSecret: false, isCapsule: true });

    expect(await verifyRetrieveRequest(packet, 'secret-nft', { chain })).toEqual({
      ok: false,
      error: { code: VerificationErrorCode.ID_IS_NOT_SECRET_NFT },
    });
    expect((await verifyRetrieveRequest(packet, 'capsule', { chain })).ok).toBe(true);
  });
});

describe('free variants', () => {
  it('store without chain state still checks the signer window', async () => {
    const fresh = await verifyFreeStoreRequest(buildStorePacket(storeInput({ nftId: 999 })), { chain });
    const stale = await verifyFreeStoreRequest(buildStorePacket(storeInput({ signerWindow: [10, 10] })), { chain });

    expect(fresh.ok).toBe(true);
    expect(stale).toEqual({ ok: false, error: { code: VerificationErrorCode.EXPIRED_SIGNER } });
  });

  it('retrieve without chain state accepts a signed request inside its window', async () => {
    const packet = buildRetrievePacket(accounts.stranger, RequesterType.OWNER, 999, [998, 10]);

    expect(await verifyFreeRetrieveRequest(packet, { chain })).toEqual({
      ok: true,
      value: { nftId: 999, authToken: { kind: 'keyshare', blockNumber: 998, blockValidation: 10 } },
    });
  });

  it('retrieve without chain state refuses a request signed for an old window', async () => {
    const packet = buildRetrievePacket(accounts.owner, RequesterType.OWNER, 5, [1, 1]);

    expect(await verifyFreeRetrieveRequest(packet, { chain })).toEqual({
      ok: false,
      error: { code: VerificationErrorCode.EXPIRED_DATA },
    });
  });

  it('retrieve without chain state checks the signature before the window', async () => {
    const packet = {
      ...buildRetrievePacket(accounts.owner, RequesterType.OWNER, 5, [1, 1]),
      requester_address: accounts.stranger.address,
    };

    expect(await verifyFreeRetrieveRequest(packet, { chain })).toEqual({
      ok: false,
      error: { code: VerificationErrorCode.SIGNER_VERIFICATION_FAILED },
    });
  });

  it('retrieve without chain state reports a height outage', async () => {
    chain.currentFinalizedBlock = async () => {
      throw new Error('rpc down');
    };
    const packet = buildRetrievePacket(accounts.owner, RequesterType.OWNER, 5, [998, 10]);

    expect(await verifyFreeRetrieveRequest(packet, { chain })).toEqual({
      ok: false,
      error: {
        code: VerificationErrorCode.CHAIN_QUERY_FAILED,
        operation: 'currentFinalizedBlock',
        message: 'currentFinalizedBlock: rpc down',
      },
    });
  });
});
