import { afterEach, beforeAll, beforeEach, describe, expect, test } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import type { FastifyInstance } from 'fastify';
import { stringToU8a, u8aToHex } from '@polkadot/util';
import { RequesterType } from '@keyshare-gate/shared';
import { MaintenanceStatus, NOT_IN_ENCLAVE_SENTINEL, sha256Hex } from '@keyshare-gate/auth';
import { createAccounts, FakeChain, sign, type TestAccounts } from '@keyshare-gate/auth/testing';
import { buildServer } from '../app';
import { InMemoryKeyshareVault } from '../services/keyshare-vault';
import { retrievePacket, storePacket } from './helpers/chain';

const ENCLAVE_ID = 'enclave-test';

let accounts: TestAccounts;
let chain: FakeChain;
let vault: InMemoryKeyshareVault;
let maintenance: MaintenanceStatus;
let deviceRoot: string;
let app: FastifyInstance;

beforeAll(async () => {
  accounts = await createAccounts();
});

beforeEach(async () => {
  chain = new FakeChain();
  chain.assets.set(163, { owner: accounts.owner.address, isSecret: true, isCapsule: false });
  chain.assets.set(164, { owner: accounts.owner.address, isSecret: true, isCapsule: false });
  chain.assets.set(7, { owner: accounts.owner.address, isSecret: false, isCapsule: true });
  vault = new InMemoryKeyshareVault();
  maintenance = new MaintenanceStatus();
  deviceRoot = await mkdtemp(path.join(tmpdir(), 'keyshare-routes-'));

  app = await buildServer({
    chain,
    vault,
    maintenance,
    enclaveId: ENCLAVE_ID,
    adminWhitelist: [accounts.admin.address],
    attestation: { deviceRoot, quotePath: path.join(deviceRoot, 'out', 'enclave.quote') },
    queryTimeoutMs: 50,
    logLevel: 'silent',
  });
});

afterEach(async () => {
  await app.close();
  await rm(deviceRoot, { recursive: true, force: true });
});

describe('GET /api/health', () => {
  test('reports ok and the enclave id', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', enclave_id: ENCLAVE_ID, maintenance: '' });
  });

  test('reports maintenance', async () => {
    await maintenance.set('Backup running');

    const response = await app.inject({ method: 'GET', url: '/api/health' });

    expect(response.json()).toMatchObject({ status: 'maintenance', maintenance: 'Backup running' });
  });
});

describe('secret-nft key-shares', () => {
  test('stores once and refuses a second store', async () => {
    const first = await app.inject({
      method: 'POST',
      url: '/api/secret-nft/store-keyshare',
      payload: storePacket(accounts, 163, 'keyshareA'),
    });
    const second = await app.inject({
      method: 'POST',
      url: '/api/secret-nft/store-keyshare',
      payload: storePacket(accounts, 163, 'keyshareB'),
    });

    expect(first.statusCode).toBe(200);
    expect(first.json()).toEqual({
      status: 'STORESUCCESS',
      nft_id: 163,
      enclave_id: ENCLAVE_ID,
      description: 'TEE Key-share NFTSTORE: Key-share is successfully stored.',
    });
    expect(second.statusCode).toBe(409);
    expect(second.json()).toMatchObject({ status: 'NFTIDEXISTS', nft_id: 163 });
  });

  test('returns the stored key-share to its owner', async () => {
    await app.inject({
      method: 'POST',
      url: '/api/secret-nft/store-keyshare',
      payload: storePacket(accounts, 163, 'keyshareA'),
    });

    const response = await app.inject({
      method: 'POST',
      url: '/api/secret-nft/retrieve-keyshare',
      payload: retrievePacket(accounts.owner, RequesterType.OWNER, 163),
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'RETRIEVESUCCESS',
      nft_id: 163,
      enclave_id: ENCLAVE_ID,
      description: 'TEE Key-share NFTRETRIEVE: Key-share is successfully retrieved.',
      keyshare_data: 'keyshareA',
    });
  });

  test('reports a missing key-share', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/secret-nft/retrieve-keyshare',
      payload: retrievePacket(accounts.owner, RequesterType.OWNER, 164),
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ status: 'KEYNOTEXIST', nft_id: 164 });
  });

  test('refuses a requester without a relationship to the asset', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/secret-nft/retrieve-keyshare',
      payload: retrievePacket(accounts.stranger, RequesterType.OWNER, 163),
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({
      status: 'REQUESTERVERIFICATIONFAILED',
      nft_id: 163,
      enclave_id: ENCLAVE_ID,
      description: 'TEE Key-share NFTRETRIEVE: The requester is not either owner, delegatee or rentee.',
    });
  });

  test('reports a structurally invalid body as a data format error', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/secret-nft/retrieve-keyshare',
      payload: { data: '163_995_20' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      status: 'INVALIDDATAFORMAT',
      nft_id: 163,
      enclave_id: ENCLAVE_ID,
      description: 'TEE Key-share NFTRETRIEVE: Failed to parse request body, requester_address: Required',
    });
  });

  test('rejects a body that is not JSON', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/secret-nft/retrieve-keyshare',
      headers: { 'content-type': 'application/json' },
      payload: 'not json',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'INVALID_REQUEST' });
  });

  test('reports chain outages as oracle failures', async () => {
    chain.assetRecord = async () => {
      throw new Error('rpc down');
    };

    const response = await app.inject({
      method: 'POST',
      url: '/api/secret-nft/retrieve-keyshare',
      payload: retrievePacket(accounts.owner, RequesterType.OWNER, 163),
    });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({
      status: 'ORACLEFAILURE',
      description: 'TEE Key-share NFTRETRIEVE: Chain query failed, assetRecord: rpc down',
    });
  });

  test('refuses key-share traffic during maintenance', async () => {
    await maintenance.set('Backup running');

    const response = await app.inject({
      method: 'POST',
      url: '/api/secret-nft/store-keyshare',
      payload: storePacket(accounts, 163, 'keyshareA'),
    });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      error: 'MAINTENANCE',
      code: 'MAINTENANCE',
      message: 'Enclave is in maintenance mode: Backup running',
    });
    await expect(vault.retrieve('secret-nft', 163)).resolves.toBeNull();
  });
});

describe('capsule key-shares', () => {
  test('replaces the key-share on a second set', async () => {
    for (const keyshare of ['capsuleA', 'capsuleB']) {
      const response = await app.inject({
        method: 'POST',
        url: '/api/capsule-nft/set-keyshare',
        payload: storePacket(accounts, 7, keyshare),
      });
      expect(response.statusCode).toBe(200);
    }

    const response = await app.inject({
      method: 'POST',
      url: '/api/capsule-nft/retrieve-keyshare',
      payload: retrievePacket(accounts.owner, RequesterType.NONE, 7),
    });

    expect(response.json()).toMatchObject({ status: 'RETRIEVESUCCESS', keyshare_data: 'capsuleB' });
  });

  test('refuses a secret-nft id on the capsule route', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/capsule-nft/set-keyshare',
      payload: storePacket(accounts, 163, 'capsuleA'),
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toMatchObject({
      status: 'IDISNOTACAPSULE',
      description: 'TEE Key-share CAPSULESET: The nft-id is not a capsule.',
    });
  });
});

describe('POST /api/backup/fetch-id', () => {
  function fetchIdPacket(admin: TestAccounts['admin'], ids: string) {
    const authToken = JSON.stringify({ block_number: 998, block_validation: 10, data_hash: sha256Hex(ids) });
    return {
      admin_address: admin.address,
      nftid_vec: ids,
      auth_token: authToken,
      signature: sign(admin, authToken),
    };
  }

  test('returns the requested ids the vault holds', async () => {
    await vault.store('secret-nft', 163, stringToU8a('keyshareA'));
    await vault.store('capsule', 7, stringToU8a('capsuleA'));

    const response = await app.inject({
      method: 'POST',
      url: '/api/backup/fetch-id',
      payload: fetchIdPacket(accounts.admin, '[163,164,7]'),
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ enclave_id: ENCLAVE_ID, nft_ids: [163], capsule_ids: [7] });
    expect(maintenance.isUnderMaintenance()).toBe(false);
  });

  test('refuses accounts outside the whitelist', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/backup/fetch-id',
      payload: fetchIdPacket(accounts.stranger, '[163]'),
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({ error: `Requester is not whitelisted : ${accounts.stranger.address}` });
  });

  test('rejects a malformed body', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/backup/fetch-id',
      payload: { admin_address: accounts.admin.address },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      error: 'INVALID_REQUEST',
      code: 'INVALID_REQUEST',
      message: 'Malformed fetch-id request',
    });
  });
});

describe('GET /api/quote', () => {
  test('returns the sentinel outside an enclave', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/quote' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      enclave_id: ENCLAVE_ID,
      quote: u8aToHex(stringToU8a(NOT_IN_ENCLAVE_SENTINEL)),
    });
  });
});
