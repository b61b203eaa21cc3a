import { describe, expect, test } from 'vitest';
import { RequesterType, RetrieveKeysharePacketSchema, StoreKeysharePacketSchema } from '../index';

describe('@keyshare-gate/shared', () => {
  test('exports package successfully', async () => {
    const module = await import('../index');
    expect(module).toBeDefined();
  });

  test('accepts a well-formed retrieve packet', () => {
    const parsed = RetrieveKeysharePacketSchema.safeParse({
      requester_address: '5GrwvaEF5zXb26Fz9rcQpDWS57CtERHpNehXCPcNoHGKutQY',
      requester_type: 'DELEGATEE',
      data: '163_1000_10000',
      signature: '0x00',
    });

    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.data.requester_type).toBe(RequesterType.DELEGATEE);
    }
  });

  test('rejects an unknown requester type', () => {
    const parsed = RetrieveKeysharePacketSchema.safeParse({
      requester_address: '5GrwvaEF5zXb26Fz9rcQpDWS57CtERHpNehXCPcNoHGKutQY',
      requester_type: 'ADMIN',
      data: '163_1000_10000',
      signature: '0x00',
    });

    expect(parsed.success).toBe(false);
  });

  test('rejects a store packet without owner address', () => {
    const parsed = StoreKeysharePacketSchema.safeParse({
      signer_address: 'x',
      signersig: 'x',
      data: 'x',
      signature: 'x',
    });

    expect(parsed.success).toBe(false);
  });
});
