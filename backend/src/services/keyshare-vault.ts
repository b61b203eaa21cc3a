/**
 * Key-share vault
 * Holds verified key-shares per asset kind and id
 */

import type { NftKind } from '@keyshare-gate/auth';

export interface StoreOptions {
  /** Replace an existing key-share instead of refusing */
  overwrite?: boolean;
}

export interface KeyshareVault {
  /** Returns false when a key-share exists and overwrite is not set */
  store(kind: NftKind, nftId: number, keyshare: Uint8Array, options?: StoreOptions): Promise<boolean>;
  retrieve(kind: NftKind, nftId: number): Promise<Uint8Array | null>;
  /** The subset of `nftIds` that hold a key-share, in request order */
  heldIds(kind: NftKind, nftIds: readonly number[]): Promise<number[]>;
}

export class InMemoryKeyshareVault implements KeyshareVault {
  private readonly entries = new Map<string, Uint8Array>();

  private static keyOf(kind: NftKind, nftId: number): string {
    return `${kind}:${nftId}`;
  }

  async store(kind: NftKind, nftId: number, keyshare: Uint8Array, options: StoreOptions = {}): Promise<boolean> {
    const key = InMemoryKeyshareVault.keyOf(kind, nftId);
    if (this.entries.has(key) && !options.overwrite) {
      return false;
    }
    this.entries.set(key, Uint8Array.from(keyshare));
    return true;
  }

  async retrieve(kind: NftKind, nftId: number): Promise<Uint8Array | null> {
    const stored = this.entries.get(InMemoryKeyshareVault.keyOf(kind, nftId));
    return stored ? Uint8Array.from(stored) : null;
  }

  async heldIds(kind: NftKind, nftIds: readonly number[]): Promise<number[]> {
    return nftIds.filter((nftId) => this.entries.has(InMemoryKeyshareVault.keyOf(kind, nftId)));
  }
}
