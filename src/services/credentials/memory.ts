/**
 * @fileoverview In-memory credential store.
 *
 * Selected with CREDENTIAL_STORE_PROVIDER=memory. Nothing is encrypted or
 * persisted, so a fresh process always starts unauthorized.
 */

import type { CredentialStore, StoredCredential } from './types.js';

export class MemoryCredentialStore implements CredentialStore {
  private readonly tokens = new Map<string, StoredCredential>();

  async get(account: string): Promise<StoredCredential | null> {
    const stored = this.tokens.get(account);
    return stored ? { ...stored } : null;
  }

  async set(account: string, credential: StoredCredential): Promise<void> {
    this.tokens.set(account, { ...credential });
  }

  async delete(account: string): Promise<void> {
    this.tokens.delete(account);
  }
}
