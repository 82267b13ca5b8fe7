/**
 * @fileoverview Credential store factory.
 *
 * Returns the appropriate credential store based on configuration.
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { CredentialStore } from './types.js';
import { SqliteCredentialStore } from './sqlite.js';
import { MemoryCredentialStore } from './memory.js';

export type { CredentialStore, StoredCredential } from './types.js';

let instance: CredentialStore | null = null;

/**
 * Get the credential store instance.
 *
 * Returns a singleton based on CREDENTIAL_STORE_PROVIDER config:
 * - 'sqlite': SQLite with encryption (default)
 * - 'memory': In-memory store (for tests only)
 */
export function getCredentialStore(): CredentialStore {
  if (instance) {
    return instance;
  }

  if (config.credentials.provider === 'memory') {
    const store = new MemoryCredentialStore();
    instance = store;
    return store;
  }

  if (!config.credentials.encryptionKey) {
    throw new Error(
      'CREDENTIAL_ENCRYPTION_KEY is required for sqlite credential store'
    );
  }
  const store = new SqliteCredentialStore(
    config.credentials.sqlitePath,
    config.credentials.encryptionKey
  );
  instance = store;
  return store;
}

/**
 * Reset the credential store instance, closing it when it holds a database.
 * Useful for tests to get a fresh store.
 */
export function resetCredentialStore(): void {
  if (instance instanceof SqliteCredentialStore) {
    instance.close();
  }
  instance = null;
}
