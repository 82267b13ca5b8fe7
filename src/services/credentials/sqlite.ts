/**
 * @fileoverview SQLite token store, encrypted with AES-256-GCM.
 *
 * One row per account label. The row holds a single sealed blob:
 *
 *   iv (12 bytes) | auth tag (16 bytes) | ciphertext
 *
 * The account label is bound as additional authenticated data, so a blob
 * moved to another account's row no longer decrypts.
 */

import Database from 'better-sqlite3';
import crypto from 'crypto';
import path from 'path';
import fs from 'fs';
import type { CredentialStore, StoredCredential } from './types.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

interface TokenRow {
  payload: Buffer;
}

function parseStoredCredential(value: unknown): StoredCredential | null {
  if (!value || typeof value !== 'object') return null;
  if (!('accessToken' in value) || !('refreshToken' in value) || !('expiresAt' in value)) {
    return null;
  }
  const { accessToken, refreshToken, expiresAt } = value;
  if (
    typeof accessToken !== 'string' ||
    typeof refreshToken !== 'string' ||
    typeof expiresAt !== 'number'
  ) {
    return null;
  }
  return { accessToken, refreshToken, expiresAt };
}

export class SqliteCredentialStore implements CredentialStore {
  private readonly db: Database.Database;
  private readonly key: Buffer;
  private readonly selectRow: Database.Statement<[string], TokenRow>;
  private readonly upsertRow: Database.Statement<[string, Buffer, number]>;
  private readonly deleteRow: Database.Statement<[string]>;

  /**
   * @param dbPath SQLite file; its directory is created when missing
   * @param encryptionKey 64 hex characters (32 bytes)
   */
  constructor(dbPath: string, encryptionKey: string) {
    if (!/^[0-9a-fA-F]{64}$/.test(encryptionKey)) {
      throw new Error(
        'CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string (32 bytes)'
      );
    }
    this.key = Buffer.from(encryptionKey, 'hex');

    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS google_tokens (
        account TEXT PRIMARY KEY,
        payload BLOB NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);

    this.selectRow = this.db.prepare<[string], TokenRow>(
      'SELECT payload FROM google_tokens WHERE account = ?'
    );
    this.upsertRow = this.db.prepare<[string, Buffer, number]>(
      `INSERT INTO google_tokens (account, payload, updated_at) VALUES (?, ?, ?)
       ON CONFLICT (account) DO UPDATE SET
         payload = excluded.payload,
         updated_at = excluded.updated_at`
    );
    this.deleteRow = this.db.prepare<[string]>('DELETE FROM google_tokens WHERE account = ?');
  }

  private seal(account: string, plaintext: string): Buffer {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
    cipher.setAAD(Buffer.from(account, 'utf8'));
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]);
  }

  /** Null when the blob is truncated, tampered with, or sealed under another key or account. */
  private open(account: string, payload: Buffer): string | null {
    if (payload.length < IV_LENGTH + TAG_LENGTH) return null;
    const iv = payload.subarray(0, IV_LENGTH);
    const tag = payload.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const ciphertext = payload.subarray(IV_LENGTH + TAG_LENGTH);

    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
      decipher.setAAD(Buffer.from(account, 'utf8'));
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch {
      return null;
    }
  }

  async get(account: string): Promise<StoredCredential | null> {
    const row = this.selectRow.get(account);
    if (!row) return null;

    const plaintext = this.open(account, row.payload);
    if (plaintext === null) return null;

    try {
      return parseStoredCredential(JSON.parse(plaintext));
    } catch {
      return null;
    }
  }

  async set(account: string, credential: StoredCredential): Promise<void> {
    const payload = this.seal(account, JSON.stringify(credential));
    this.upsertRow.run(account, payload, Date.now());
  }

  async delete(account: string): Promise<void> {
    this.deleteRow.run(account);
  }

  close(): void {
    this.db.close();
  }
}
