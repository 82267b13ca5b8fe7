/**
 * @fileoverview Google OAuth token storage.
 *
 * One token record per account label (GOOGLE_ACCOUNT). Implementations
 * handle encryption; callers work with plain tokens.
 */

/**
 * OAuth tokens stored for an account.
 */
export interface StoredCredential {
  accessToken: string;
  refreshToken: string;
  expiresAt: number; // Unix timestamp in milliseconds
}

export interface CredentialStore {
  /** @returns the account's tokens, or null when it never authorized. */
  get(account: string): Promise<StoredCredential | null>;

  /** Store tokens for an account, replacing any previous record. */
  set(account: string, credential: StoredCredential): Promise<void>;

  /** Forget an account's tokens. No-op when none are stored. */
  delete(account: string): Promise<void>;
}
