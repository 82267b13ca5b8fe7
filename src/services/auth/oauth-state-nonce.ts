/**
 * @fileoverview One-time OAuth state nonce store.
 *
 * Tracks short-lived OAuth state nonces to prevent replay of callback URLs.
 * The consent flow lives inside a single CLI process, so nonces are kept in
 * memory only.
 */

import crypto from 'crypto';

/** How long a consent link stays valid. */
export const STATE_EXPIRY_MS = 10 * 60 * 1000;

const nonces = new Map<string, number>();

function prune(): void {
  const now = Date.now();
  for (const [nonce, expiresAt] of nonces.entries()) {
    if (expiresAt < now) {
      nonces.delete(nonce);
    }
  }
}

/**
 * Create and register a fresh state nonce.
 */
export function issueOAuthStateNonce(): string {
  prune();
  const nonce = crypto.randomBytes(16).toString('base64url');
  nonces.set(nonce, Date.now() + STATE_EXPIRY_MS);
  return nonce;
}

/**
 * Consume a state nonce. Returns false if missing/expired/already used.
 */
export function consumeOAuthStateNonce(nonce: string): boolean {
  const trimmed = nonce.trim();
  if (!trimmed) return false;
  prune();
  return nonces.delete(trimmed);
}

/**
 * Test/helper utility.
 */
export function clearOAuthStateNonceStore(): void {
  nonces.clear();
}
