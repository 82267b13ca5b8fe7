/**
 * @fileoverview Shared Google OAuth utilities.
 *
 * Centralizes OAuth2 client creation, token refresh, retry logic, and
 * scope-error handling used by the Drive storage adapter.
 */

import { OAuth2Client } from 'google-auth-library';
import config from '../../../config.js';
import { getCredentialStore } from '../../../services/credentials/index.js';
import { AuthRequiredError } from '../../../providers/auth.js';
import { createLogger } from '../../../utils/observability/index.js';
import { describeError } from '../../../utils/errors.js';

/** Token refresh threshold: refresh if expiring within 5 minutes. */
const REFRESH_THRESHOLD_MS = 5 * 60 * 1000;

const log = createLogger({ domain: 'google-auth' });

/**
 * Cache for authenticated OAuth2 clients.
 * Entries are evicted when their token is within the refresh threshold.
 */
const clientCache = new Map<string, { client: OAuth2Client; expiresAt: number }>();

/**
 * Clear the client cache (used by tests to avoid cross-test pollution).
 */
export function clearClientCache(): void {
  clientCache.clear();
}

/**
 * Create a bare OAuth2 client (no credentials set).
 */
export function createOAuth2Client(): OAuth2Client {
  return new OAuth2Client(
    config.google.clientId,
    config.google.clientSecret,
    config.google.redirectUri
  );
}

/**
 * Refresh an expired access token using the refresh token.
 */
export async function refreshAccessToken(
  refreshToken: string
): Promise<{ accessToken: string; expiresAt: number }> {
  const oauth2Client = createOAuth2Client();
  oauth2Client.setCredentials({ refresh_token: refreshToken });

  const { credentials } = await oauth2Client.refreshAccessToken();

  if (!credentials.access_token) {
    throw new Error('Failed to refresh access token');
  }

  return {
    accessToken: credentials.access_token,
    expiresAt: credentials.expiry_date || Date.now() + 3600000,
  };
}

/**
 * Get a valid OAuth2 client for an account.
 * Automatically refreshes the token if it's about to expire.
 *
 * @throws AuthRequiredError if no credentials exist or refresh fails
 */
export async function getAuthenticatedClient(account: string): Promise<OAuth2Client> {
  const cached = clientCache.get(account);
  if (cached && cached.expiresAt > Date.now() + REFRESH_THRESHOLD_MS) {
    return cached.client;
  }

  const store = getCredentialStore();
  let creds = await store.get(account);

  if (!creds) {
    throw new AuthRequiredError(account);
  }

  if (creds.expiresAt < Date.now() + REFRESH_THRESHOLD_MS) {
    try {
      const refreshed = await refreshAccessToken(creds.refreshToken);
      creds = {
        ...creds,
        accessToken: refreshed.accessToken,
        expiresAt: refreshed.expiresAt,
      };
      await store.set(account, creds);
      log.info('token_refreshed', { account });
    } catch (error) {
      log.warn('token_refresh_failed', { account, error: describeError(error) });
      await store.delete(account);
      clientCache.delete(account);
      throw new AuthRequiredError(account);
    }
  }

  const oauth2Client = createOAuth2Client();
  oauth2Client.setCredentials({ access_token: creds.accessToken });

  clientCache.set(account, { client: oauth2Client, expiresAt: creds.expiresAt });

  return oauth2Client;
}

/**
 * Extract the HTTP status from a Google API error, if there is one.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if (!('response' in error)) return undefined;
  const response = error.response;
  if (response && typeof response === 'object' && 'status' in response && typeof response.status === 'number') {
    return response.status;
  }
  return undefined;
}

/**
 * Check if an error is retryable (429 or 5xx).
 */
export function isRetryableError(error: unknown): boolean {
  const status = getErrorStatus(error);
  if (status === undefined) return false;
  return status === 429 || (status >= 500 && status < 600);
}

/**
 * Check if an error is due to insufficient OAuth scopes.
 */
export function isInsufficientScopesError(error: unknown): boolean {
  const message = describeError(error);
  return message.includes('insufficient authentication scopes') ||
         message.includes('Insufficient Permission');
}

/**
 * Handle a scope error by deleting credentials and throwing AuthRequiredError.
 */
export async function handleScopeError(
  error: unknown,
  account: string
): Promise<never> {
  log.warn('scope_missing', { account, error: describeError(error) });

  const store = getCredentialStore();
  await store.delete(account);
  clientCache.delete(account);
  throw new AuthRequiredError(account);
}

/**
 * Sleep for a specified duration (used between retries).
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic and scope-error handling.
 *
 * Retries on 429/5xx errors with linear backoff.
 * Immediately converts scope errors to AuthRequiredError (no retry).
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  account?: string,
  operation = 'google_api_call'
): Promise<T> {
  const maxRetries = config.google.maxRetries;
  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (account && isInsufficientScopesError(error)) {
        await handleScopeError(error, account);
      }

      lastError = error;
      if (attempt < maxRetries && isRetryableError(error)) {
        log.warn('api_retry', {
          operation,
          attempt: attempt + 1,
          maxRetries,
          status: getErrorStatus(error),
        });
        await sleep(config.google.retryDelayMs * (attempt + 1));
      } else {
        throw error;
      }
    }
  }
  throw lastError;
}
