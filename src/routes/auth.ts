/**
 * @fileoverview Google OAuth routes for the local consent flow.
 *
 * Flow:
 * 1. `npm run auth` starts a local server and prints /auth/google
 * 2. /auth/google issues a one-time state nonce and redirects to Google consent
 * 3. Google redirects back to /auth/google/callback
 * 4. We exchange the code, store the tokens for the configured account
 */

import { Router } from 'express';
import { createOAuth2Client } from '../domains/google-core/providers/auth.js';
import { getCredentialStore } from '../services/credentials/index.js';
import {
  consumeOAuthStateNonce,
  issueOAuthStateNonce,
} from '../services/auth/oauth-state-nonce.js';
import { createLogger } from '../utils/observability/index.js';
import { describeError } from '../utils/errors.js';

/** Full Drive access: the tool reads source trees and writes copies anywhere. */
export const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive'];

const log = createLogger({ domain: 'oauth' });

export interface AuthRouterOptions {
  /** Credential key the tokens are stored under. */
  account: string;
  /** Called once tokens are stored. */
  onAuthorized?: () => void;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value ? value : undefined;
}

/**
 * Build the consent + callback router for one account.
 */
export function createAuthRouter(options: AuthRouterOptions): Router {
  const router = Router();

  /**
   * GET /auth/google
   * Initiates OAuth flow - redirects to Google consent screen.
   */
  router.get('/auth/google', (_req, res) => {
    const oauth2Client = createOAuth2Client();
    const authUrl = oauth2Client.generateAuthUrl({
      access_type: 'offline', // Get refresh token
      scope: DRIVE_SCOPES,
      state: issueOAuthStateNonce(),
      prompt: 'consent', // Force consent to always get refresh token
    });

    res.redirect(authUrl);
  });

  /**
   * GET /auth/google/callback
   * Handles OAuth callback from Google.
   */
  router.get('/auth/google/callback', async (req, res) => {
    const code = queryString(req.query.code);
    const state = queryString(req.query.state);
    const error = queryString(req.query.error);

    if (error) {
      log.info('oauth_declined', { reason: error });
      res.send(pageHtml('Authorization declined', 'Run the auth command again to retry.'));
      return;
    }

    if (!code || !state) {
      res.status(400).send(pageHtml('Invalid request', 'Missing code or state parameter.'));
      return;
    }

    if (!consumeOAuthStateNonce(state)) {
      res.status(400).send(pageHtml('Link expired', 'Invalid or expired link. Start the auth command again.'));
      return;
    }

    try {
      const oauth2Client = createOAuth2Client();
      const { tokens } = await oauth2Client.getToken(code);

      if (!tokens.access_token || !tokens.refresh_token) {
        throw new Error('Missing tokens in response');
      }

      await getCredentialStore().set(options.account, {
        accessToken: tokens.access_token,
        refreshToken: tokens.refresh_token,
        expiresAt: tokens.expiry_date || Date.now() + 3600000,
      });

      log.info('oauth_completed', { account: options.account });
      res.send(pageHtml('All set!', 'Google Drive is connected. You can close this page.'));
      options.onAuthorized?.();
    } catch (err) {
      log.error('oauth_exchange_failed', { error: describeError(err) });
      res.status(500).send(pageHtml('Connection failed', 'Failed to connect Google account. Please try again.'));
    }
  });

  return router;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function pageHtml(title: string, message: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${escapeHtml(title)}</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 4rem auto; max-width: 28rem; text-align: center; color: #1a1a1a; }
    p { color: #666; }
  </style>
</head>
<body>
  <h1>${escapeHtml(title)}</h1>
  <p>${escapeHtml(message)}</p>
</body>
</html>`;
}
