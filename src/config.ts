/**
 * @fileoverview Centralized process configuration.
 *
 * All environment variables are loaded and validated here. The replication
 * plan itself (which folders to copy where) lives in a JSON file, see
 * services/plan/loader.ts.
 *
 * @see .env.example for the supported environment variables
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers: required vs optional
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Return a path that differs between dev and production. */
function dataPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

function credentialProvider(): 'sqlite' | 'memory' {
  return process.env.CREDENTIAL_STORE_PROVIDER === 'memory' ? 'memory' : 'sqlite';
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),

  /** Google OAuth + Drive configuration */
  google: {
    clientId: required('GOOGLE_CLIENT_ID'),
    clientSecret: required('GOOGLE_CLIENT_SECRET'),
    redirectUri: optional('GOOGLE_REDIRECT_URI', 'http://localhost:3000/auth/google/callback'),
    sharedDriveId: process.env.GOOGLE_SHARED_DRIVE_ID,
    /** Key under which tokens are stored; lets one machine hold several accounts. */
    account: optional('GOOGLE_ACCOUNT', 'default'),
    maxRetries: optionalInt('GOOGLE_MAX_RETRIES', 2),
    retryDelayMs: optionalInt('GOOGLE_RETRY_DELAY_MS', 1000),
  },

  /** Credential storage configuration */
  credentials: {
    provider: credentialProvider(),
    sqlitePath: dataPath('CREDENTIAL_STORE_SQLITE_PATH', '/app/data/credentials.db', './data/credentials.db'),
    encryptionKey: required('CREDENTIAL_ENCRYPTION_KEY'),
  },

  /** Replication plan file */
  replication: {
    planPath: optional('REPLICATION_PLAN_PATH', './drive-config.json'),
  },
};

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  // Google OAuth (required for Drive)
  if (!config.google.clientId) errors.push('GOOGLE_CLIENT_ID is required');
  if (!config.google.clientSecret) errors.push('GOOGLE_CLIENT_SECRET is required');
  if (!config.google.account.trim()) errors.push('GOOGLE_ACCOUNT must not be blank');

  // Encryption key validation (only the sqlite store encrypts)
  if (config.credentials.provider === 'sqlite') {
    if (!config.credentials.encryptionKey) {
      errors.push('CREDENTIAL_ENCRYPTION_KEY is required');
    } else if (!/^[0-9a-fA-F]{64}$/.test(config.credentials.encryptionKey)) {
      errors.push('CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string (32 bytes)');
    }
  }

  // Numeric bounds
  if (Number.isNaN(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (Number.isNaN(config.google.maxRetries) || config.google.maxRetries < 0 || config.google.maxRetries > 10) {
    errors.push(`GOOGLE_MAX_RETRIES must be 0-10, got ${config.google.maxRetries}`);
  }
  if (Number.isNaN(config.google.retryDelayMs) || config.google.retryDelayMs < 0) {
    errors.push(`GOOGLE_RETRY_DELAY_MS must be >= 0, got ${config.google.retryDelayMs}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
