import { afterEach, describe, expect, it, vi } from 'vitest';

const REQUIRED_ENV: Record<string, string> = {
  GOOGLE_CLIENT_ID: 'test-client-id',
  GOOGLE_CLIENT_SECRET: 'test-client-secret',
  CREDENTIAL_STORE_PROVIDER: 'sqlite',
  CREDENTIAL_ENCRYPTION_KEY: '0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef',
};

const SNAPSHOT_KEYS = new Set([
  ...Object.keys(REQUIRED_ENV),
  'PORT',
  'GOOGLE_ACCOUNT',
  'GOOGLE_MAX_RETRIES',
  'REPLICATION_PLAN_PATH',
]);

const ORIGINAL_ENV = new Map<string, string | undefined>(
  Array.from(SNAPSHOT_KEYS).map((key) => [key, process.env[key]])
);

async function importConfigWith(overrides: Record<string, string | undefined>) {
  vi.resetModules();

  for (const [key, value] of Object.entries({ ...REQUIRED_ENV, ...overrides })) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  return import('../../src/config.js');
}

describe('validateConfig', () => {
  afterEach(() => {
    for (const key of SNAPSHOT_KEYS) {
      const original = ORIGINAL_ENV.get(key);
      if (original === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = original;
      }
    }
    vi.resetModules();
  });

  it('accepts a complete configuration', async () => {
    const { validateConfig } = await importConfigWith({});
    expect(() => validateConfig()).not.toThrow();
  });

  it('requires Google OAuth client credentials', async () => {
    const { validateConfig } = await importConfigWith({
      GOOGLE_CLIENT_ID: undefined,
      GOOGLE_CLIENT_SECRET: undefined,
    });

    expect(() => validateConfig()).toThrow(/GOOGLE_CLIENT_ID is required\n {2}- GOOGLE_CLIENT_SECRET is required/);
  });

  it('rejects a malformed encryption key for the sqlite store', async () => {
    const { validateConfig } = await importConfigWith({ CREDENTIAL_ENCRYPTION_KEY: 'abc' });
    expect(() => validateConfig()).toThrow(/CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string/);
  });

  it('does not need an encryption key for the memory store', async () => {
    const { validateConfig } = await importConfigWith({
      CREDENTIAL_STORE_PROVIDER: 'memory',
      CREDENTIAL_ENCRYPTION_KEY: undefined,
    });
    expect(() => validateConfig()).not.toThrow();
  });

  it('rejects an out-of-range port', async () => {
    const { validateConfig } = await importConfigWith({ PORT: '70000' });
    expect(() => validateConfig()).toThrow(/PORT must be 1-65535, got 70000/);
  });

  it('rejects a negative retry count', async () => {
    const { validateConfig } = await importConfigWith({ GOOGLE_MAX_RETRIES: '-1' });
    expect(() => validateConfig()).toThrow(/GOOGLE_MAX_RETRIES must be 0-10, got -1/);
  });

  it('applies defaults', async () => {
    const { default: config } = await importConfigWith({
      GOOGLE_ACCOUNT: undefined,
      REPLICATION_PLAN_PATH: undefined,
    });

    expect(config.google.account).toBe('default');
    expect(config.replication.planPath).toBe('./drive-config.json');
  });
});
