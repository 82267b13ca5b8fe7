import { describe, expect, it } from 'vitest';
import { redactSecrets } from '../../../src/utils/observability/index.js';

describe('observability redaction', () => {
  it('redacts sensitive keys at any depth', () => {
    const redacted = redactSecrets({
      accessToken: 'test-access-token',
      folder: 'Budget 2024',
      nested: {
        client_secret: 'test-secret',
        encryptionKey: 'test-key',
      },
    });

    expect(redacted).toEqual({
      accessToken: '[REDACTED]',
      folder: 'Budget 2024',
      nested: {
        client_secret: '[REDACTED]',
        encryptionKey: '[REDACTED]',
      },
    });
  });

  it('redacts an OAuth authorization code but not other keys containing "code"', () => {
    const redacted = redactSecrets({ code: 'test-code', statusCode: 404 });

    expect(redacted.code).toBe('[REDACTED]');
    expect(redacted.statusCode).toBe(404);
  });

  it('serializes errors to name and message', () => {
    const redacted = redactSecrets({ error: new TypeError('bad input') });

    expect(redacted.error).toEqual({ name: 'TypeError', message: 'bad input', stack: undefined });
  });

  it('redacts inside arrays', () => {
    const redacted = redactSecrets({ items: [{ password: 'test-password' }, 'plain'] });

    expect(redacted.items).toEqual([{ password: '[REDACTED]' }, 'plain']);
  });
});
