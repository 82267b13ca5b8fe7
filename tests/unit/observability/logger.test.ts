import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, withLogContext } from '../../../src/utils/observability/index.js';

const envSnapshot = { ...process.env };

afterEach(() => {
  process.env = { ...envSnapshot };
  vi.restoreAllMocks();
});

function events(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls
    .map(([chunk]) => String(chunk))
    .filter((line) => line.startsWith('{'))
    .map((line) => {
      const record: Record<string, unknown> = JSON.parse(line);
      return String(record.event);
    });
}

function tempLogFile(): string {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'replicate-obs-log-'));
  return path.join(tempDir, 'app.ndjson');
}

describe('observability logger', () => {
  it('writes redacted JSON logs with the active context to the file sink', async () => {
    const logFile = tempLogFile();
    process.env.LOG_LEVEL = 'info';
    process.env.APP_LOG_FILE = logFile;

    const logger = createLogger({ domain: 'unit-test' });
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await withLogContext({ runId: 'run_test_123' }, async () => {
      await withLogContext({ batch: 'Spring' }, async () => {
        logger.info('test_event', {
          folder: 'Quarterly Reports 2024',
          token: 'test-secret',
        });
      });
    });

    await vi.waitFor(() => {
      expect(fs.existsSync(logFile)).toBe(true);
      expect(fs.readFileSync(logFile, 'utf-8').trim().length).toBeGreaterThan(0);
    }, { timeout: 1000 });

    const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
    const payload: Record<string, unknown> = JSON.parse(lines[0]);

    expect(payload.event).toBe('test_event');
    expect(payload.level).toBe('info');
    expect(payload.domain).toBe('unit-test');
    expect(payload.runId).toBe('run_test_123');
    expect(payload.batch).toBe('Spring');
    expect(payload.folder).toBe('Quarterly Reports 2024');
    expect(payload.token).toBe('[REDACTED]');
    expect(events(stdoutSpy)).toEqual(['test_event']);
  });

  it('sends warnings and errors to stderr', () => {
    process.env.LOG_LEVEL = 'info';
    process.env.APP_LOG_FILE = 'off';

    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const logger = createLogger({ domain: 'unit-test' });
    logger.warn('careful');
    logger.error('broken');

    expect(events(stdoutSpy)).toEqual([]);
    expect(events(stderrSpy)).toEqual(['careful', 'broken']);
  });

  it('drops records below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    process.env.APP_LOG_FILE = 'off';

    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const logger = createLogger({ domain: 'unit-test' });
    logger.debug('noise');
    logger.info('chatter');
    logger.warn('kept');

    expect(events(stdoutSpy)).toEqual([]);
    expect(events(stderrSpy)).toEqual(['kept']);
  });

  it('merges child context into every record', () => {
    process.env.LOG_LEVEL = 'info';
    process.env.APP_LOG_FILE = 'off';

    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    createLogger({ domain: 'unit-test' }).child({ batch: 'Autumn' }).info('child_event');

    const line = String(stdoutSpy.mock.calls[0]?.[0]);
    const payload: Record<string, unknown> = JSON.parse(line);
    expect(payload.domain).toBe('unit-test');
    expect(payload.batch).toBe('Autumn');
  });

  it('does not write a file sink when APP_LOG_FILE is off', () => {
    const logFile = tempLogFile();
    process.env.NODE_ENV = 'development';
    process.env.LOG_LEVEL = 'info';
    process.env.APP_LOG_FILE = 'off';
    process.env.APP_LOG_DIR = path.dirname(logFile);

    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    createLogger({ domain: 'unit-test' }).info('quiet_event', { ok: true });

    expect(fs.readdirSync(path.dirname(logFile))).toEqual([]);
  });
});
