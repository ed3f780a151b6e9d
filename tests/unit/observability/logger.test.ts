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

function captureStdout(): () => string[] {
  const spy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  return () => spy.mock.calls.map((call) => String(call[0]));
}

describe('observability logger', () => {
  it('writes redacted JSON logs to local file in development', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'intent-guard-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'development';
    process.env.APP_LOG_FILE = logFile;

    const logger = createLogger({ domain: 'unit-test' });
    captureStdout();

    withLogContext({ requestId: 'req_test_123' }, () => {
      logger.info('test_event', {
        from: 'john@example.com',
        token: 'test-secret',
        emailContent: 'this should not be stored in clear text',
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
    expect(payload.requestId).toBe('req_test_123');
    expect(payload.from).toBe('***@example.com');
    expect(payload.token).toBe('[REDACTED]');
    expect(payload.emailContent).toBe('[REDACTED_TEXT len=39]');
  });

  it('keeps only allow-listed fields for the intent guard domain', () => {
    process.env.NODE_ENV = 'production';
    const written = captureStdout();

    createLogger({ domain: 'intent-guard' }).info('request_processed', {
      approved: false,
      check: 'intent',
      userPrompt: 'Read the latest email from john@example.com',
      actionParams: { to: 'attacker@evil.com' },
    });

    const lines = written();
    expect(lines).toHaveLength(1);
    const record: Record<string, unknown> = JSON.parse(lines[0]);
    expect(record.approved).toBe(false);
    expect(record.check).toBe('intent');
    expect(record).not.toHaveProperty('userPrompt');
    expect(record).not.toHaveProperty('actionParams');
  });

  it('drops debug and info records under test', () => {
    process.env.NODE_ENV = 'test';
    const written = captureStdout();

    createLogger({ domain: 'unit-test' }).info('quiet_event');

    expect(written()).toEqual([]);
  });

  it('does not write local file sink in production', () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'intent-guard-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'production';
    process.env.APP_LOG_FILE = logFile;
    captureStdout();

    createLogger({ domain: 'unit-test' }).info('prod_event', { ok: true });

    expect(fs.existsSync(logFile)).toBe(false);
  });
});
