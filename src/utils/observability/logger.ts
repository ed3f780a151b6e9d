import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

let sinkHooksInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;

/**
 * Domains whose records may only carry allow-listed fields. Validation
 * records sit next to user prompts and email bodies, so anything not on
 * the list is dropped rather than redacted.
 */
const HIGH_RISK_DOMAINS = new Set(['intent-guard', 'http-validate']);
const HIGH_RISK_ALLOWED_FIELDS = new Set([
  'approved',
  'check',
  'reason',
  'userIntent',
  'actionIntent',
  'proposedAction',
  'durationMs',
  'promptLength',
  'emailContentLength',
  'responseLength',
  'paramKeys',
  'status',
  'error',
]);

function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

function shouldWriteFileSink(): boolean {
  if (!isDevelopment()) return false;
  return process.env.APP_LOG_FILE !== 'off';
}

function resolveLogFilePath(): string {
  if (process.env.APP_LOG_FILE) return process.env.APP_LOG_FILE;

  const baseDir = process.env.APP_LOG_DIR || './logs';
  const dateDir = new Date().toISOString().slice(0, 10);
  return join(baseDir, dateDir, 'app.ndjson');
}

function closeFileSink(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  if (!shouldWriteFileSink()) return null;

  const filePath = resolveLogFilePath();
  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeFileSink();

  try {
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', (err) => {
      process.stderr.write(`log file sink failed: ${err.message}\n`);
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch (err) {
    process.stderr.write(`log file sink unavailable: ${err instanceof Error ? err.message : String(err)}\n`);
    return null;
  }
}

function writeToStd(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'warn') {
    process.stderr.write(`${line}\n`);
    return;
  }
  process.stdout.write(`${line}\n`);
}

function isAllowedHighRiskField(key: string): boolean {
  if (HIGH_RISK_ALLOWED_FIELDS.has(key)) return true;
  if (/^has[A-Z]/.test(key)) return true;
  return false;
}

function applyHighRiskFieldPolicy(context: LogContext, payload: LogData): LogData {
  const domain = typeof context.domain === 'string' ? context.domain : '';
  if (!HIGH_RISK_DOMAINS.has(domain)) {
    return payload;
  }

  const filtered: LogData = {};
  for (const [key, value] of Object.entries(payload)) {
    if (isAllowedHighRiskField(key)) {
      filtered[key] = value;
    }
  }
  return filtered;
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  const mergedContext = { ...getLogContext(), ...baseContext };
  const payload = applyHighRiskFieldPolicy(mergedContext, data ? redactSecrets(data) : {});
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...mergedContext,
    ...payload,
  };
}

function emitRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  writeToStd(record.level, line);
  ensureFileSink()?.write(`${line}\n`);
}

function isQuiet(level: LogLevel): boolean {
  // Keep test output readable; warnings and errors still surface.
  return process.env.NODE_ENV === 'test' && (level === 'debug' || level === 'info');
}

export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (isQuiet(level)) return;
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
    child: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}

/**
 * Install process hooks that flush the development file sink on exit.
 */
export function initObservability(): void {
  if (sinkHooksInstalled) return;
  sinkHooksInstalled = true;
  process.once('exit', closeFileSink);
  process.once('SIGINT', closeFileSink);
  process.once('SIGTERM', closeFileSink);
}
