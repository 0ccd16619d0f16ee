/**
 * packages/obs/src/logger.ts
 * Structured JSON logger for the beatflash engine
 *
 * - exported sanitizeObject / safeStringify for reuse
 * - adds pid/host/correlation_id top-level fields
 * - non-blocking file write via async queue (sequential append)
 * - truncation of overly large log lines
 *
 * Environment variables:
 * - OBS_LOG_LEVEL: error|warn|info|debug  (default: info)
 * - OBS_LOG_OUTPUT: console|file           (default: console)
 * - OBS_LOG_MAX_LENGTH: max length of a log line (default: 200000)
 * - OBS_LOG_QUEUE_MAX: max pending file lines (default: 5000)
 * - SERVICE_NAME: service name to include in logs
 */
import fs from 'fs/promises';
import path from 'path';
import os from 'os';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
const LEVEL_PRIORITIES: Record<LogLevel, number> = {
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

const REDACT_KEYS = [
  /password/i,
  /passphrase/i,
  /token/i,
  /secret/i,
  /authorization/i,
  /auth/i,
  /api[_-]?key/i,
  /apikey/i,
  /private[_-]?key/i,
  /credential/i,
];
const DEFAULT_MAX_LINE = Number(process.env.OBS_LOG_MAX_LENGTH ?? '200000');
const LOG_OUT_DIR = path.join(process.cwd(), 'obs', 'logs');
const MAX_QUEUE_LENGTH = Number(process.env.OBS_LOG_QUEUE_MAX ?? '5000');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITIES, value);
}

function getEnvLogLevel(): LogLevel {
  const raw = (process.env.OBS_LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function shouldLog(level: LogLevel) {
  return LEVEL_PRIORITIES[level] >= LEVEL_PRIORITIES[getEnvLogLevel()];
}

export function sanitizeObject(obj: unknown, maxDepth = 10): unknown {
  if (obj == null) return obj;
  const seen = new WeakSet<object>();
  const _sanitize = (value: unknown, depth = 0): unknown => {
    if (depth > maxDepth) return '[MaxDepth]';
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }
    if (value && typeof value === 'object') {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
      if (Array.isArray(value)) return value.map(v => _sanitize(v, depth + 1));
      // typed arrays (PCM buffers) are summarized, never dumped
      if (ArrayBuffer.isView(value)) return `[${value.constructor.name} byteLength=${value.byteLength}]`;
      const out: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value)) {
        out[k] = REDACT_KEYS.some(rx => rx.test(k)) ? '[REDACTED]' : _sanitize(v, depth + 1);
      }
      return out;
    }
    if (typeof value === 'string' && value.length > 10000) {
      return value.slice(0, 10000) + '... [TRUNCATED]';
    }
    return value;
  };
  return _sanitize(obj);
}

export function safeStringify(obj: unknown, space?: number, redact = true, maxLen = DEFAULT_MAX_LINE): string {
  try {
    const toSerialize = redact ? sanitizeObject(obj) : obj;
    const s = JSON.stringify(toSerialize, null, space) ?? String(toSerialize);
    return s.length > maxLen ? s.slice(0, maxLen) + '... [TRUNCATED]' : s;
  } catch {
    // BigInt and friends end up here
    try {
      const fallback = String(obj);
      return fallback.length > maxLen ? fallback.slice(0, maxLen) + '... [TRUNCATED]' : fallback;
    } catch {
      return '[UNSERIALIZABLE]';
    }
  }
}

// in-memory queue serializing file appends
const logQueue: string[] = [];
let isDraining = false;

async function drainQueue(): Promise<void> {
  if (isDraining) return;
  isDraining = true;
  try {
    try {
      await fs.mkdir(LOG_OUT_DIR, { recursive: true });
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('logger.mkdir_failed', String(err));
    }
    const file = path.join(LOG_OUT_DIR, `${new Date().toISOString().slice(0, 10)}.log`);
    let line = logQueue.shift();
    while (line !== undefined) {
      try {
        await fs.appendFile(file, line + '\n', 'utf8');
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error('logger.file_write_failed', String(err));
      }
      line = logQueue.shift();
    }
  } finally {
    isDraining = false;
  }
}

function writeToFile(line: string) {
  const truncated = line.length > DEFAULT_MAX_LINE ? line.slice(0, DEFAULT_MAX_LINE) + '... [TRUNCATED]' : line;
  // bounded: drop oldest when full
  if (logQueue.length >= MAX_QUEUE_LENGTH) {
    logQueue.shift();
    logQueue.push('[LOG DROPPED]');
  }
  logQueue.push(truncated);
  if (!isDraining) {
    void drainQueue();
  }
}

type LogEntry = {
  ts: string;
  level: LogLevel;
  service: string;
  env: string;
  pid: number;
  host: string;
  tag: string;
  correlation_id?: string;
  meta?: unknown;
};

function formatLog(level: LogLevel, tag: string, meta?: unknown) {
  if (!shouldLog(level)) return;
  const sanitized = sanitizeObject(meta);
  let correlationId: string | undefined;
  let metaForEntry: unknown;

  if (isRecord(sanitized)) {
    const { correlation_id, correlationId: correlationIdAlt, ...rest } = sanitized;
    const cid = correlation_id ?? correlationIdAlt;
    correlationId = typeof cid === 'string' ? cid : undefined;
    metaForEntry = Object.keys(rest).length ? rest : undefined;
  } else if (sanitized !== undefined && sanitized !== null) {
    metaForEntry = sanitized;
  }

  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    service: process.env.SERVICE_NAME ?? 'beatflash',
    env: process.env.NODE_ENV ?? 'development',
    pid: process.pid,
    host: os.hostname(),
    tag,
  };
  if (correlationId) entry.correlation_id = correlationId;
  if (metaForEntry !== undefined) entry.meta = metaForEntry;

  const line = safeStringify(entry, undefined, false);
  const output = (process.env.OBS_LOG_OUTPUT ?? 'console').toLowerCase();
  if (output === 'file') {
    writeToFile(line);
  } else {
    // eslint-disable-next-line no-console
    if (level === 'error') console.error(line);
    // eslint-disable-next-line no-console
    else console.log(line);
  }
}

export function debug(tag: string, meta?: unknown) {
  formatLog('debug', tag, meta);
}

export function info(tag: string, meta?: unknown) {
  formatLog('info', tag, meta);
}

export function warn(tag: string, meta?: unknown) {
  formatLog('warn', tag, meta);
}

export function error(tag: string, meta?: unknown) {
  formatLog('error', tag, meta);
}

/**
 * Flush any pending log writes (returns when queue drained).
 * Exported for tests / graceful shutdown handling.
 */
export async function flushLogs(timeoutMs = 5000): Promise<void> {
  if (!isDraining && logQueue.length > 0) {
    await drainQueue();
  }
  const start = Date.now();
  while ((isDraining || logQueue.length > 0) && Date.now() - start < timeoutMs) {
    // eslint-disable-next-line no-await-in-loop
    await new Promise((res) => setTimeout(res, 50));
  }
}

function handleShutdown(signal: string) {
  void flushLogs()
    .catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error('flushLogs failed on shutdown', String(e));
    })
    .finally(() => {
      // eslint-disable-next-line no-console
      console.log(`exiting due to ${signal}`);
      process.exit(0);
    });
}

/**
 * Attach process signal handlers that flush pending file logs before exit.
 * Only entry points call this; importing the logger never touches signals.
 */
export function installShutdownHandlers(): void {
  process.once('SIGINT', () => handleShutdown('SIGINT'));
  process.once('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('beforeExit', () => {
    if (logQueue.length > 0) void flushLogs();
  });
}

const logger = { debug, info, warn, error, sanitizeObject, safeStringify, flushLogs, installShutdownHandlers };
export default logger;
