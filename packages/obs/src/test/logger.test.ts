import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import logger, { sanitizeObject, safeStringify } from '../logger.js';

describe('sanitizeObject', () => {
  it('should redact sensitive keys at any depth', () => {
    expect(sanitizeObject({ user: 'dj', transport: { apiKey: 'test-secret', url: 'ws://localhost' } })).toEqual({
      user: 'dj',
      transport: { apiKey: '[REDACTED]', url: 'ws://localhost' },
    });
  });

  it('should mark circular references', () => {
    const node: Record<string, unknown> = { name: 'loop' };
    node.self = node;
    expect(sanitizeObject(node)).toEqual({ name: 'loop', self: '[Circular]' });
  });

  it('should summarize typed arrays', () => {
    expect(sanitizeObject({ samples: new Int16Array(1024) })).toEqual({ samples: '[Int16Array byteLength=2048]' });
  });

  it('should flatten errors', () => {
    const sanitized = sanitizeObject(new RangeError('bad rate'));
    expect(sanitized).toMatchObject({ name: 'RangeError', message: 'bad rate' });
  });
});

describe('safeStringify', () => {
  it('should truncate long output', () => {
    expect(safeStringify({ a: 'xxxxxxxx' }, undefined, true, 10)).toBe('{"a":"xxxx... [TRUNCATED]');
  });

  it('should fall back to String for values JSON cannot take', () => {
    expect(safeStringify(BigInt(7))).toBe('7');
  });
});

describe('logger', () => {
  const saved = { level: process.env.OBS_LOG_LEVEL, service: process.env.SERVICE_NAME };

  beforeEach(() => {
    process.env.OBS_LOG_LEVEL = 'info';
    process.env.SERVICE_NAME = 'test-service';
  });

  const restore = (name: string, value: string | undefined) => {
    if (value === undefined) delete process.env[name];
    else process.env[name] = value;
  };

  afterEach(() => {
    restore('OBS_LOG_LEVEL', saved.level);
    restore('SERVICE_NAME', saved.service);
    vi.restoreAllMocks();
  });

  it('should write one JSON line per entry', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.info('pipeline.started', { chunkSize: 1024, correlation_id: 'run-1' });

    expect(log).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'info',
      service: 'test-service',
      tag: 'pipeline.started',
      correlation_id: 'run-1',
      meta: { chunkSize: 1024 },
    });
  });

  it('should filter entries below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.debug('tempo.updated', { bpm: 120 });

    expect(log).not.toHaveBeenCalled();
  });

  it('should send errors to stderr', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.error('pipeline.emit_failed', { error: new Error('socket closed') });

    expect(err).toHaveBeenCalledTimes(1);
  });
});
