import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Hono } from 'hono';
import {
  createConsoleLogger,
  createLoggingMiddleware,
  formatLogEntry,
  matchPath,
  setLogger,
  shouldExcludePath,
  type LogEntry,
} from '../src/index.js';
import { createRecordingLogger, createTestApp, jsonRequest, type RecordedLog } from './helpers.js';

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

let logs: RecordedLog[];

beforeEach(() => {
  const recording = createRecordingLogger();
  logs = recording.entries;
  setLogger(recording.logger);
});

afterEach(() => {
  setLogger(createConsoleLogger());
});

describe('path matching', () => {
  it('should match exact paths, globs and regular expressions', () => {
    expect(matchPath('/health', '/health')).toBe(true);
    expect(matchPath('/companies/1', '/companies/*')).toBe(true);
    expect(matchPath('/companies/1/employees', '/companies/*')).toBe(false);
    expect(matchPath('/companies/1/employees', '/companies/**')).toBe(true);
    expect(matchPath('/reference', /^\/ref/)).toBe(true);
  });

  it('should let exclusions win over inclusions', () => {
    expect(shouldExcludePath('/health', ['/health'], ['/health'])).toBe(true);
    expect(shouldExcludePath('/companies', ['/employees'], [])).toBe(true);
    expect(shouldExcludePath('/companies', [], [])).toBe(false);
  });
});

describe('formatLogEntry', () => {
  it('should summarize method, path, status and time', () => {
    const entry: LogEntry = {
      id: 'req-1',
      timestamp: '2026-03-01T00:00:00.000Z',
      level: 'info',
      request: { method: 'GET', path: '/companies/1' },
      response: { statusCode: 200, responseTimeMs: 3 },
    };
    expect(formatLogEntry(entry)).toBe('GET /companies/1 200 (3ms)');
  });
});

describe('createLoggingMiddleware', () => {
  it('should set X-Request-ID and pass entries to handlers', async () => {
    const received: LogEntry[] = [];
    const app = new Hono();
    app.use('*', createLoggingMiddleware({
      generateRequestId: () => 'req-fixed',
      handlers: [(entry) => {
        received.push(entry);
      }],
    }));
    app.get('/companies', (c) => c.json({ ok: true }));

    const res = await app.request('/companies?page=2');
    await flush();

    expect(res.headers.get('X-Request-ID')).toBe('req-fixed');
    expect(received).toHaveLength(1);
    expect(received[0].id).toBe('req-fixed');
    expect(received[0].level).toBe('info');
    expect(received[0].request).toEqual({ method: 'GET', path: '/companies', query: { page: '2' } });
    expect(received[0].response.statusCode).toBe(200);
  });

  it('should derive the level from the status', async () => {
    const levels: string[] = [];
    const app = new Hono();
    app.use('*', createLoggingMiddleware({ handlers: [(entry) => { levels.push(entry.level); }] }));
    app.get('/ok', (c) => c.text('ok'));
    app.get('/missing', (c) => c.text('missing', 404));
    app.get('/broken', (c) => c.text('broken', 500));

    await app.request('/ok');
    await app.request('/missing');
    await app.request('/broken');
    await flush();

    expect(levels).toEqual(['info', 'warn', 'error']);
  });

  it('should skip /health by default', async () => {
    const received: LogEntry[] = [];
    const app = new Hono();
    app.use('*', createLoggingMiddleware({ handlers: [(entry) => { received.push(entry); }] }));
    app.get('/health', (c) => c.json({ status: 'ok' }));

    const res = await app.request('/health');
    await flush();

    expect(res.headers.get('X-Request-ID')).toBeNull();
    expect(received).toEqual([]);
  });

  it('should use a custom level resolver', async () => {
    const levels: string[] = [];
    const app = new Hono();
    app.use('*', createLoggingMiddleware({
      levelResolver: () => 'debug',
      handlers: [(entry) => { levels.push(entry.level); }],
    }));
    app.get('/x', (c) => c.text('x', 500));

    await app.request('/x');
    await flush();

    expect(levels).toEqual(['debug']);
  });

  it('should report handler failures without failing the request', async () => {
    const failures: string[] = [];
    const app = new Hono();
    app.use('*', createLoggingMiddleware({
      handlers: [() => {
        throw new Error('sink down');
      }],
      onError: (error, entry) => {
        failures.push(`${entry.request.path}: ${error.message}`);
      },
    }));
    app.get('/x', (c) => c.text('x'));

    const res = await app.request('/x');
    await flush();

    expect(res.status).toBe(200);
    expect(failures).toEqual(['/x: sink down']);
  });

  it('should log to the application logger by default', async () => {
    const app = new Hono();
    app.use('*', createLoggingMiddleware({ generateRequestId: () => 'req-7' }));
    app.get('/x', (c) => c.text('x', 404));

    await app.request('/x');
    await flush();

    expect(logs).toHaveLength(1);
    expect(logs[0].level).toBe('warn');
    expect(logs[0].message).toMatch(/^GET \/x 404 \(\d+ms\)$/);
    expect(logs[0].context).toEqual({ requestId: 'req-7' });
  });

  it('should do nothing when disabled', async () => {
    const app = new Hono();
    app.use('*', createLoggingMiddleware({ enabled: false }));
    app.get('/x', (c) => c.text('x'));

    const res = await app.request('/x');
    await flush();

    expect(res.headers.get('X-Request-ID')).toBeNull();
    expect(logs).toEqual([]);
  });
});

describe('createApp logging', () => {
  it('should attach the request id to error bodies', async () => {
    const { app } = createTestApp({ logging: { handlers: [], generateRequestId: () => 'req-42' } });

    const res = await app.request('/companies/5');
    const data = await res.json();

    expect(res.status).toBe(404);
    expect(res.headers.get('X-Request-ID')).toBe('req-42');
    expect(data.error.requestId).toBe('req-42');
  });

  it('should log every API request through the logger', async () => {
    const { app } = createTestApp({ logging: true });

    await app.request('/companies', jsonRequest('POST', { name: 'Tech', address: 'Seoul' }));
    await app.request('/health');
    await flush();

    const requestLogs = logs.filter((l) => l.context?.requestId !== undefined);
    expect(requestLogs.map((l) => l.level)).toEqual(['info']);
    expect(requestLogs[0].message).toMatch(/^POST \/companies 201 /);
  });
});
