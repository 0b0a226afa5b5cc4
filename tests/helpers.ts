import {
  createApp,
  createMemoryRepositories,
  MemoryStore,
  type CreateAppOptions,
  type LogContext,
  type Logger,
  type LogLevel,
  type Repositories,
} from '../src/index.js';

/**
 * Clock advancing by one second on every call, starting at `start`.
 */
export function createTestClock(start = '2026-03-01T00:00:00.000Z'): () => Date {
  const origin = Date.parse(start);
  let tick = 0;
  return () => new Date(origin + 1000 * tick++);
}

/**
 * App over memory storage with a deterministic clock; logging and docs off
 * unless overridden.
 */
export function createTestApp(
  overrides: Partial<Omit<CreateAppOptions, 'repositories'>> & { repositories?: Repositories } = {}
) {
  const store = new MemoryStore();
  const repositories =
    overrides.repositories ?? createMemoryRepositories({ store, now: createTestClock() });
  const app = createApp({ logging: false, docs: false, ...overrides, repositories });
  return { app, store };
}

export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export interface RecordedLog {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/**
 * Logger keeping every entry in memory.
 */
export function createRecordingLogger(): { logger: Logger; entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  const record = (level: LogLevel) => (message: string, context?: LogContext) => {
    entries.push({ level, message, context });
  };
  return {
    entries,
    logger: {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error'),
    },
  };
}
