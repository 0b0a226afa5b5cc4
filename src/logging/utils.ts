import { randomUUID } from 'node:crypto';
import type { Context, Env } from 'hono';
import { getLogger } from '../core/logger.js';
import type { LogEntry, LogHandler, PathPattern } from './types.js';

/**
 * Check if a path matches a pattern.
 * Supports exact matches, `*` (one segment), `**` (any depth) and RegExp.
 */
export function matchPath(path: string, pattern: PathPattern): boolean {
  if (pattern instanceof RegExp) {
    return pattern.test(path);
  }

  if (pattern.includes('*')) {
    // Placeholders keep the wildcards out of the escaping step
    const regexPattern = pattern
      .replace(/\*\*/g, '\0DOUBLE_STAR\0')
      .replace(/\*/g, '\0SINGLE_STAR\0')
      .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
      .replace(/\0DOUBLE_STAR\0/g, '.*')
      .replace(/\0SINGLE_STAR\0/g, '[^/]*');

    return new RegExp(`^${regexPattern}$`).test(path);
  }

  return path === pattern;
}

/**
 * Determine if a path should be excluded from logging.
 * Exclusions take precedence; an empty include list includes everything.
 */
export function shouldExcludePath(
  path: string,
  includePaths: PathPattern[],
  excludePaths: PathPattern[]
): boolean {
  if (excludePaths.some((pattern) => matchPath(path, pattern))) {
    return true;
  }
  if (includePaths.length === 0) {
    return false;
  }
  return !includePaths.some((pattern) => matchPath(path, pattern));
}

/**
 * Query parameters of the request, first value per key.
 */
export function extractQuery<E extends Env>(ctx: Context<E>): Record<string, string> {
  const query: Record<string, string> = {};
  new URL(ctx.req.url).searchParams.forEach((value, key) => {
    if (!(key in query)) {
      query[key] = value;
    }
  });
  return query;
}

export function generateRequestId(): string {
  return randomUUID();
}

/**
 * One-line summary of an entry, e.g. `GET /companies/1 200 (3ms)`.
 */
export function formatLogEntry(entry: LogEntry): string {
  return `${entry.request.method} ${entry.request.path} ${entry.response.statusCode} (${entry.response.responseTimeMs}ms)`;
}

/**
 * Handler writing each entry to the application logger at the entry's level.
 */
export const loggerHandler: LogHandler = (entry) => {
  const context: Record<string, unknown> = { requestId: entry.id };
  if (entry.request.query && Object.keys(entry.request.query).length > 0) {
    context.query = entry.request.query;
  }
  if (entry.error) {
    context.error = entry.error.message;
  }
  getLogger()[entry.level](formatLogEntry(entry), context);
};
