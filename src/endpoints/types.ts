import { z, type ZodObject, type ZodRawShape } from 'zod';
import type { HookMode, MetaInput, Model, ModelObject, PageOptions, RequestObject } from '../core/types.js';
import { defineMeta, defineModel } from '../core/types.js';

// Re-export core types
export type { HookMode, MetaInput, Model, ModelObject, PageOptions, RequestObject };
export { defineModel, defineMeta };

// List endpoint configuration
export interface ListEndpointConfig {
  defaultPerPage?: number;
  maxPerPage?: number;
}

/**
 * Path parameter schema of single-resource routes.
 * Ids are positive integers without sign or leading zeros.
 */
export function getIdParamsSchema(lookupField = 'id'): ZodObject<ZodRawShape> {
  return z.object({
    [lookupField]: z.string().regex(/^[1-9]\d*$/, 'Must be a positive integer'),
  });
}

/**
 * Query parameter schema of list routes.
 * `page` is bounded so that the row offset stays a safe integer even at
 * `maxPerPage`; larger values are rejected instead of reaching storage.
 */
export function getPaginationQuerySchema(maxPerPage = 100): ZodObject<ZodRawShape> {
  const maxPage = Math.floor(Number.MAX_SAFE_INTEGER / maxPerPage);
  return z.object({
    page: z
      .string()
      .regex(/^\d+$/, 'Must be a non-negative integer')
      .refine((value) => Number(value) <= maxPage, `Must be at most ${maxPage}`)
      .optional(),
    per_page: z
      .string()
      .regex(/^\d+$/, 'Must be a non-negative integer')
      .refine((value) => Number.isSafeInteger(Number(value)), 'Must be a safe integer')
      .optional(),
  });
}

/**
 * Parses validated pagination query parameters.
 * `page` is at least 1 and `per_page` is kept within `[1, maxPerPage]`;
 * an absent value takes its default, `0` is clamped like any other.
 */
export function parsePageOptions(
  query: Record<string, unknown>,
  config: ListEndpointConfig = {}
): PageOptions {
  const { defaultPerPage = 20, maxPerPage = 100 } = config;
  const page = typeof query.page === 'string' ? parseInt(query.page, 10) : NaN;
  const perPage = typeof query.per_page === 'string' ? parseInt(query.per_page, 10) : NaN;

  return {
    page: Math.max(1, Number.isNaN(page) ? 1 : page),
    perPage: Math.min(maxPerPage, Math.max(1, Number.isNaN(perPage) ? defaultPerPage : perPage)),
  };
}

/**
 * Builds the `result_info` block of a list response.
 */
export function buildResultInfo(options: PageOptions, totalCount: number) {
  const totalPages = Math.ceil(totalCount / options.perPage);
  return {
    page: options.page,
    per_page: options.perPage,
    total_count: totalCount,
    total_pages: totalPages,
    has_next_page: options.page < totalPages,
    has_prev_page: options.page > 1,
  };
}
