import { apiReference } from '@scalar/hono-api-reference';
import type { ApiReferenceConfiguration } from '@scalar/hono-api-reference';
import type { Hono, Env } from 'hono';

/**
 * Configuration options for the Scalar API Reference page.
 */
export interface ScalarConfig {
  /**
   * URL to the OpenAPI document.
   * @default '/openapi.json'
   */
  specUrl?: string;
  pageTitle?: string;
  theme?: ApiReferenceConfiguration['theme'];
  /** @default 'modern' */
  layout?: 'modern' | 'classic';
}

/**
 * Creates a Scalar API Reference handler.
 *
 * @example
 * ```ts
 * app.get('/reference', scalarUI({ pageTitle: 'Company Roster API' }));
 * ```
 */
export function scalarUI(config: ScalarConfig = {}) {
  const { specUrl = '/openapi.json', pageTitle, theme = 'default', layout = 'modern' } = config;

  const scalarConfig: Partial<ApiReferenceConfiguration> = { theme, layout };

  // `url` and `pageTitle` are read by Scalar but missing from its exported type
  const untyped = scalarConfig as Record<string, unknown>;
  untyped.url = specUrl;
  if (pageTitle) {
    untyped.pageTitle = pageTitle;
  }

  return apiReference(scalarConfig as ApiReferenceConfiguration);
}

/**
 * Serves the Scalar API Reference at `path`.
 */
export function setupScalar<E extends Env>(
  app: Hono<E>,
  path: string = '/reference',
  config: ScalarConfig = {}
): void {
  app.get(path, scalarUI(config));
}
