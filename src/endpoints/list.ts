import { z } from 'zod';
import type { Env } from 'hono';
import { OpenAPIRoute } from '../core/route.js';
import type { MetaInput, OpenAPIRouteSchema, Page, PaginatedResult } from '../core/types.js';
import { ErrorResponseSchema, jsonContent } from '../openapi/utils.js';
import {
  buildResultInfo,
  getPaginationQuerySchema,
  parsePageOptions,
  type ModelObject,
  type PageOptions,
} from './types.js';

/**
 * Base endpoint for listing resources page by page.
 * Responses carry `result_info` with the pagination metadata.
 */
export abstract class ListEndpoint<
  E extends Env = Env,
  M extends MetaInput = MetaInput,
> extends OpenAPIRoute<E> {
  abstract _meta: M;

  // Pagination configuration
  protected defaultPerPage: number = 20;
  protected maxPerPage: number = 100;

  getSchema(): OpenAPIRouteSchema {
    const name = this._meta.model.resourceName;
    return {
      ...this.schema,
      request: {
        query: getPaginationQuerySchema(this.maxPerPage),
      },
      responses: {
        200: jsonContent(
          z.object({
            success: z.literal(true),
            result: z.array(this._meta.model.schema),
            result_info: z.object({
              page: z.number(),
              per_page: z.number(),
              total_count: z.number(),
              total_pages: z.number(),
              has_next_page: z.boolean(),
              has_prev_page: z.boolean(),
            }),
          }),
          `Page of ${name.toLowerCase()} records`
        ),
        400: jsonContent(ErrorResponseSchema, 'Invalid query parameters'),
      },
    };
  }

  /**
   * Parses the validated query into page options.
   */
  protected async getPageOptions(): Promise<PageOptions> {
    const { query } = await this.getValidatedData();
    return parsePageOptions(query ?? {}, {
      defaultPerPage: this.defaultPerPage,
      maxPerPage: this.maxPerPage,
    });
  }

  /**
   * Lifecycle hook: called after list operation.
   */
  async after(items: ModelObject<M['model']>[]): Promise<ModelObject<M['model']>[]> {
    return items;
  }

  /**
   * Optional transform applied to each item before response.
   */
  protected transform(item: ModelObject<M['model']>): unknown {
    return item;
  }

  abstract list(options: PageOptions): Promise<Page<ModelObject<M['model']>>>;

  async handle(): Promise<Response> {
    const options = await this.getPageOptions();
    const page = await this.list(options);
    const items = await this.after(page.items);

    const body: PaginatedResult<unknown> = {
      result: items.map((item) => this.transform(item)),
      result_info: buildResultInfo(options, page.totalCount),
    };

    return this.json({ success: true, ...body });
  }
}
