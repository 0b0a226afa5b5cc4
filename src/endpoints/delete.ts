import { z } from 'zod';
import type { Env } from 'hono';
import { OpenAPIRoute } from '../core/route.js';
import type { HookMode, MetaInput, OpenAPIRouteSchema } from '../core/types.js';
import { ErrorResponseSchema, jsonContent, successSchema } from '../openapi/utils.js';
import { getIdParamsSchema } from './types.js';

/**
 * Result of cascade operations during delete.
 */
export interface CascadeResult {
  /** Relations where records were deleted, with their counts */
  deleted: Record<string, number>;
}

export interface DeleteOutcome {
  cascade?: CascadeResult;
}

export const DeleteResultSchema = z.object({
  deleted: z.literal(true),
  id: z.number().int(),
  cascade: z
    .object({
      deleted: z.record(z.string(), z.number().int()),
    })
    .optional(),
});

export type DeleteResult = z.infer<typeof DeleteResultSchema>;

/**
 * Base endpoint for deleting a resource by id.
 *
 * Cascaded deletes reported by `delete` are included in the response when
 * `includeCascadeResults` is set and at least one related record was removed.
 *
 * @example
 * ```ts
 * class CompanyDelete extends DeleteEndpoint<AppEnv, typeof companyMeta> {
 *   _meta = companyMeta;
 *   protected includeCascadeResults = true;
 *
 *   async delete(id: number) {
 *     const { deletedEmployees } = await getServices(this.getContext()).companies.delete(id);
 *     return { cascade: { deleted: { employees: deletedEmployees } } };
 *   }
 * }
 * ```
 */
export abstract class DeleteEndpoint<
  E extends Env = Env,
  M extends MetaInput = MetaInput,
> extends OpenAPIRoute<E> {
  abstract _meta: M;

  // Lookup configuration
  protected lookupField: string = 'id';

  // Hook execution mode
  protected afterHookMode: HookMode = 'sequential';

  /**
   * Whether to include cascade results in the response.
   * @default false
   */
  protected includeCascadeResults: boolean = false;

  getSchema(): OpenAPIRouteSchema {
    const name = this._meta.model.resourceName;
    return {
      ...this.schema,
      request: {
        params: getIdParamsSchema(this.lookupField),
      },
      responses: {
        200: jsonContent(successSchema(DeleteResultSchema), `${name} deleted`),
        400: jsonContent(ErrorResponseSchema, 'Invalid id'),
        404: jsonContent(ErrorResponseSchema, `${name} not found`),
      },
    };
  }

  protected async getLookupValue(): Promise<number> {
    const { params } = await this.getValidatedData();
    return Number(params?.[this.lookupField]);
  }

  /**
   * Lifecycle hook: called before delete operation.
   */
  async before(id: number): Promise<void> {}

  /**
   * Lifecycle hook: called after delete operation.
   */
  async after(id: number, cascade?: CascadeResult): Promise<void> {}

  /**
   * Deletes the resource. Throws `NotFoundException` for unknown ids.
   */
  abstract delete(id: number): Promise<DeleteOutcome>;

  async handle(): Promise<Response> {
    const id = await this.getLookupValue();
    await this.before(id);
    const { cascade } = await this.delete(id);

    if (this.afterHookMode === 'fire-and-forget') {
      this.runAfterResponse(this.after(id, cascade));
    } else {
      await this.after(id, cascade);
    }

    const response: DeleteResult = { deleted: true, id };

    if (this.includeCascadeResults && cascade) {
      const deleted = Object.fromEntries(
        Object.entries(cascade.deleted).filter(([, count]) => count > 0)
      );
      if (Object.keys(deleted).length > 0) {
        response.cascade = { deleted };
      }
    }

    return this.success(response);
  }
}
