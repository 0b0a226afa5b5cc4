import type { Env } from 'hono';
import { OpenAPIRoute } from '../core/route.js';
import type { HookMode, MetaInput, OpenAPIRouteSchema } from '../core/types.js';
import { ErrorResponseSchema, jsonContent, successSchema } from '../openapi/utils.js';
import { getIdParamsSchema, type ModelObject } from './types.js';

/**
 * Base endpoint for reading a single resource by id.
 */
export abstract class ReadEndpoint<
  E extends Env = Env,
  M extends MetaInput = MetaInput,
> extends OpenAPIRoute<E> {
  abstract _meta: M;

  // Lookup configuration
  protected lookupField: string = 'id';

  // Hook execution mode
  protected afterHookMode: HookMode = 'sequential';

  getSchema(): OpenAPIRouteSchema {
    const name = this._meta.model.resourceName;
    return {
      ...this.schema,
      request: {
        params: getIdParamsSchema(this.lookupField),
      },
      responses: {
        200: jsonContent(successSchema(this._meta.model.schema), `${name} retrieved`),
        400: jsonContent(ErrorResponseSchema, 'Invalid id'),
        404: jsonContent(ErrorResponseSchema, `${name} not found`),
      },
    };
  }

  /**
   * Gets the id from the validated path parameters.
   */
  protected async getLookupValue(): Promise<number> {
    const { params } = await this.getValidatedData();
    return Number(params?.[this.lookupField]);
  }

  /**
   * Lifecycle hook: called after the read operation.
   */
  async after(item: ModelObject<M['model']>): Promise<ModelObject<M['model']>> {
    return item;
  }

  protected transform(item: ModelObject<M['model']>): unknown {
    return item;
  }

  /**
   * Loads the resource. Throws `NotFoundException` when it does not exist.
   */
  abstract read(id: number): Promise<ModelObject<M['model']>>;

  async handle(): Promise<Response> {
    const id = await this.getLookupValue();
    let item = await this.read(id);

    if (this.afterHookMode === 'fire-and-forget') {
      this.runAfterResponse(this.after(item));
    } else {
      item = await this.after(item);
    }

    return this.success(this.transform(item));
  }
}
