import type { Env } from 'hono';
import { OpenAPIRoute } from '../core/route.js';
import { InputValidationException } from '../core/exceptions.js';
import type { HookMode, MetaInput, OpenAPIRouteSchema } from '../core/types.js';
import { ErrorResponseSchema, jsonContent, jsonContentRequired, successSchema } from '../openapi/utils.js';
import { getIdParamsSchema, type ModelObject, type RequestObject } from './types.js';

/**
 * Base endpoint for replacing a resource by id.
 * The body is the same request shape used for creation.
 */
export abstract class UpdateEndpoint<
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
        body: jsonContentRequired(this._meta.fields, `New state of the ${name.toLowerCase()}`),
      },
      responses: {
        200: jsonContent(successSchema(this._meta.model.schema), `${name} updated`),
        400: jsonContent(ErrorResponseSchema, 'Validation error'),
        404: jsonContent(ErrorResponseSchema, `${name} or referenced resource not found`),
      },
    };
  }

  protected async getLookupValue(): Promise<number> {
    const { params } = await this.getValidatedData();
    return Number(params?.[this.lookupField]);
  }

  protected async getObject(): Promise<RequestObject<M>> {
    const { body } = await this.getValidatedData<RequestObject<M>>();
    if (body === undefined) {
      throw new InputValidationException('Request body is required');
    }
    return body;
  }

  /**
   * Lifecycle hook: called before update operation.
   */
  async before(id: number, data: RequestObject<M>): Promise<RequestObject<M>> {
    return data;
  }

  /**
   * Lifecycle hook: called after update operation.
   */
  async after(item: ModelObject<M['model']>): Promise<ModelObject<M['model']>> {
    return item;
  }

  protected transform(item: ModelObject<M['model']>): unknown {
    return item;
  }

  /**
   * Applies the update. Throws `NotFoundException` for unknown ids.
   */
  abstract update(id: number, data: RequestObject<M>): Promise<ModelObject<M['model']>>;

  async handle(): Promise<Response> {
    const id = await this.getLookupValue();
    const data = await this.before(id, await this.getObject());
    let item = await this.update(id, data);

    if (this.afterHookMode === 'fire-and-forget') {
      this.runAfterResponse(this.after(item));
    } else {
      item = await this.after(item);
    }

    return this.success(this.transform(item));
  }
}
