import type { Env } from 'hono';
import { OpenAPIRoute } from '../core/route.js';
import { InputValidationException } from '../core/exceptions.js';
import type { HookMode, MetaInput, OpenAPIRouteSchema } from '../core/types.js';
import { ErrorResponseSchema, jsonContent, jsonContentRequired, successSchema } from '../openapi/utils.js';
import type { ModelObject, RequestObject } from './types.js';

/**
 * Base endpoint for creating resources.
 * Extend this class and implement `create` with the service call.
 *
 * @example
 * ```ts
 * class CompanyCreate extends CreateEndpoint<AppEnv, typeof companyMeta> {
 *   _meta = companyMeta;
 *
 *   async create(data: CompanyRequest) {
 *     return getServices(this.getContext()).companies.create(data);
 *   }
 * }
 * ```
 */
export abstract class CreateEndpoint<
  E extends Env = Env,
  M extends MetaInput = MetaInput,
> extends OpenAPIRoute<E> {
  abstract _meta: M;

  // Hook execution mode
  protected afterHookMode: HookMode = 'sequential';

  /**
   * Generates OpenAPI schema from meta configuration.
   */
  getSchema(): OpenAPIRouteSchema {
    const name = this._meta.model.resourceName;
    return {
      ...this.schema,
      request: {
        body: jsonContentRequired(this._meta.fields, `${name} to create`),
      },
      responses: {
        201: jsonContent(successSchema(this._meta.model.schema), `${name} created`),
        400: jsonContent(ErrorResponseSchema, 'Validation error'),
        404: jsonContent(ErrorResponseSchema, 'Referenced resource not found'),
      },
    };
  }

  /**
   * Gets the validated request body.
   */
  protected async getObject(): Promise<RequestObject<M>> {
    const { body } = await this.getValidatedData<RequestObject<M>>();
    if (body === undefined) {
      throw new InputValidationException('Request body is required');
    }
    return body;
  }

  /**
   * Lifecycle hook: called before create operation.
   * Override to adjust the request before it reaches `create`.
   */
  async before(data: RequestObject<M>): Promise<RequestObject<M>> {
    return data;
  }

  /**
   * Lifecycle hook: called after create operation.
   * In `fire-and-forget` mode its result is ignored.
   */
  async after(item: ModelObject<M['model']>): Promise<ModelObject<M['model']>> {
    return item;
  }

  /**
   * Optional transform applied to the created item before response.
   */
  protected transform(item: ModelObject<M['model']>): unknown {
    return item;
  }

  abstract create(data: RequestObject<M>): Promise<ModelObject<M['model']>>;

  async handle(): Promise<Response> {
    const data = await this.before(await this.getObject());
    let item = await this.create(data);

    if (this.afterHookMode === 'fire-and-forget') {
      this.runAfterResponse(this.after(item));
    } else {
      item = await this.after(item);
    }

    return this.success(this.transform(item), 201);
  }
}
