export { CreateEndpoint } from './create.js';
export { ReadEndpoint } from './read.js';
export { UpdateEndpoint } from './update.js';
export {
  DeleteEndpoint,
  DeleteResultSchema,
  type CascadeResult,
  type DeleteOutcome,
  type DeleteResult,
} from './delete.js';
export { ListEndpoint } from './list.js';
export {
  buildResultInfo,
  getIdParamsSchema,
  getPaginationQuerySchema,
  parsePageOptions,
  type ListEndpointConfig,
} from './types.js';
