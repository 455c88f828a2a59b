export { OldClient } from './client.js';
export {
  OldAuthError,
  OldError,
  OldForbiddenError,
  OldNotFoundError,
  OldServerError,
  OldValidationError,
  createOldError,
} from './errors.js';
export type { OldErrorContext } from './errors.js';
export type { ListResult } from './methods/listing.js';
export type * from './types.js';
