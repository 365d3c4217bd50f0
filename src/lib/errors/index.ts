/**
 * Error types barrel export
 */
export {
  DataError,
  QueryError,
  ConnectionError,
  DataTransformError,
  IntegrityError,
  isDataError,
  isIntegrityError,
  wrapDatabaseError,
} from './data-errors';
export type { IntegrityViolation } from './data-errors';
export {
  RequestError,
  ValidationError,
  UnauthorizedError,
  NotFoundError,
  ConflictError,
  isRequestError,
} from './request-errors';
