/**
 * @pkgshelf/api
 *
 * Error taxonomy and response shaping shared by the HTTP apps.
 */

export {
  APIError,
  type ErrorResponse,
  expectValid,
  ForbiddenError,
  getStatusCode,
  MalformedRequestError,
  NotFoundError,
  sanitizeErrorMessage,
  StorageError,
  toError,
  toErrorResponse,
  UpstreamError,
  ValidationError,
} from './error-handler'
