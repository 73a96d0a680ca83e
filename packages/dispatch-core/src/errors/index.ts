/**
 * Error Module
 *
 * Error classes and factories shared by the registries, the bus and the boundaries.
 */
export {
  ErrorCategory,
  ERROR_CATEGORIES,
  isErrorCategory,
  DispatchError,
  ConfigurationError,
  UnknownMessageTypeError,
  DispatchErrors,
  isRetryableError,
  isDispatchErrorOfCategory,
} from "./DispatchError.js";
export type { ErrorCategoryType, DispatchErrorJSON } from "./DispatchError.js";

export { UnprocessableError, UnprocessableKinds } from "./UnprocessableError.js";
