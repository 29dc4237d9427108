export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export { createError } from "./core/utils/create-error"
export { isAppError } from "./core/utils/is-app-error"
export type {
  AppError,
  ErrorCode,
  ErrorContext,
  SerializeOptions,
  SerializedError,
} from "./ports/error"
