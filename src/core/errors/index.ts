export {
  ErrorCode,
  type AppError,
  type FormatError,
  appError,
  validation,
  encodingError,
} from "./app-error.js";
