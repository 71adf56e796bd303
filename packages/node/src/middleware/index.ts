/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, statusForRegistryError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  authMiddleware,
  callerHeaderMiddleware,
  API_KEY_HEADER,
  CALLER_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
