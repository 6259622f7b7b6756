/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, statusFor } from "./error-handler.js";
export type { ErrorStatus } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry, RequestLogFn } from "./logger.js";
export { validateBody, validateValue } from "./validate.js";
export type { Validated } from "./validate.js";
export { computeETag, setETag } from "./etag.js";
