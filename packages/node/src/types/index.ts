/**
 * Type barrel — re-exports all public types from @stockbook/node.
 */

// DTOs
export {
  ParseKindSchema,
  RawFieldValueSchema,
  ActionParseSchema,
  EntityClassSchema,
  SendMessageSchema,
  UserIdSchema,
  ProductIdSchema,
  ResolveQuerySchema,
  AuditQuerySchema,
} from "./dto.js";
export type { SendMessageDto, ResolveQuery, AuditQuery } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
