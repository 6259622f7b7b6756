/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const ParseKindSchema = z.enum([
  "register_purchase",
  "register_expense",
  "register_usage",
  "query_stock",
  "supplement",
  "cancel",
  "unknown",
]);

export const RawFieldValueSchema = z.union([z.string(), z.number(), z.null()]);

export const ActionParseSchema = z.object({
  actionKind: ParseKindSchema,
  fields: z.record(RawFieldValueSchema).default({}),
  originalText: z.string().max(4096).default(""),
  confidence: z.number().min(0).max(1).optional(),
});

export const EntityClassSchema = z.enum(["expenseType", "category", "paymentMethod", "supplier", "product"]);

// =============================================================================
// Conversation DTOs
// =============================================================================

export const SendMessageSchema = z.object({
  parse: ActionParseSchema,
  /** State blob from the previous reply; overrides the stored one */
  state: z.string().max(65536).optional(),
});

export type SendMessageDto = z.infer<typeof SendMessageSchema>;

export const UserIdSchema = z.string().min(1).max(128);

// =============================================================================
// Stock & Catalog DTOs
// =============================================================================

export const ProductIdSchema = z.coerce.number().int().positive();

export const ResolveQuerySchema = z.object({
  name: z.string().trim().min(1).max(256),
});

export type ResolveQuery = z.infer<typeof ResolveQuerySchema>;

export const AuditQuerySchema = z.object({
  actor: z.string().optional(),
  action: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export type AuditQuery = z.infer<typeof AuditQuerySchema>;
