/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope response. Known domain error codes map to HTTP
 * statuses; anything else is a 500 with no internal detail.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 404 | 409 | 422 | 500 | 503;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Catalog errors
  NOT_FOUND: 404,
  UNKNOWN_ID: 404,
  DUPLICATE_NAME: 409,
  INVALID_SEED: 500,

  // Ledger errors
  INVALID_QUANTITY: 400,
  INVALID_REFERENCE: 422,
  UNKNOWN_PRODUCT: 404,
  STORE_FAILURE: 503,

  // Recorder errors
  VALIDATION_FAILED: 400,
  RECORDING_FAILED: 503,

  // Conversation errors
  INVALID_FIELD: 400,
};

function errorCodeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

export function statusFor(code: string | undefined): ErrorStatus {
  return code !== undefined ? STATUS_MAP[code] ?? 500 : 500;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the handler registered as Hono's onError. `onUnexpected` sees
 * every error that ends up as a 500.
 */
export function createErrorHandler(
  onUnexpected?: (err: Error, c: Context) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof ZodError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
          issues: err.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        }),
        400,
      );
    }

    const code = errorCodeOf(err);
    const status = statusFor(code);

    if (status === 500) {
      onUnexpected?.(err, c);
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
  };
}
