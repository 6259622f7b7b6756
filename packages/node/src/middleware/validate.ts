/**
 * Zod validation helpers.
 *
 * Validate request bodies, params and queries against a Zod schema and
 * turn failures into a 400 error envelope.
 */

import type { Context } from "hono";
import type { z, ZodError, ZodTypeAny } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export type Validated<T> =
  | { readonly ok: true; readonly data: T }
  | { readonly ok: false; readonly response: Response };

/**
 * Parse and validate the JSON request body.
 */
export async function validateBody<S extends ZodTypeAny>(
  c: Context,
  schema: S,
): Promise<Validated<z.infer<S>>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return {
      ok: false,
      response: c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"), 400),
    };
  }
  return validateValue(c, schema, body, "Request body validation failed");
}

/**
 * Validate an already-extracted value (a path param, the query record).
 */
export function validateValue<S extends ZodTypeAny>(
  c: Context,
  schema: S,
  value: unknown,
  message: string,
): Validated<z.infer<S>> {
  const result = schema.safeParse(value);
  if (!result.success) {
    return {
      ok: false,
      response: c.json(
        createErrorEnvelope("VALIDATION_ERROR", message, {
          issues: formatZodErrors(result.error),
        }),
        400,
      ),
    };
  }
  return { ok: true, data: result.data };
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
