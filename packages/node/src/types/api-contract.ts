/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 */

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;
  };
}
