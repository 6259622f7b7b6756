/**
 * State blob codec.
 *
 * The conversation state travels as an opaque JSON blob:
 *   {"version":1,"pending":{...}|null,"digest":"<sha256 hex>"}
 *
 * The digest is taken over the RFC 8785 canonical JSON of `pending`, so a
 * blob edited or truncated in transit is detected on decode. Anything
 * that fails shape or digest checks decodes as Idle.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { isActionKind } from "@stockbook/types";
import type { FieldName } from "@stockbook/types";
import { fieldsOf, requiredFieldsOf } from "./action-model.js";
import type { ConversationState, PendingAction, StateEnvelope } from "./types.js";

export const STATE_VERSION = 1;

export const IDLE: ConversationState = { pending: null };

export type DecodeResult =
  | { readonly ok: true; readonly state: ConversationState }
  | { readonly ok: false; readonly state: ConversationState; readonly reason: string };

export function digestPending(pending: PendingAction | null): string {
  return createHash("sha256").update(canonicalize(pending)).digest("hex");
}

export function encodeState(state: ConversationState): string {
  const envelope: StateEnvelope = {
    version: STATE_VERSION,
    pending: state.pending,
    digest: digestPending(state.pending),
  };
  return JSON.stringify(envelope);
}

/**
 * Decode a blob. Missing blob → Idle; invalid blob → Idle with a reason.
 */
export function decodeState(blob: string | undefined): DecodeResult {
  if (blob === undefined || blob.trim() === "") {
    return { ok: true, state: IDLE };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(blob);
  } catch {
    return { ok: false, state: IDLE, reason: "State blob is not valid JSON" };
  }

  if (parsed === null || typeof parsed !== "object") {
    return { ok: false, state: IDLE, reason: "State blob is not an object" };
  }
  const envelope = parsed as Record<string, unknown>;

  if (envelope.version !== STATE_VERSION) {
    return { ok: false, state: IDLE, reason: `Unsupported state version ${String(envelope.version)}` };
  }
  if (typeof envelope.digest !== "string") {
    return { ok: false, state: IDLE, reason: "State blob has no digest" };
  }

  const raw = envelope.pending;
  let pending: PendingAction | null = null;
  if (raw !== null) {
    if (!isPendingAction(raw)) {
      return { ok: false, state: IDLE, reason: "Pending action has an invalid shape" };
    }
    pending = raw;
  }

  if (digestPending(pending) !== envelope.digest) {
    return { ok: false, state: IDLE, reason: "State digest mismatch" };
  }

  return { ok: true, state: { pending } };
}

// =============================================================================
// Guards
// =============================================================================

function isFieldList(value: unknown, allowed: readonly FieldName[]): value is FieldName[] {
  return (
    Array.isArray(value) &&
    value.every((v: unknown) => typeof v === "string" && allowed.some((f) => f === v))
  );
}

export function isPendingAction(value: unknown): value is PendingAction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;

  if (!isActionKind(v.kind)) return false;
  if (typeof v.originalText !== "string" || typeof v.createdAt !== "string") return false;
  if (!isFieldList(v.missing, requiredFieldsOf(v.kind))) return false;

  if (v.values === null || typeof v.values !== "object" || Array.isArray(v.values)) return false;
  const allowed = fieldsOf(v.kind);
  return Object.entries(v.values).every(
    ([key, slot]) => allowed.some((f) => f === key) && typeof slot === "string",
  );
}
