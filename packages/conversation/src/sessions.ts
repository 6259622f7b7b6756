/**
 * Conversation sessions — the latest state blob per user.
 *
 * Wraps the engine so that each user's messages run one at a time and
 * each one sees the state the previous one left behind.
 */

import type { ActionParse } from "@stockbook/types";
import type { CompletionEngine } from "./engine.js";
import type { HandleResult } from "./types.js";
import { UserSerializer } from "./user-serializer.js";

export class ConversationSessions {
  private readonly _states = new Map<string, string>();
  private readonly _engine: CompletionEngine;
  private readonly _serializer: UserSerializer;

  constructor(engine: CompletionEngine, serializer?: UserSerializer) {
    this._engine = engine;
    this._serializer = serializer ?? new UserSerializer();
  }

  /**
   * Handle a message for a user. An explicit state blob takes precedence
   * over the stored one.
   */
  handleMessage(userId: string, parse: ActionParse, state?: string): Promise<HandleResult> {
    return this._serializer.run(userId, async () => {
      const result = await this._engine.handle(state ?? this._states.get(userId), parse);
      this._states.set(userId, result.state);
      return result;
    });
  }

  stateOf(userId: string): string | undefined {
    return this._states.get(userId);
  }

  reset(userId: string): void {
    this._states.delete(userId);
  }
}
