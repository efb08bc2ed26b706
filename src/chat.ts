// Interactive chat session: the whole history is sent on every turn so the
// model sees the conversation so far.

import { Effect } from "effect";
import type { ChatMessage } from "./domain.ts";
import type { LanguageModelError, TransportError, Unauthorized } from "./market-data.ts";

const END_WORDS = new Set(["", "exit", "quit"]);

/** An empty line, `exit` or `quit` ends the session. */
export function isEndOfChat(line: string): boolean {
  return END_WORDS.has(line.trim().toLowerCase());
}

export interface ChatSession<E, R> {
  readonly readLine: Effect.Effect<string, E, R>;
  readonly send: (
    history: ReadonlyArray<ChatMessage>,
  ) => Effect.Effect<string, LanguageModelError>;
  readonly onReply: (reply: string) => Effect.Effect<void>;
  /** A failed turn is reported here and dropped from the history. */
  readonly onTurnFailed: (error: TransportError) => Effect.Effect<void>;
}

/** Runs turns until the user ends the session and returns the final
 *  history. A missing model fails the session on the first turn. */
export function runChatSession<E, R>(
  session: ChatSession<E, R>,
): Effect.Effect<ReadonlyArray<ChatMessage>, E | Unauthorized, R> {
  const loop = (
    history: ReadonlyArray<ChatMessage>,
  ): Effect.Effect<ReadonlyArray<ChatMessage>, E | Unauthorized, R> =>
    Effect.flatMap(session.readLine, (line) => {
      if (isEndOfChat(line)) return Effect.succeed(history);
      const asked: ReadonlyArray<ChatMessage> = [
        ...history,
        { role: "user", content: line.trim() },
      ];
      return session.send(asked).pipe(
        Effect.matchEffect({
          onFailure: (e) =>
            e._tag === "Unauthorized"
              ? Effect.fail(e)
              : Effect.zipRight(session.onTurnFailed(e), loop(history)),
          onSuccess: (reply) =>
            Effect.zipRight(
              session.onReply(reply),
              loop([...asked, { role: "assistant", content: reply }]),
            ),
        }),
      );
    });

  return loop([]);
}
