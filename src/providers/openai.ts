// OpenAI chat completions: implementation of LanguageModel.
//
// Calls are never retried: a completion costs money and is not idempotent.

import { HttpClientRequest } from "@effect/platform";
import { Duration, Effect, Layer, Option, Redacted, Schema } from "effect";
import { AppConfig } from "../config.ts";
import type { ChatMessage } from "../domain.ts";
import { fetchJson, StatusCheckedClient } from "../http.ts";
import { LanguageModel, MalformedResponse, Unauthorized } from "../market-data.ts";

// --- Response schema ---

const ChatCompletion = Schema.Struct({
  choices: Schema.Array(
    Schema.Struct({
      message: Schema.Struct({ content: Schema.NullOr(Schema.String) }),
    }),
  ),
});

export function decodeChatCompletion(
  json: unknown,
): Effect.Effect<string, MalformedResponse> {
  const malformed = (message: string) =>
    new MalformedResponse({ provider: "llm", message: `openai: ${message}` });

  return Schema.decodeUnknown(ChatCompletion)(json).pipe(
    Effect.mapError((e) => malformed(`invalid response: ${e.message}`)),
    Effect.flatMap(({ choices }) => {
      const content = choices[0]?.message.content?.trim() ?? "";
      return content.length > 0
        ? Effect.succeed(content)
        : Effect.fail(malformed("response carries no message text"));
    }),
  );
}

// --- Layer ---

export const OpenAiLanguageModelLive = Layer.effect(
  LanguageModel,
  Effect.gen(function* () {
    const client = yield* StatusCheckedClient;
    const { openAi } = yield* AppConfig;

    const complete = (
      messages: ReadonlyArray<ChatMessage>,
      timeoutSeconds: number,
    ) =>
      Effect.gen(function* () {
        const apiKey = yield* Option.match(openAi.apiKey, {
          onNone: () =>
            Effect.fail(
              new Unauthorized({ provider: "llm", message: "OPENAI_API_KEY is not set" }),
            ),
          onSome: Effect.succeed,
        });

        const request = HttpClientRequest.post(`${openAi.baseUrl}/chat/completions`).pipe(
          HttpClientRequest.bearerToken(Redacted.value(apiKey)),
          HttpClientRequest.bodyUnsafeJson({
            model: openAi.model,
            messages: messages.map(({ role, content }) => ({ role, content })),
          }),
        );

        yield* Effect.logDebug(`sending ${messages.length} message(s) to ${openAi.model}`);
        const json = yield* fetchJson(client, request, {
          provider: "llm",
          name: "openai",
          timeout: Duration.seconds(timeoutSeconds),
        });
        return yield* decodeChatCompletion(json);
      });

    return LanguageModel.of({
      complete,
      summarize: (prompt, timeoutSeconds) =>
        complete([{ role: "user", content: prompt }], timeoutSeconds),
    });
  }),
);
