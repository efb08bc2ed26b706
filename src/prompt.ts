// Fixed prompt templates and the policy texts attached to AI output.

import { Effect, type ParseResult } from "effect";
import { type ChatMessage, encodeSnapshotJson, type Snapshot } from "./domain.ts";
import type { LanguageModelError } from "./market-data.ts";

export const DISCLAIMER =
  "Educational research only, not financial advice. Market data may be delayed, stale or incomplete.";

export const AI_NOT_CONFIGURED = "AI is not configured (set OPENAI_API_KEY).";

export const RESEARCH_ASSISTANT_PROMPT =
  "You are an investment research assistant. Be helpful, concise, and neutral. " +
  "You can discuss crypto, stocks, ETFs, forex and macro news. " +
  "Remind the user that you are not giving financial advice. " +
  "If something is unknown, say so.";

const ADVICE_INSTRUCTIONS = [
  "You are a market research assistant.",
  "Answer the user's question using the market snapshot below.",
  "Quotes with basis \"last_close\" are the previous daily close, not a live price.",
  "A quote with a null price was not found by the provider.",
  "If the snapshot lacks what the question needs, say so instead of guessing.",
  "Be concise and neutral.",
].join("\n");

/** The advice prompt: fixed instructions, the snapshot as wire JSON, and
 *  the user's question verbatim. */
export function renderAdvicePrompt(
  snapshot: Snapshot,
  userQuery: string,
): Effect.Effect<string, ParseResult.ParseError> {
  return Effect.map(
    encodeSnapshotJson(snapshot),
    (json) =>
      `${ADVICE_INSTRUCTIONS}\n\nMarket snapshot (JSON):\n${json}\n\nQuestion:\n${userQuery}`,
  );
}

/** Prepend the research-assistant system prompt unless the conversation
 *  already carries its own. */
export function withSystemPrompt(
  messages: ReadonlyArray<ChatMessage>,
): ReadonlyArray<ChatMessage> {
  return messages.some((m) => m.role === "system")
    ? messages
    : [{ role: "system", content: RESEARCH_ASSISTANT_PROMPT }, ...messages];
}

/** Narrative shown in place of model output when the model call failed. */
export function describeAdviceFailure(
  error: LanguageModelError | ParseResult.ParseError,
): string {
  const prefix = "AI commentary is unavailable right now";
  switch (error._tag) {
    case "Unauthorized":
      return AI_NOT_CONFIGURED;
    case "UpstreamError":
      return `${prefix}: the AI provider answered with HTTP ${error.status}. The market data above is still current.`;
    case "Timeout":
      return `${prefix}: the AI provider did not answer in time. The market data above is still current.`;
    case "MalformedResponse":
      return `${prefix}: the AI provider sent an unreadable answer. The market data above is still current.`;
    case "ProviderUnavailable":
      return `${prefix}: the AI provider could not be reached. The market data above is still current.`;
    case "ParseError":
      return `${prefix}: the snapshot could not be prepared for the AI provider.`;
  }
}
