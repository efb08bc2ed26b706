// Market data aggregator: the façade callers use.
//
// buildSnapshot fans out to every adapter at once, absorbs individual
// failures, and only gives up when every adapter that was asked for data
// failed. getAdvice never fails: without a model, or when the model call
// fails, the narrative explains why.

import { Clock, Context, Effect, Either, Layer, Option } from "effect";
import { AppConfig } from "./config.ts";
import type {
  AdviceResult,
  ChatMessage,
  Headline,
  InstrumentRef,
  Quote,
  Snapshot,
} from "./domain.ts";
import { type Instrument, normalizeCryptoIds, resolveInstrument } from "./instrument.ts";
import {
  AllProvidersUnavailable,
  CryptoPrices,
  type InvalidSymbol,
  LanguageModel,
  type LanguageModelError,
  MarketQuotes,
  NewsFeed,
  Unauthorized,
} from "./market-data.ts";
import {
  AI_NOT_CONFIGURED,
  DISCLAIMER,
  describeAdviceFailure,
  renderAdvicePrompt,
  withSystemPrompt,
} from "./prompt.ts";

// --- Types ---

export interface SnapshotRequest {
  readonly cryptoIds: ReadonlyArray<string>;
  readonly tickers: ReadonlyArray<InstrumentRef>;
  readonly newsTopics: ReadonlyArray<string>;
  readonly newsLimit: number;
  readonly lang: string;
  /** Overrides the configured quote currency for crypto prices. */
  readonly vsCurrency?: string;
}

/** What one adapter contributed to a snapshot. */
type Contribution<A> =
  | { readonly _tag: "Skipped" }
  | { readonly _tag: "Delivered"; readonly value: A }
  | { readonly _tag: "Failed"; readonly reason: string };

const skipped: Contribution<never> = { _tag: "Skipped" };
const delivered = <A>(value: A): Contribution<A> => ({ _tag: "Delivered", value });
const failed = (reason: string): Contribution<never> => ({ _tag: "Failed", reason });

const valueOr = <A>(c: Contribution<A>, fallback: A): A =>
  c._tag === "Delivered" ? c.value : fallback;

// --- Service ---

export class MarketDataAggregator extends Context.Tag("MarketDataAggregator")<
  MarketDataAggregator,
  {
    readonly buildSnapshot: (
      request: SnapshotRequest,
    ) => Effect.Effect<Snapshot, InvalidSymbol | AllProvidersUnavailable>;
    readonly getAdvice: (
      snapshot: Snapshot,
      userQuery: string,
    ) => Effect.Effect<AdviceResult>;
    readonly chat: (
      messages: ReadonlyArray<ChatMessage>,
    ) => Effect.Effect<string, LanguageModelError>;
  }
>() {}

export const makeMarketDataAggregator = Effect.gen(function* () {
  const crypto = yield* CryptoPrices;
  const quotes = yield* MarketQuotes;
  const news = yield* NewsFeed;
  const llm = yield* Effect.serviceOption(LanguageModel);
  const config = yield* AppConfig;

  const cryptoContribution = (
    ids: ReadonlyArray<string>,
    vsCurrency: string,
  ): Effect.Effect<Contribution<ReadonlyArray<Quote>>> => {
    if (ids.length === 0) return Effect.succeed(skipped);
    return crypto.getCryptoQuotes(ids, vsCurrency).pipe(
      // Reorder by request, whatever order the provider answered in.
      Effect.map((found) => delivered(ids.flatMap((id) => found.get(id) ?? []))),
      Effect.catchAll((e) =>
        Effect.logWarning("crypto prices unavailable").pipe(
          Effect.annotateLogs("error", e.message),
          Effect.as(failed(`crypto: ${e._tag}`)),
        ),
      ),
    );
  };

  const tickerContribution = (
    instruments: ReadonlyArray<Instrument>,
  ): Effect.Effect<Contribution<ReadonlyArray<Quote>>> => {
    if (instruments.length === 0) return Effect.succeed(skipped);
    return Effect.forEach(
      instruments,
      (instrument) =>
        quotes.getQuote(instrument.symbol, instrument.kind).pipe(
          // Both tiers were asked, so the answer comes from the last one.
          Effect.catchTag("QuoteNotFound", () =>
            Effect.map(Clock.currentTimeMillis, (fetchedAt): Quote => ({
              symbol: instrument.symbol,
              price: null,
              currency: instrument.currency,
              source: instrument.source,
              basis: "last_close",
              fetchedAt,
            })),
          ),
          Effect.tapError((e) =>
            Effect.logWarning(`quote for ${instrument.symbol} unavailable`).pipe(
              Effect.annotateLogs("error", e._tag),
            ),
          ),
          Effect.either,
        ),
      // forEach keeps input order regardless of which call finishes first.
      { concurrency: "unbounded" },
    ).pipe(
      Effect.map((outcomes) => {
        const answered = outcomes.flatMap((o) => (Either.isRight(o) ? [o.right] : []));
        return answered.length === 0
          ? failed(`equity: all ${outcomes.length} quote lookups failed`)
          : delivered(answered);
      }),
    );
  };

  const newsContribution = (
    request: SnapshotRequest,
  ): Effect.Effect<Contribution<ReadonlyArray<Headline>>> => {
    if (request.newsTopics.length === 0 || request.newsLimit <= 0) {
      return Effect.succeed(skipped);
    }
    return news.getHeadlines(request.newsTopics, request.newsLimit, request.lang).pipe(
      Effect.map((headlines) => delivered(headlines)),
      Effect.catchAll((e) =>
        Effect.logWarning("headlines unavailable").pipe(
          Effect.annotateLogs("error", e.message),
          Effect.as(failed(`news: ${e._tag}`)),
        ),
      ),
    );
  };

  const buildSnapshot = (request: SnapshotRequest) =>
    Effect.gen(function* () {
      const requestedAt = yield* Clock.currentTimeMillis;
      // Bad input fails the request before anything goes over the network.
      const instruments = yield* Effect.forEach(request.tickers, (t) =>
        resolveInstrument(t.symbol, t.kind),
      );
      const cryptoIds = normalizeCryptoIds(request.cryptoIds);
      const vsCurrency = request.vsCurrency ?? config.vsCurrency;

      const [cryptoPart, tickerPart, newsPart] = yield* Effect.all(
        [
          cryptoContribution(cryptoIds, vsCurrency),
          tickerContribution(instruments),
          newsContribution(request),
        ],
        { concurrency: "unbounded" },
      );

      const asked = [cryptoPart, tickerPart, newsPart].filter((c) => c._tag !== "Skipped");
      const failures = asked.flatMap((c) => (c._tag === "Failed" ? [c.reason] : []));
      if (asked.length > 0 && failures.length === asked.length) {
        return yield* Effect.fail(new AllProvidersUnavailable({ failures }));
      }

      const snapshot: Snapshot = {
        quotes: [...valueOr(cryptoPart, []), ...valueOr(tickerPart, [])],
        headlines: valueOr(newsPart, []),
        requestedAt,
      };
      return snapshot;
    }).pipe(Effect.withLogSpan("buildSnapshot"));

  const getAdvice = (snapshot: Snapshot, userQuery: string) =>
    Option.match(llm, {
      onNone: () => Effect.succeed(AI_NOT_CONFIGURED),
      onSome: (model) =>
        renderAdvicePrompt(snapshot, userQuery).pipe(
          Effect.flatMap((prompt) => model.summarize(prompt, config.llmTimeoutSeconds)),
          Effect.catchAll((e) =>
            Effect.logWarning("advice narrative unavailable").pipe(
              Effect.annotateLogs("error", e._tag),
              Effect.as(describeAdviceFailure(e)),
            ),
          ),
        ),
    }).pipe(
      Effect.map((narrative): AdviceResult => ({
        narrative,
        snapshot,
        disclaimer: DISCLAIMER,
      })),
    );

  const chat = (messages: ReadonlyArray<ChatMessage>) =>
    Option.match(llm, {
      onNone: () =>
        Effect.fail(new Unauthorized({ provider: "llm", message: AI_NOT_CONFIGURED })),
      onSome: (model) =>
        model.complete(withSystemPrompt(messages), config.llmTimeoutSeconds),
    });

  return MarketDataAggregator.of({ buildSnapshot, getAdvice, chat });
});

export const MarketDataAggregatorLive = Layer.effect(
  MarketDataAggregator,
  makeMarketDataAggregator,
);
