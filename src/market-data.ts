// Market data: adapter service definitions and domain errors.

import { Context, Data, Effect } from "effect";
import type {
  ChatMessage,
  Headline,
  InstrumentKind,
  Quote,
} from "./domain.ts";

// --- Errors ---

/** Which adapter an error came from. */
export type ProviderKind = "crypto" | "equity" | "news" | "llm";

export class InvalidSymbol extends Data.TaggedError("InvalidSymbol")<{
  readonly symbol: string;
  readonly kind: InstrumentKind;
  readonly reason: string;
}> {}

export class ProviderUnavailable extends Data.TaggedError("ProviderUnavailable")<{
  readonly provider: ProviderKind;
  readonly message: string;
}> {}

export class UpstreamError extends Data.TaggedError("UpstreamError")<{
  readonly provider: ProviderKind;
  readonly status: number;
}> {}

export class QuoteNotFound extends Data.TaggedError("QuoteNotFound")<{
  readonly symbol: string;
}> {}

export class MalformedResponse extends Data.TaggedError("MalformedResponse")<{
  readonly provider: ProviderKind;
  readonly message: string;
}> {}

export class Unauthorized extends Data.TaggedError("Unauthorized")<{
  readonly provider: ProviderKind;
  readonly message: string;
}> {}

export class Timeout extends Data.TaggedError("Timeout")<{
  readonly provider: ProviderKind;
  readonly message: string;
}> {}

export class AllProvidersUnavailable extends Data.TaggedError(
  "AllProvidersUnavailable",
)<{
  readonly failures: ReadonlyArray<string>;
}> {}

/** Everything a single outbound HTTP call can fail with. */
export type TransportError =
  | ProviderUnavailable
  | UpstreamError
  | MalformedResponse
  | Timeout;

export type CryptoPriceError = ProviderUnavailable | MalformedResponse;

export type QuoteError = InvalidSymbol | QuoteNotFound | TransportError;

export type LanguageModelError = Unauthorized | TransportError;

// --- Services ---

export class CryptoPrices extends Context.Tag("CryptoPrices")<
  CryptoPrices,
  {
    /** One batched lookup. Ids the provider does not know are absent from
     *  the result; keys are the lower-cased ids. */
    readonly getCryptoQuotes: (
      ids: ReadonlyArray<string>,
      vsCurrency: string,
    ) => Effect.Effect<ReadonlyMap<string, Quote>, CryptoPriceError>;
  }
>() {}

export class MarketQuotes extends Context.Tag("MarketQuotes")<
  MarketQuotes,
  {
    readonly getQuote: (
      symbol: string,
      kind: InstrumentKind,
    ) => Effect.Effect<Quote, QuoteError>;
  }
>() {}

export class NewsFeed extends Context.Tag("NewsFeed")<
  NewsFeed,
  {
    readonly getHeadlines: (
      topics: ReadonlyArray<string>,
      limit: number,
      lang: string,
    ) => Effect.Effect<ReadonlyArray<Headline>, ProviderUnavailable>;
  }
>() {}

export class LanguageModel extends Context.Tag("LanguageModel")<
  LanguageModel,
  {
    readonly summarize: (
      prompt: string,
      timeoutSeconds: number,
    ) => Effect.Effect<string, LanguageModelError>;
    readonly complete: (
      messages: ReadonlyArray<ChatMessage>,
      timeoutSeconds: number,
    ) => Effect.Effect<string, LanguageModelError>;
  }
>() {}
