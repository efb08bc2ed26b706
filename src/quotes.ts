// MarketQuotes: equity, FX and commodity prices from an ordered list of
// tiers: a live quote first, the most recent daily close when the live
// endpoint has nothing.

import { Clock, Effect, Layer, Option } from "effect";
import { AppConfig } from "./config.ts";
import type { QuoteBasis } from "./domain.ts";
import { isTrippable } from "./http.ts";
import { type Instrument, resolveInstrument } from "./instrument.ts";
import {
  MarketQuotes,
  QuoteNotFound,
  type TransportError,
} from "./market-data.ts";
import { makeAlphaVantageTier } from "./providers/alpha-vantage.ts";
import { makeStooqTier } from "./providers/stooq.ts";
import { makeYahooChartTier } from "./providers/yahoo-finance.ts";

// --- Types ---

export interface PricePoint {
  readonly price: number;
  readonly currency: string;
}

export interface ResolvedPrice extends PricePoint {
  readonly basis: QuoteBasis;
}

/** One upstream that can price an instrument. `None` means the upstream
 *  answered but had no data for it. */
export interface QuoteTier {
  readonly name: string;
  readonly basis: QuoteBasis;
  readonly lookup: (
    instrument: Instrument,
  ) => Effect.Effect<Option.Option<PricePoint>, TransportError>;
}

// --- Tier fallback ---

/** Ask each tier in turn. An empty answer or an unhealthy-provider error
 *  moves on to the next tier; any other error propagates immediately. When
 *  no tier has a price the last provider error wins over "not found", since
 *  an outage says nothing about whether the symbol exists. */
export function resolvePrice(
  tiers: ReadonlyArray<QuoteTier>,
  instrument: Instrument,
): Effect.Effect<ResolvedPrice, QuoteNotFound | TransportError> {
  const loop = (
    index: number,
    lastError: Option.Option<TransportError>,
  ): Effect.Effect<ResolvedPrice, QuoteNotFound | TransportError> => {
    if (index >= tiers.length) {
      return Option.match(lastError, {
        onNone: () => Effect.fail(new QuoteNotFound({ symbol: instrument.symbol })),
        onSome: (e) => Effect.fail(e),
      });
    }

    const tier = tiers[index];

    return Effect.logDebug(`trying ${tier.name}`).pipe(
      Effect.zipRight(tier.lookup(instrument)),
      Effect.matchEffect({
        onFailure: (e) =>
          isTrippable(e)
            ? Effect.logDebug(`${tier.name} failed: ${e._tag}`).pipe(
                Effect.zipRight(loop(index + 1, Option.some(e))),
              )
            : Effect.fail(e),
        onSuccess: Option.match({
          onNone: () =>
            Effect.logDebug(`${tier.name} has no data`).pipe(
              Effect.zipRight(loop(index + 1, lastError)),
            ),
          onSome: (point) => Effect.succeed({ ...point, basis: tier.basis }),
        }),
      }),
    );
  };

  return loop(0, Option.none());
}

// --- Service ---

export function makeMarketQuotes(
  tiers: ReadonlyArray<QuoteTier>,
): typeof MarketQuotes.Service {
  return MarketQuotes.of({
    getQuote: (symbol, kind) =>
      Effect.gen(function* () {
        const instrument = yield* resolveInstrument(symbol, kind);
        const resolved = yield* resolvePrice(tiers, instrument);
        const fetchedAt = yield* Clock.currentTimeMillis;
        return {
          symbol: instrument.symbol,
          price: resolved.price,
          currency: resolved.currency,
          source: instrument.source,
          basis: resolved.basis,
          fetchedAt,
        };
      }).pipe(Effect.annotateLogs({ symbol, kind })),
  });
}

// --- Layer ---

export const MarketQuotesLive = Layer.effect(
  MarketQuotes,
  Effect.gen(function* () {
    const config = yield* AppConfig;

    const live = yield* Option.match(
      config.providers.quotes === "alphavantage"
        ? config.alphaVantageApiKey
        : Option.none(),
      {
        onNone: () =>
          config.providers.quotes === "alphavantage"
            ? Effect.logWarning(
                "ALPHA_VANTAGE_API_KEY is not set; using yahoo for live quotes",
              ).pipe(Effect.zipRight(makeYahooChartTier))
            : makeYahooChartTier,
        onSome: makeAlphaVantageTier,
      },
    );
    const lastClose = yield* makeStooqTier;

    yield* Effect.logDebug(`quote tiers: ${live.name} -> ${lastClose.name}`);
    return makeMarketQuotes([live, lastClose]);
  }),
);
