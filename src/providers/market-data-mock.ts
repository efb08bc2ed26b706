// Sample-data implementations of the adapters, for offline runs
// (`*_PROVIDER=test`) and tests.

import { Clock, Effect, Layer, Option } from "effect";
import type { Headline, Quote } from "../domain.ts";
import { normalizeCryptoIds, resolveInstrument } from "../instrument.ts";
import {
  CryptoPrices,
  MarketQuotes,
  NewsFeed,
  QuoteNotFound,
} from "../market-data.ts";
import { collectHeadlines } from "../news.ts";

// --- Sample data ---

const cryptoPricesUsd: Record<string, number> = {
  bitcoin: 64250.5,
  ethereum: 3120.75,
  solana: 142.3,
};

const marketPrices: Record<string, { price: number; basis: "live" | "last_close" }> = {
  AAPL: { price: 225.3, basis: "live" },
  MSFT: { price: 431.1, basis: "live" },
  EURUSD: { price: 1.0842, basis: "live" },
  GOLD: { price: 2381.4, basis: "last_close" },
};

const PUBLISHED = Date.parse("2025-06-15T16:00:00Z");

const headlinesByTopic: Record<string, ReadonlyArray<Headline>> = {
  markets: [
    {
      title: "Stocks edge higher ahead of central bank decision",
      source: "Sample Wire",
      url: "https://news.example.com/markets/1",
      publishedAt: PUBLISHED,
    },
    {
      title: "Bond yields steady as traders weigh inflation data",
      source: "Sample Wire",
      url: "https://news.example.com/markets/2",
      publishedAt: PUBLISHED - 3_600_000,
    },
  ],
  crypto: [
    {
      title: "Bitcoin holds range as ETF flows slow",
      source: "Sample Ledger",
      url: "https://news.example.com/crypto/1",
      publishedAt: PUBLISHED - 1_800_000,
    },
  ],
};

// --- Mock layers ---

export const CryptoPricesTestLive = Layer.succeed(
  CryptoPrices,
  CryptoPrices.of({
    getCryptoQuotes: (ids, vsCurrency) =>
      Effect.map(Clock.currentTimeMillis, (fetchedAt) => {
        const quotes = new Map<string, Quote>();
        for (const id of normalizeCryptoIds(ids)) {
          const price = cryptoPricesUsd[id];
          if (price === undefined) continue;
          quotes.set(id, {
            symbol: id,
            price,
            currency: vsCurrency.toUpperCase(),
            source: "crypto",
            basis: "live",
            fetchedAt,
          });
        }
        return quotes;
      }),
  }),
);

export const MarketQuotesTestLive = Layer.succeed(
  MarketQuotes,
  MarketQuotes.of({
    getQuote: (symbol, kind) =>
      Effect.gen(function* () {
        const instrument = yield* resolveInstrument(symbol, kind);
        const sample = marketPrices[instrument.symbol];
        if (sample === undefined) {
          return yield* Effect.fail(new QuoteNotFound({ symbol: instrument.symbol }));
        }
        return {
          symbol: instrument.symbol,
          price: sample.price,
          currency: instrument.currency,
          source: instrument.source,
          basis: sample.basis,
          fetchedAt: yield* Clock.currentTimeMillis,
        };
      }),
  }),
);

export const NewsFeedTestLive = Layer.succeed(
  NewsFeed,
  NewsFeed.of({
    getHeadlines: (topics, limit, lang) =>
      collectHeadlines(
        (topic, count) =>
          Effect.succeed(
            Option.fromNullable(headlinesByTopic[topic.toLowerCase()]).pipe(
              Option.map((items) => items.slice(0, count)),
              Option.getOrElse((): ReadonlyArray<Headline> => []),
            ),
          ),
        topics,
        limit,
        lang,
      ),
  }),
);

export const MarketDataTestLive = Layer.mergeAll(
  CryptoPricesTestLive,
  MarketQuotesTestLive,
  NewsFeedTestLive,
);
