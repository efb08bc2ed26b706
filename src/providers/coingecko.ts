// CoinGecko: implementation of CryptoPrices.

import { HttpClientRequest } from "@effect/platform";
import { Clock, Effect, Layer, Schema } from "effect";
import { AppConfig } from "../config.ts";
import type { Quote } from "../domain.ts";
import { fetchJson, makeGuard, StatusCheckedClient, type Upstream } from "../http.ts";
import { normalizeCryptoIds } from "../instrument.ts";
import {
  CryptoPrices,
  MalformedResponse,
  ProviderUnavailable,
} from "../market-data.ts";

// --- CoinGecko /simple/price response schema ---

// { "bitcoin": { "usd": 67012.5 }, "ethereum": { "usd": 3521.9 } }
const SimplePriceResponse = Schema.Record({
  key: Schema.String,
  value: Schema.Record({ key: Schema.String, value: Schema.NullOr(Schema.Number) }),
});

// --- Decode CoinGecko response into quotes ---

export function decodeCoinGeckoResponse(
  json: unknown,
  ids: ReadonlyArray<string>,
  vsCurrency: string,
  fetchedAt: number,
): Effect.Effect<ReadonlyMap<string, Quote>, MalformedResponse> {
  return Schema.decodeUnknown(SimplePriceResponse)(json).pipe(
    Effect.mapError(
      (e) =>
        new MalformedResponse({
          provider: "crypto",
          message: `coingecko: invalid response: ${e.message}`,
        }),
    ),
    Effect.map((prices) => {
      const quotes = new Map<string, Quote>();
      for (const id of ids) {
        const price = prices[id]?.[vsCurrency];
        // Unknown ids are simply missing from the payload.
        if (typeof price !== "number") continue;
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
  );
}

// --- CoinGecko layer ---

export const CoinGeckoLive = Layer.effect(
  CryptoPrices,
  Effect.gen(function* () {
    const client = yield* StatusCheckedClient;
    const config = yield* AppConfig;
    const upstream: Upstream = {
      provider: "crypto",
      name: "coingecko",
      timeout: config.requestTimeout,
    };
    const guard = yield* makeGuard(upstream, config.circuit);

    return CryptoPrices.of({
      getCryptoQuotes: (ids, vsCurrency) => {
        const wanted = normalizeCryptoIds(ids);
        const currency = vsCurrency.trim().toLowerCase();
        if (wanted.length === 0) return Effect.succeed(new Map<string, Quote>());

        const request = HttpClientRequest.get(
          `${config.baseUrls.coinGecko}/simple/price`,
        ).pipe(
          HttpClientRequest.setUrlParams({
            ids: wanted.join(","),
            vs_currencies: currency,
          }),
          HttpClientRequest.acceptJson,
        );

        return guard(fetchJson(client, request, upstream)).pipe(
          Effect.zip(Clock.currentTimeMillis),
          Effect.flatMap(([json, now]) =>
            decodeCoinGeckoResponse(json, wanted, currency, now),
          ),
          Effect.catchTags({
            UpstreamError: (e) =>
              Effect.fail(
                new ProviderUnavailable({
                  provider: "crypto",
                  message: `coingecko: HTTP ${e.status}`,
                }),
              ),
            Timeout: (e) =>
              Effect.fail(
                new ProviderUnavailable({ provider: "crypto", message: e.message }),
              ),
          }),
        );
      },
    });
  }),
);
