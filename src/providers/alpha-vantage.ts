// Alpha Vantage GLOBAL_QUOTE: alternative live quote tier for equities.

import { HttpClientRequest } from "@effect/platform";
import { Effect, Option, Redacted, Schema } from "effect";
import { AppConfig } from "../config.ts";
import { fetchJson, makeGuard, StatusCheckedClient, type Upstream } from "../http.ts";
import type { Instrument } from "../instrument.ts";
import { MalformedResponse, ProviderUnavailable } from "../market-data.ts";
import type { PricePoint, QuoteTier } from "../quotes.ts";

// --- Alpha Vantage response schema ---

const AlphaVantageGlobalQuote = Schema.Struct({
  "01. symbol": Schema.String,
  "05. price": Schema.String,
});

// --- Decode Alpha Vantage response into a price ---

export function decodeAlphaVantageResponse(
  json: unknown,
  instrument: Instrument,
): Effect.Effect<Option.Option<PricePoint>, MalformedResponse | ProviderUnavailable> {
  if (typeof json !== "object" || json === null) {
    return Effect.fail(
      new MalformedResponse({
        provider: "equity",
        message: "alphavantage: response is not an object",
      }),
    );
  }

  // Alpha Vantage reports rate limits and key problems with HTTP 200 and a
  // top-level message field.
  for (const field of ["Error Message", "Note", "Information"]) {
    const message: unknown = Reflect.get(json, field);
    if (typeof message === "string") {
      return Effect.fail(
        new ProviderUnavailable({ provider: "equity", message: `alphavantage: ${message}` }),
      );
    }
  }

  const globalQuote: unknown = Reflect.get(json, "Global Quote");
  if (
    typeof globalQuote !== "object" ||
    globalQuote === null ||
    Object.keys(globalQuote).length === 0
  ) {
    return Effect.succeed(Option.none());
  }

  return Schema.decodeUnknown(AlphaVantageGlobalQuote)(globalQuote).pipe(
    Effect.mapError(
      (e) =>
        new MalformedResponse({
          provider: "equity",
          message: `alphavantage: invalid response: ${e.message}`,
        }),
    ),
    Effect.flatMap((q) => {
      const price = Number(q["05. price"]);
      return Number.isNaN(price)
        ? Effect.fail(
            new MalformedResponse({
              provider: "equity",
              message: "alphavantage: non-numeric price in quote data",
            }),
          )
        : // GLOBAL_QUOTE does not return a currency.
          Effect.succeed(Option.some({ price, currency: instrument.currency }));
    }),
  );
}

// --- Alpha Vantage tier ---

export const makeAlphaVantageTier = (apiKey: Redacted.Redacted) =>
  Effect.gen(function* () {
    const client = yield* StatusCheckedClient;
    const config = yield* AppConfig;
    const upstream: Upstream = {
      provider: "equity",
      name: "alphavantage",
      timeout: config.requestTimeout,
    };
    const guard = yield* makeGuard(upstream, config.circuit);

    const tier: QuoteTier = {
      name: "alphavantage",
      basis: "live",
      lookup: (instrument) => {
        // GLOBAL_QUOTE only covers listed securities; other kinds go
        // straight to the daily-close tier.
        if (instrument.kind !== "equity") {
          return Effect.succeed(Option.none());
        }
        const request = HttpClientRequest.get(config.baseUrls.alphaVantage).pipe(
          HttpClientRequest.setUrlParams({
            function: "GLOBAL_QUOTE",
            symbol: instrument.symbol,
            apikey: Redacted.value(apiKey),
          }),
          HttpClientRequest.acceptJson,
        );
        return guard(
          fetchJson(client, request, upstream).pipe(
            Effect.flatMap((json) => decodeAlphaVantageResponse(json, instrument)),
          ),
        );
      },
    };
    return tier;
  });
