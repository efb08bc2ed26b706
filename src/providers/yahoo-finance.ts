// Yahoo Finance chart endpoint: live quote tier.

import { HttpClientRequest } from "@effect/platform";
import { Effect, Option, Schema } from "effect";
import { AppConfig } from "../config.ts";
import { fetchJson, makeGuard, StatusCheckedClient, type Upstream } from "../http.ts";
import type { Instrument } from "../instrument.ts";
import { MalformedResponse } from "../market-data.ts";
import type { PricePoint, QuoteTier } from "../quotes.ts";

// --- Yahoo response schema ---

// Illiquid symbols come back with a meta block but no regularMarketPrice.
const YahooMeta = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Schema.optional(Schema.Number),
  currency: Schema.optional(Schema.NullOr(Schema.String)),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(Schema.Struct({ meta: YahooMeta }))),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooChartResponseType = typeof YahooChartResponse.Type;

// --- Decode Yahoo response into a price ---

export function decodeYahooChart(
  json: unknown,
  instrument: Instrument,
): Effect.Effect<Option.Option<PricePoint>, MalformedResponse> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new MalformedResponse({
          provider: "equity",
          message: `yahoo: invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.map((response) => interpretYahooChart(response, instrument)),
  );
}

function interpretYahooChart(
  response: YahooChartResponseType,
  instrument: Instrument,
): Option.Option<PricePoint> {
  const { chart } = response;

  if (chart.error !== null || chart.result === null || chart.result.length === 0) {
    return Option.none();
  }

  const meta = chart.result[0].meta;
  if (meta.regularMarketPrice === undefined) return Option.none();

  return Option.some({
    price: meta.regularMarketPrice,
    currency: meta.currency ?? instrument.currency,
  });
}

// --- Yahoo chart tier ---

export const makeYahooChartTier = Effect.gen(function* () {
  const client = yield* StatusCheckedClient;
  const config = yield* AppConfig;
  const upstream: Upstream = {
    provider: "equity",
    name: "yahoo",
    timeout: config.requestTimeout,
  };
  const guard = yield* makeGuard(upstream, config.circuit);

  const tier: QuoteTier = {
    name: "yahoo",
    basis: "live",
    lookup: (instrument) => {
      const request = HttpClientRequest.get(
        `${config.baseUrls.yahooChart}/${encodeURIComponent(instrument.yahooSymbol)}`,
      ).pipe(
        // Yahoo rejects requests without a browser-like agent.
        HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
        HttpClientRequest.acceptJson,
      );
      return guard(
        fetchJson(client, request, upstream).pipe(
          Effect.flatMap((json) => decodeYahooChart(json, instrument)),
        ),
      ).pipe(
        // Unknown symbols are answered with 404 and a chart.error body.
        Effect.catchIf(
          (e) => e._tag === "UpstreamError" && e.status === 404,
          () => Effect.succeed(Option.none<PricePoint>()),
        ),
      );
    },
  };
  return tier;
});
