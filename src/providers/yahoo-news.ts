// Yahoo Finance search: keyless headline provider.

import { HttpClientRequest } from "@effect/platform";
import { Effect, Schema } from "effect";
import { AppConfig } from "../config.ts";
import type { Headline } from "../domain.ts";
import { fetchJson, makeGuard, StatusCheckedClient, type Upstream } from "../http.ts";
import { MalformedResponse } from "../market-data.ts";
import type { TopicFetcher } from "../news.ts";

// --- Yahoo search response schema ---

const YahooNewsItem = Schema.Struct({
  title: Schema.String,
  publisher: Schema.optional(Schema.String),
  link: Schema.optional(Schema.String),
  providerPublishTime: Schema.optional(Schema.Number), // epoch seconds
});

const YahooSearchResponse = Schema.Struct({
  news: Schema.optionalWith(Schema.Array(YahooNewsItem), { default: () => [] }),
});

export function decodeYahooNews(
  json: unknown,
): Effect.Effect<ReadonlyArray<Headline>, MalformedResponse> {
  return Schema.decodeUnknown(YahooSearchResponse)(json).pipe(
    Effect.mapError(
      (e) =>
        new MalformedResponse({
          provider: "news",
          message: `yahoo: invalid search response: ${e.message}`,
        }),
    ),
    Effect.map(({ news }) =>
      news.map((item) => ({
        title: item.title,
        source: item.publisher ?? null,
        url: item.link ?? null,
        publishedAt:
          item.providerPublishTime === undefined ? null : item.providerPublishTime * 1000,
      })),
    ),
  );
}

export const makeYahooNewsFetcher = Effect.gen(function* () {
  const client = yield* StatusCheckedClient;
  const config = yield* AppConfig;
  const upstream: Upstream = {
    provider: "news",
    name: "yahoo-search",
    timeout: config.requestTimeout,
  };
  const guard = yield* makeGuard(upstream, config.circuit);

  const fetchTopic: TopicFetcher = (topic, count, lang) =>
    guard(
      fetchJson(
        client,
        HttpClientRequest.get(config.baseUrls.yahooSearch).pipe(
          HttpClientRequest.setUrlParams({
            q: topic,
            quotesCount: "0",
            newsCount: String(count),
            lang,
          }),
          HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
          HttpClientRequest.acceptJson,
        ),
        upstream,
      ).pipe(Effect.flatMap(decodeYahooNews)),
    ).pipe(Effect.map((headlines) => headlines.slice(0, count)));

  return fetchTopic;
});
