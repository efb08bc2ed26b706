// NewsAPI /v2/everything: keyed headline provider.

import { HttpClientRequest } from "@effect/platform";
import { Effect, Option, Redacted, Schema } from "effect";
import { AppConfig } from "../config.ts";
import type { Headline } from "../domain.ts";
import { fetchJson, makeGuard, StatusCheckedClient, type Upstream } from "../http.ts";
import { MalformedResponse, Unauthorized } from "../market-data.ts";
import type { TopicFetcher } from "../news.ts";

const MAX_PAGE_SIZE = 100;

// --- NewsAPI response schema ---

const NewsApiArticle = Schema.Struct({
  source: Schema.optional(
    Schema.NullOr(Schema.Struct({ name: Schema.optional(Schema.NullOr(Schema.String)) })),
  ),
  title: Schema.NullOr(Schema.String),
  url: Schema.optional(Schema.NullOr(Schema.String)),
  publishedAt: Schema.optional(Schema.NullOr(Schema.String)),
});

const NewsApiResponse = Schema.Struct({
  status: Schema.Literal("ok"),
  articles: Schema.Array(NewsApiArticle),
});

// --- Decode NewsAPI response into headlines ---

export function decodeNewsApiResponse(
  json: unknown,
): Effect.Effect<ReadonlyArray<Headline>, MalformedResponse> {
  return Schema.decodeUnknown(NewsApiResponse)(json).pipe(
    Effect.mapError(
      (e) =>
        new MalformedResponse({
          provider: "news",
          message: `newsapi: invalid response: ${e.message}`,
        }),
    ),
    Effect.map((response) =>
      response.articles.flatMap((article): Array<Headline> => {
        // Articles taken down by the publisher keep their slot as "[Removed]".
        if (article.title === null || article.title === "[Removed]") return [];
        const published = article.publishedAt ? Date.parse(article.publishedAt) : NaN;
        return [
          {
            title: article.title,
            source: article.source?.name ?? null,
            url: article.url ?? null,
            publishedAt: Number.isNaN(published) ? null : published,
          },
        ];
      }),
    ),
  );
}

// --- NewsAPI fetcher ---

export const makeNewsApiFetcher = Effect.gen(function* () {
  const client = yield* StatusCheckedClient;
  const config = yield* AppConfig;
  const upstream: Upstream = {
    provider: "news",
    name: "newsapi",
    timeout: config.requestTimeout,
  };
  const guard = yield* makeGuard(upstream, config.circuit);

  const fetchTopic: TopicFetcher = (topic, count, lang) =>
    Option.match(config.newsApiKey, {
      onNone: () =>
        Effect.fail(
          new Unauthorized({ provider: "news", message: "NEWS_API_KEY is not set" }),
        ),
      onSome: (apiKey) =>
        guard(
          fetchJson(
            client,
            HttpClientRequest.get(`${config.baseUrls.newsApi}/everything`).pipe(
              HttpClientRequest.setUrlParams({
                q: topic,
                language: lang,
                sortBy: "publishedAt",
                pageSize: String(Math.min(count, MAX_PAGE_SIZE)),
              }),
              HttpClientRequest.setHeader("X-Api-Key", Redacted.value(apiKey)),
              HttpClientRequest.acceptJson,
            ),
            upstream,
          ).pipe(Effect.flatMap(decodeNewsApiResponse)),
        ).pipe(Effect.map((headlines) => headlines.slice(0, count))),
    });

  return fetchTopic;
});
