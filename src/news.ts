// NewsFeed: headlines gathered topic by topic until the limit is met.

import { Effect, Either, Layer } from "effect";
import { AppConfig } from "./config.ts";
import type { Headline } from "./domain.ts";
import {
  NewsFeed,
  ProviderUnavailable,
  type TransportError,
  type Unauthorized,
} from "./market-data.ts";
import { makeNewsApiFetcher } from "./providers/newsapi.ts";
import { makeYahooNewsFetcher } from "./providers/yahoo-news.ts";

/** Fetches at most `count` headlines for one topic. */
export type TopicFetcher = (
  topic: string,
  count: number,
  lang: string,
) => Effect.Effect<ReadonlyArray<Headline>, TransportError | Unauthorized>;

/**
 * Walk `topics` in order, one provider call each, asking only for what is
 * still missing and stopping once `limit` headlines are in hand. A failing
 * topic contributes nothing; only when every attempted topic failed does
 * the whole lookup fail. Repeated URLs are kept once.
 */
export function collectHeadlines(
  fetchTopic: TopicFetcher,
  topics: ReadonlyArray<string>,
  limit: number,
  lang: string,
): Effect.Effect<ReadonlyArray<Headline>, ProviderUnavailable> {
  return Effect.gen(function* () {
    const collected: Array<Headline> = [];
    if (limit <= 0 || topics.length === 0) return collected;

    const seenUrls = new Set<string>();
    const failures: Array<string> = [];
    let attempted = 0;

    for (const topic of topics) {
      if (collected.length >= limit) break;
      attempted++;

      const result = yield* Effect.either(
        fetchTopic(topic, limit - collected.length, lang),
      );
      if (Either.isLeft(result)) {
        failures.push(`${topic}: ${result.left._tag}`);
        yield* Effect.logWarning(`headlines for "${topic}" failed`).pipe(
          Effect.annotateLogs("error", result.left.message),
        );
        continue;
      }

      for (const headline of result.right) {
        if (collected.length >= limit) break;
        if (headline.url !== null) {
          if (seenUrls.has(headline.url)) continue;
          seenUrls.add(headline.url);
        }
        collected.push(headline);
      }
    }

    if (failures.length === attempted) {
      return yield* Effect.fail(
        new ProviderUnavailable({
          provider: "news",
          message: `every topic lookup failed (${failures.join("; ")})`,
        }),
      );
    }
    return collected;
  });
}

// --- Layer ---

export const NewsFeedLive = Layer.effect(
  NewsFeed,
  Effect.gen(function* () {
    const config = yield* AppConfig;
    const fetchTopic =
      config.providers.news === "newsapi"
        ? yield* makeNewsApiFetcher
        : yield* makeYahooNewsFetcher;

    return NewsFeed.of({
      getHeadlines: (topics, limit, lang) =>
        collectHeadlines(fetchTopic, topics, limit, lang),
    });
  }),
);
