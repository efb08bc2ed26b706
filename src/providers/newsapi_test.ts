import { Effect, Either, Layer, Option, Redacted, TestContext } from "effect";
import { expect, test } from "vitest";
import { AppConfig, makeAppConfig } from "../config.ts";
import { jsonReply, mockHttpClient } from "../http-mock.ts";
import { decodeNewsApiResponse, makeNewsApiFetcher } from "./newsapi.ts";

// --- Test data ---

const article = (n: number) => ({
  source: { id: null, name: "Sample Wire" },
  title: `Headline ${n}`,
  url: `https://news.example.com/${n}`,
  publishedAt: "2025-06-15T12:00:00Z",
});

const okResponse = (count: number) => ({
  status: "ok",
  totalResults: count,
  articles: Array.from({ length: count }, (_, i) => article(i + 1)),
});

// --- decodeNewsApiResponse ---

test("decodeNewsApiResponse: maps articles to headlines", async () => {
  const headlines = await Effect.runPromise(decodeNewsApiResponse(okResponse(1)));
  expect(headlines).toEqual([
    {
      title: "Headline 1",
      source: "Sample Wire",
      url: "https://news.example.com/1",
      publishedAt: Date.parse("2025-06-15T12:00:00Z"),
    },
  ]);
});

test("decodeNewsApiResponse: drops removed and untitled articles", async () => {
  const headlines = await Effect.runPromise(
    decodeNewsApiResponse({
      status: "ok",
      articles: [
        { ...article(1), title: "[Removed]" },
        { ...article(2), title: null },
        { source: null, title: "Kept", publishedAt: "not a date" },
      ],
    }),
  );
  expect(headlines).toEqual([{ title: "Kept", source: null, url: null, publishedAt: null }]);
});

test("decodeNewsApiResponse: error status is a MalformedResponse", async () => {
  const result = await Effect.runPromise(
    Effect.either(decodeNewsApiResponse({ status: "error", code: "rateLimited" })),
  );
  expect(Either.isLeft(result) && result.left._tag).toBe("MalformedResponse");
});

// --- makeNewsApiFetcher ---

function fetchWith(
  apiKey: Option.Option<Redacted.Redacted>,
  count: number,
  articles = 5,
) {
  const http = mockHttpClient(() => jsonReply(okResponse(articles)));
  const result = Effect.runPromise(
    makeNewsApiFetcher.pipe(
      Effect.flatMap((fetchTopic) => fetchTopic("semiconductors", count, "en")),
      Effect.either,
      Effect.provide(
        Layer.mergeAll(
          http.layer,
          Layer.succeed(AppConfig, makeAppConfig({ newsApiKey: apiKey })),
        ),
      ),
      Effect.provide(TestContext.TestContext),
    ),
  );
  return { result, requests: http.requests };
}

test("makeNewsApiFetcher: queries /everything with the key in a header", async () => {
  const { result, requests } = fetchWith(Option.some(Redacted.make("test-key")), 3);

  const outcome = await result;
  expect(Either.isRight(outcome) && outcome.right.map((h) => h.title)).toEqual([
    "Headline 1",
    "Headline 2",
    "Headline 3",
  ]);
  const url = requests[0].url;
  expect(url.pathname).toBe("/v2/everything");
  expect(url.searchParams.get("q")).toBe("semiconductors");
  expect(url.searchParams.get("language")).toBe("en");
  expect(url.searchParams.get("sortBy")).toBe("publishedAt");
  expect(url.searchParams.get("pageSize")).toBe("3");
  expect(url.searchParams.has("apiKey")).toBe(false);
  expect(requests[0].headers["x-api-key"]).toBe("test-key");
});

test("makeNewsApiFetcher: page size is capped at 100", async () => {
  const { result, requests } = fetchWith(Option.some(Redacted.make("test-key")), 250);
  await result;
  expect(requests[0].url.searchParams.get("pageSize")).toBe("100");
});

test("makeNewsApiFetcher: without a key fails Unauthorized and makes no request", async () => {
  const { result, requests } = fetchWith(Option.none(), 3);

  const outcome = await result;
  expect(Either.isLeft(outcome) && outcome.left).toMatchObject({
    _tag: "Unauthorized",
    provider: "news",
    message: "NEWS_API_KEY is not set",
  });
  expect(requests).toHaveLength(0);
});
