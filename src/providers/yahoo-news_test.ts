import { Effect, Either, Layer, TestContext } from "effect";
import { expect, test } from "vitest";
import { AppConfig, makeAppConfig } from "../config.ts";
import { jsonReply, type MockReply, mockHttpClient } from "../http-mock.ts";
import { decodeYahooNews, makeYahooNewsFetcher } from "./yahoo-news.ts";

// --- Test data ---

const searchResponse = {
  count: 2,
  quotes: [],
  news: [
    {
      uuid: "a1",
      title: "Chipmakers rally on strong guidance",
      publisher: "Sample Wire",
      link: "https://news.example.com/chips",
      providerPublishTime: 1749990000,
      type: "STORY",
    },
    { uuid: "a2", title: "Untimed brief" },
  ],
};

// --- decodeYahooNews ---

test("decodeYahooNews: maps items, publish time in seconds becomes milliseconds", async () => {
  const headlines = await Effect.runPromise(decodeYahooNews(searchResponse));
  expect(headlines).toEqual([
    {
      title: "Chipmakers rally on strong guidance",
      source: "Sample Wire",
      url: "https://news.example.com/chips",
      publishedAt: 1749990000000,
    },
    { title: "Untimed brief", source: null, url: null, publishedAt: null },
  ]);
});

test("decodeYahooNews: a response without a news array has no headlines", async () => {
  expect(await Effect.runPromise(decodeYahooNews({ quotes: [] }))).toEqual([]);
});

test("decodeYahooNews: items without a title are a MalformedResponse", async () => {
  const result = await Effect.runPromise(
    Effect.either(decodeYahooNews({ news: [{ publisher: "Sample Wire" }] })),
  );
  expect(Either.isLeft(result) && result.left._tag).toBe("MalformedResponse");
});

// --- makeYahooNewsFetcher ---

function fetchWith(handler: () => MockReply, count: number) {
  const http = mockHttpClient(handler);
  const result = Effect.runPromise(
    makeYahooNewsFetcher.pipe(
      Effect.flatMap((fetchTopic) => fetchTopic("chips", count, "en")),
      Effect.either,
      Effect.provide(Layer.mergeAll(http.layer, Layer.succeed(AppConfig, makeAppConfig()))),
      Effect.provide(TestContext.TestContext),
    ),
  );
  return { result, requests: http.requests };
}

test("makeYahooNewsFetcher: asks for news only and trims to the count", async () => {
  const { result, requests } = fetchWith(() => jsonReply(searchResponse), 1);

  const outcome = await result;
  expect(Either.isRight(outcome) && outcome.right.map((h) => h.title)).toEqual([
    "Chipmakers rally on strong guidance",
  ]);
  const url = requests[0].url;
  expect(url.searchParams.get("q")).toBe("chips");
  expect(url.searchParams.get("quotesCount")).toBe("0");
  expect(url.searchParams.get("newsCount")).toBe("1");
  expect(url.searchParams.get("lang")).toBe("en");
});

test("makeYahooNewsFetcher: server errors surface as UpstreamError", async () => {
  const { result } = fetchWith(() => jsonReply({}, 500), 3);
  const outcome = await result;
  expect(Either.isLeft(outcome) && outcome.left).toMatchObject({
    _tag: "UpstreamError",
    provider: "news",
    status: 500,
  });
});
