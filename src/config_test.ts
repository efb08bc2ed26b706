import { ConfigProvider, Duration, Effect, Either, Option, Redacted } from "effect";
import { expect, test } from "vitest";
import { appConfigFromEnv } from "./config.ts";

// --- Helpers ---

function load(env: Record<string, string>) {
  return Effect.runSync(
    Effect.either(
      Effect.withConfigProvider(
        appConfigFromEnv,
        ConfigProvider.fromMap(new Map(Object.entries(env))),
      ),
    ),
  );
}

function loadSuccess(env: Record<string, string>) {
  const result = load(env);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left}`);
  return result.right;
}

// --- appConfigFromEnv ---

test("appConfigFromEnv: empty environment gives the keyless defaults", () => {
  const config = loadSuccess({});

  expect(config.vsCurrency).toBe("usd");
  expect(Duration.toMillis(config.requestTimeout)).toBe(15_000);
  expect(config.llmTimeoutSeconds).toBe(30);
  expect(config.logLevel._tag).toBe("Info");
  expect(config.providers).toEqual({ crypto: "coingecko", quotes: "yahoo", news: "yahoo" });
  expect(config.circuit.maxFailures).toBe(3);
  expect(Duration.toMillis(config.circuit.resetTimeout)).toBe(30_000);
  expect(Option.isNone(config.openAi.apiKey)).toBe(true);
  expect(config.openAi.model).toBe("gpt-4o-mini");
  expect(config.baseUrls.coinGecko).toBe("https://api.coingecko.com/api/v3");
});

test("appConfigFromEnv: a NewsAPI key selects NewsAPI for headlines", () => {
  const config = loadSuccess({ NEWS_API_KEY: "test-key" });

  expect(config.providers.news).toBe("newsapi");
  expect(Option.getOrNull(Option.map(config.newsApiKey, Redacted.value))).toBe("test-key");
});

test("appConfigFromEnv: NEWS_PROVIDER wins over the key-based default", () => {
  expect(loadSuccess({ NEWS_API_KEY: "test-key", NEWS_PROVIDER: "yahoo" }).providers.news).toBe(
    "yahoo",
  );
});

test("appConfigFromEnv: reads keys, timeouts and overrides", () => {
  const config = loadSuccess({
    OPENAI_API_KEY: "test-secret",
    OPENAI_MODEL: "gpt-test",
    VS_CURRENCY: " EUR ",
    REQUEST_TIMEOUT: "5",
    LLM_TIMEOUT: "60",
    LOG_LEVEL: "DEBUG",
    QUOTE_PROVIDER: "alphavantage",
    STOOQ_BASE_URL: "http://localhost:8080/q",
  });

  expect(Option.getOrNull(Option.map(config.openAi.apiKey, Redacted.value))).toBe("test-secret");
  expect(config.openAi.model).toBe("gpt-test");
  expect(config.vsCurrency).toBe("eur");
  expect(Duration.toMillis(config.requestTimeout)).toBe(5_000);
  expect(config.llmTimeoutSeconds).toBe(60);
  expect(config.logLevel._tag).toBe("Debug");
  expect(config.providers.quotes).toBe("alphavantage");
  expect(config.baseUrls.stooq).toBe("http://localhost:8080/q");
});

test("appConfigFromEnv: rejects unknown providers and out-of-range numbers", () => {
  expect(Either.isLeft(load({ QUOTE_PROVIDER: "bloomberg" }))).toBe(true);
  expect(Either.isLeft(load({ REQUEST_TIMEOUT: "0" }))).toBe(true);
  expect(Either.isLeft(load({ CIRCUIT_MAX_FAILURES: "0" }))).toBe(true);
  expect(Either.isLeft(load({ LLM_TIMEOUT: "soon" }))).toBe(true);
});
