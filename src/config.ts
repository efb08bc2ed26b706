// Process-wide configuration, read once from the environment at startup and
// treated as read-only afterwards.

import {
  Config,
  Context,
  Duration,
  Effect,
  Layer,
  LogLevel,
  Option,
  type Redacted,
} from "effect";

export type CryptoProviderName = "coingecko" | "test";
export type QuoteProviderName = "yahoo" | "alphavantage" | "test";
export type NewsProviderName = "newsapi" | "yahoo" | "test";

export interface AppConfigShape {
  readonly vsCurrency: string;
  readonly requestTimeout: Duration.Duration;
  readonly llmTimeoutSeconds: number;
  readonly logLevel: LogLevel.LogLevel;
  readonly providers: {
    readonly crypto: CryptoProviderName;
    readonly quotes: QuoteProviderName;
    readonly news: NewsProviderName;
  };
  readonly circuit: {
    readonly maxFailures: number;
    readonly resetTimeout: Duration.Duration;
  };
  readonly openAi: {
    readonly apiKey: Option.Option<Redacted.Redacted>;
    readonly model: string;
    readonly baseUrl: string;
  };
  readonly newsApiKey: Option.Option<Redacted.Redacted>;
  readonly alphaVantageApiKey: Option.Option<Redacted.Redacted>;
  readonly baseUrls: {
    readonly coinGecko: string;
    readonly yahooChart: string;
    readonly yahooSearch: string;
    readonly stooq: string;
    readonly newsApi: string;
    readonly alphaVantage: string;
  };
}

export class AppConfig extends Context.Tag("AppConfig")<
  AppConfig,
  AppConfigShape
>() {}

// --- Defaults ---

const DEFAULT_BASE_URLS: AppConfigShape["baseUrls"] = {
  coinGecko: "https://api.coingecko.com/api/v3",
  yahooChart: "https://query1.finance.yahoo.com/v8/finance/chart",
  yahooSearch: "https://query1.finance.yahoo.com/v1/finance/search",
  stooq: "https://stooq.com/q/d/l/",
  newsApi: "https://newsapi.org/v2",
  alphaVantage: "https://www.alphavantage.co/query",
};

/** Configuration with every default filled in and no credentials. Tests
 *  start from this and override what they need. */
export function makeAppConfig(
  overrides: Partial<AppConfigShape> = {},
): AppConfigShape {
  return {
    vsCurrency: "usd",
    requestTimeout: Duration.seconds(15),
    llmTimeoutSeconds: 30,
    logLevel: LogLevel.Info,
    providers: { crypto: "coingecko", quotes: "yahoo", news: "yahoo" },
    circuit: { maxFailures: 3, resetTimeout: Duration.seconds(30) },
    openAi: {
      apiKey: Option.none(),
      model: "gpt-4o-mini",
      baseUrl: "https://api.openai.com/v1",
    },
    newsApiKey: Option.none(),
    alphaVantageApiKey: Option.none(),
    baseUrls: DEFAULT_BASE_URLS,
    ...overrides,
  };
}

// --- Environment ---

const positiveSeconds = (name: string, fallback: number) =>
  Config.number(name).pipe(
    Config.withDefault(fallback),
    Config.validate({
      message: `${name} must be a positive number of seconds`,
      validation: (n) => n > 0,
    }),
  );

const baseUrl = (name: string, fallback: string) =>
  Config.string(name).pipe(Config.withDefault(fallback));

export const appConfigFromEnv: Config.Config<AppConfigShape> = Config.all({
  vsCurrency: Config.string("VS_CURRENCY").pipe(
    Config.withDefault("usd"),
    Config.map((s) => s.trim().toLowerCase()),
  ),
  requestTimeout: positiveSeconds("REQUEST_TIMEOUT", 15).pipe(
    Config.map(Duration.seconds),
  ),
  llmTimeoutSeconds: positiveSeconds("LLM_TIMEOUT", 30),
  logLevel: Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
  crypto: Config.literal("coingecko", "test")("CRYPTO_PROVIDER").pipe(
    Config.withDefault("coingecko" as const),
  ),
  quotes: Config.literal("yahoo", "alphavantage", "test")("QUOTE_PROVIDER").pipe(
    Config.withDefault("yahoo" as const),
  ),
  news: Config.option(Config.literal("newsapi", "yahoo", "test")("NEWS_PROVIDER")),
  maxFailures: Config.integer("CIRCUIT_MAX_FAILURES").pipe(
    Config.withDefault(3),
    Config.validate({
      message: "CIRCUIT_MAX_FAILURES must be at least 1",
      validation: (n) => n >= 1,
    }),
  ),
  resetTimeout: positiveSeconds("CIRCUIT_RESET_SECONDS", 30).pipe(
    Config.map(Duration.seconds),
  ),
  openAiKey: Config.option(Config.redacted("OPENAI_API_KEY")),
  openAiModel: Config.string("OPENAI_MODEL").pipe(Config.withDefault("gpt-4o-mini")),
  openAiBaseUrl: baseUrl("OPENAI_BASE_URL", "https://api.openai.com/v1"),
  newsApiKey: Config.option(Config.redacted("NEWS_API_KEY")),
  alphaVantageApiKey: Config.option(Config.redacted("ALPHA_VANTAGE_API_KEY")),
  coinGecko: baseUrl("COINGECKO_BASE_URL", DEFAULT_BASE_URLS.coinGecko),
  yahooChart: baseUrl("YAHOO_CHART_BASE_URL", DEFAULT_BASE_URLS.yahooChart),
  yahooSearch: baseUrl("YAHOO_SEARCH_BASE_URL", DEFAULT_BASE_URLS.yahooSearch),
  stooq: baseUrl("STOOQ_BASE_URL", DEFAULT_BASE_URLS.stooq),
  newsApi: baseUrl("NEWSAPI_BASE_URL", DEFAULT_BASE_URLS.newsApi),
  alphaVantage: baseUrl("ALPHA_VANTAGE_BASE_URL", DEFAULT_BASE_URLS.alphaVantage),
}).pipe(
  Config.map((env): AppConfigShape => ({
    vsCurrency: env.vsCurrency,
    requestTimeout: env.requestTimeout,
    llmTimeoutSeconds: env.llmTimeoutSeconds,
    logLevel: env.logLevel,
    providers: {
      crypto: env.crypto,
      quotes: env.quotes,
      // NewsAPI needs a key; without one the keyless Yahoo search is used.
      news: Option.getOrElse(env.news, () =>
        Option.isSome(env.newsApiKey) ? "newsapi" : "yahoo",
      ),
    },
    circuit: { maxFailures: env.maxFailures, resetTimeout: env.resetTimeout },
    openAi: {
      apiKey: env.openAiKey,
      model: env.openAiModel,
      baseUrl: env.openAiBaseUrl,
    },
    newsApiKey: env.newsApiKey,
    alphaVantageApiKey: env.alphaVantageApiKey,
    baseUrls: {
      coinGecko: env.coinGecko,
      yahooChart: env.yahooChart,
      yahooSearch: env.yahooSearch,
      stooq: env.stooq,
      newsApi: env.newsApi,
      alphaVantage: env.alphaVantage,
    },
  })),
);

export const AppConfigLive = Layer.effect(
  AppConfig,
  Effect.gen(function* () {
    const config = yield* appConfigFromEnv;
    yield* Effect.logDebug("configuration loaded").pipe(
      Effect.annotateLogs({
        crypto: config.providers.crypto,
        quotes: config.providers.quotes,
        news: config.providers.news,
        llm: Option.isSome(config.openAi.apiKey) ? "openai" : "off",
      }),
    );
    return config;
  }),
);
