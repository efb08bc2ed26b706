import { Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient, type HttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Console, Effect, Layer, Logger, Option } from "effect";
import {
  MarketDataAggregator,
  MarketDataAggregatorLive,
  type SnapshotRequest,
} from "./src/aggregator.ts";
import { runChatSession } from "./src/chat.ts";
import { AppConfig, AppConfigLive, type AppConfigShape } from "./src/config.ts";
import { encodeAdviceJson, encodeSnapshotJson } from "./src/domain.ts";
import { type CliError, formatAdvice, formatError, formatSnapshot } from "./src/format.ts";
import { parseInstrumentRef } from "./src/instrument.ts";
import { StderrLogger } from "./src/logging.ts";
import type { CryptoPrices, MarketQuotes, NewsFeed } from "./src/market-data.ts";
import { NewsFeedLive } from "./src/news.ts";
import { CoinGeckoLive } from "./src/providers/coingecko.ts";
import {
  CryptoPricesTestLive,
  MarketQuotesTestLive,
  NewsFeedTestLive,
} from "./src/providers/market-data-mock.ts";
import { OpenAiLanguageModelLive } from "./src/providers/openai.ts";
import { MarketQuotesLive } from "./src/quotes.ts";

// --- CLI ---

const DEFAULT_TOPICS = ["stock market"];

const crypto = Options.text("crypto").pipe(
  Options.withDescription("Comma-separated CoinGecko ids (e.g. bitcoin,ethereum)"),
  Options.withDefault("bitcoin,ethereum"),
);

const ticker = Options.text("ticker").pipe(
  Options.withAlias("t"),
  Options.withDescription(
    "Instrument to quote, repeatable: AAPL, fx:EURUSD, commodity:GOLD",
  ),
  Options.repeated,
);

const topic = Options.text("topic").pipe(
  Options.withDescription(`News topic, repeatable (default: ${DEFAULT_TOPICS.join(", ")})`),
  Options.repeated,
);

const limit = Options.integer("limit").pipe(
  Options.withDescription("Maximum number of headlines (0 disables news)"),
  Options.withDefault(5),
);

const lang = Options.text("lang").pipe(
  Options.withDescription("Headline language"),
  Options.withDefault("en"),
);

const currency = Options.text("currency").pipe(
  Options.withDescription("Quote currency for crypto prices (default: VS_CURRENCY or usd)"),
  Options.optional,
);

const json = Options.boolean("json").pipe(
  Options.withDescription("Print JSON instead of text"),
);

const nonEmptyPrompt = (message: string) =>
  Prompt.text({
    message,
    validate: (value) =>
      value.trim().length === 0
        ? Effect.fail("Please type something")
        : Effect.succeed(value.trim()),
  });

const question = Options.text("question").pipe(
  Options.withAlias("q"),
  Options.withDescription("Question for the AI commentary"),
  Options.withFallbackPrompt(nonEmptyPrompt("What would you like to know?")),
);

const message = Options.text("message").pipe(
  Options.withAlias("m"),
  Options.withDescription("Ask one question and exit instead of starting a session"),
  Options.optional,
);

const snapshotOptions = { crypto, ticker, topic, limit, lang, currency, json };

interface SnapshotOptions {
  readonly crypto: string;
  readonly ticker: ReadonlyArray<string>;
  readonly topic: ReadonlyArray<string>;
  readonly limit: number;
  readonly lang: string;
  readonly currency: Option.Option<string>;
}

const toSnapshotRequest = (options: SnapshotOptions) =>
  Effect.map(
    Effect.forEach(options.ticker, parseInstrumentRef),
    (tickers): SnapshotRequest => ({
      cryptoIds: options.crypto.split(","),
      tickers,
      newsTopics: options.topic.length > 0 ? options.topic : DEFAULT_TOPICS,
      newsLimit: Math.max(0, options.limit),
      lang: options.lang,
      vsCurrency: Option.getOrUndefined(options.currency),
    }),
  );

const snapshotCommand = Command.make("snapshot", snapshotOptions).pipe(
  Command.withDescription("Quotes and headlines in one snapshot"),
  Command.withHandler((options) =>
    Effect.gen(function* () {
      const aggregator = yield* MarketDataAggregator;
      const snapshot = yield* aggregator.buildSnapshot(yield* toSnapshotRequest(options));
      yield* Console.log(
        options.json ? yield* encodeSnapshotJson(snapshot) : formatSnapshot(snapshot),
      );
    })
  ),
);

const adviceCommand = Command.make("advice", { ...snapshotOptions, question }).pipe(
  Command.withDescription("A snapshot plus AI commentary answering a question"),
  Command.withHandler((options) =>
    Effect.gen(function* () {
      const aggregator = yield* MarketDataAggregator;
      const snapshot = yield* aggregator.buildSnapshot(yield* toSnapshotRequest(options));
      const advice = yield* aggregator.getAdvice(snapshot, options.question);
      yield* Console.log(
        options.json ? yield* encodeAdviceJson(advice) : formatAdvice(advice),
      );
    })
  ),
);

// Ctrl-C at the prompt ends the session like an empty line.
const readChatLine = Prompt.run(Prompt.text({ message: "you:" })).pipe(
  Effect.catchTag("QuitException", () => Effect.succeed("")),
);

const chatCommand = Command.make("chat", { message }).pipe(
  Command.withDescription("Talk to the research assistant (empty line or exit to stop)"),
  Command.withHandler(({ message }) =>
    Effect.gen(function* () {
      const aggregator = yield* MarketDataAggregator;
      if (Option.isSome(message)) {
        const reply = yield* aggregator.chat([{ role: "user", content: message.value }]);
        yield* Console.log(reply);
        return;
      }
      yield* runChatSession({
        readLine: readChatLine,
        send: aggregator.chat,
        onReply: (reply) => Console.log(`\n${reply}\n`),
        onTurnFailed: (e) => Console.error(formatError(e)),
      });
    })
  ),
);

const command = Command.make("market-snapshot").pipe(
  Command.withSubcommands([snapshotCommand, adviceCommand, chatCommand]),
);

// --- Layers ---
// CRYPTO_PROVIDER, QUOTE_PROVIDER and NEWS_PROVIDER accept "test" for
// offline sample data. Commentary is enabled by OPENAI_API_KEY.

type AdapterDeps = AppConfig | HttpClient.HttpClient;

const selectCrypto = (config: AppConfigShape): Layer.Layer<CryptoPrices, never, AdapterDeps> =>
  config.providers.crypto === "test" ? CryptoPricesTestLive : CoinGeckoLive;

const selectQuotes = (config: AppConfigShape): Layer.Layer<MarketQuotes, never, AdapterDeps> =>
  config.providers.quotes === "test" ? MarketQuotesTestLive : MarketQuotesLive;

const selectNews = (config: AppConfigShape): Layer.Layer<NewsFeed, never, AdapterDeps> =>
  config.providers.news === "test" ? NewsFeedTestLive : NewsFeedLive;

const selectAggregator = (
  config: AppConfigShape,
): Layer.Layer<MarketDataAggregator, never, CryptoPrices | MarketQuotes | NewsFeed | AdapterDeps> =>
  Option.isSome(config.openAi.apiKey)
    ? MarketDataAggregatorLive.pipe(Layer.provide(OpenAiLanguageModelLive))
    : MarketDataAggregatorLive;

const MarketDataLive = Layer.unwrapEffect(
  Effect.map(AppConfig, (config) =>
    selectAggregator(config).pipe(
      Layer.provide(
        Layer.mergeAll(selectCrypto(config), selectQuotes(config), selectNews(config)),
      ),
    )
  ),
).pipe(
  Layer.provide(FetchHttpClient.layer),
  Layer.provideMerge(AppConfigLive),
);

// --- Run ---

const cli = Command.run(command, {
  name: "market-snapshot",
  version: "0.1.0",
});

const reportError = (e: CliError) =>
  Console.error(formatError(e)).pipe(
    Effect.zipRight(Effect.sync(() => {
      process.exitCode = 1;
    })),
  );

Effect.gen(function* () {
  const { logLevel } = yield* AppConfig;
  return yield* cli(process.argv).pipe(Logger.withMinimumLogLevel(logLevel));
}).pipe(
  Effect.catchTags({
    InvalidSymbol: reportError,
    AllProvidersUnavailable: reportError,
    Unauthorized: reportError,
    ProviderUnavailable: reportError,
    UpstreamError: reportError,
    MalformedResponse: reportError,
    Timeout: reportError,
    ParseError: reportError,
  }),
  Effect.provide(MarketDataLive),
  Effect.provide(StderrLogger),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
