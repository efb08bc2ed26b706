import { Effect, Either, Layer, Option, TestContext } from "effect";
import { expect, test } from "vitest";
import { AppConfig, makeAppConfig } from "../config.ts";
import { mockHttpClient, textReply } from "../http-mock.ts";
import { resolveInstrument } from "../instrument.ts";
import type { MalformedResponse } from "../market-data.ts";
import type { PricePoint } from "../quotes.ts";
import { decodeStooqDailyCsv, makeStooqTier } from "./stooq.ts";

// --- Test data ---

const gold = Effect.runSync(resolveInstrument("GOLD", "commodity"));

const dailyCsv = [
  "Date,Open,High,Low,Close,Volume",
  "2025-06-12,2330.1,2360.0,2325.4,2355.2,120000",
  "2025-06-13,2355.0,2390.7,2350.2,2381.4,135000",
  "",
].join("\r\n");

// --- Helpers ---

function decode(csv: string): Either.Either<Option.Option<PricePoint>, MalformedResponse> {
  return Effect.runSync(Effect.either(decodeStooqDailyCsv(csv, gold)));
}

function decodeSuccess(csv: string): PricePoint | null {
  const result = decode(csv);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left.message}`);
  return Option.getOrNull(result.right);
}

function decodeFailure(csv: string): MalformedResponse {
  const result = decode(csv);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

// --- decodeStooqDailyCsv ---

test("decodeStooqDailyCsv: takes the close of the most recent row", () => {
  expect(decodeSuccess(dailyCsv)).toEqual({ price: 2381.4, currency: "USD" });
});

test("decodeStooqDailyCsv: 'No data' body has no price", () => {
  expect(decodeSuccess("No data")).toBeNull();
});

test("decodeStooqDailyCsv: empty body has no price", () => {
  expect(decodeSuccess("")).toBeNull();
});

test("decodeStooqDailyCsv: header without rows has no price", () => {
  expect(decodeSuccess("Date,Open,High,Low,Close,Volume\n")).toBeNull();
});

test("decodeStooqDailyCsv: unexpected header is a MalformedResponse", () => {
  expect(decodeFailure("<html>rate limited</html>").message).toBe(
    'stooq: unexpected CSV header "<html>rate limited</html>"',
  );
});

test("decodeStooqDailyCsv: non-numeric close is a MalformedResponse", () => {
  const csv = "Date,Open,High,Low,Close\n2025-06-13,1,2,0.5,N/D";
  expect(decodeFailure(csv).message).toBe('stooq: non-numeric close "N/D"');
});

// --- makeStooqTier ---

test("makeStooqTier: asks for the daily series of the stooq symbol", async () => {
  const http = mockHttpClient(() => textReply(dailyCsv));

  const point = await Effect.runPromise(
    makeStooqTier.pipe(
      Effect.flatMap((tier) => tier.lookup(gold)),
      Effect.map(Option.getOrNull),
      Effect.provide(Layer.mergeAll(http.layer, Layer.succeed(AppConfig, makeAppConfig()))),
      Effect.provide(TestContext.TestContext),
    ),
  );

  expect(point).toEqual({ price: 2381.4, currency: "USD" });
  expect(http.requests).toHaveLength(1);
  expect(http.requests[0].url.host).toBe("stooq.com");
  expect(http.requests[0].url.searchParams.get("s")).toBe("gc.f");
  expect(http.requests[0].url.searchParams.get("i")).toBe("d");
});
