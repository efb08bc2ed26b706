import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import type { InstrumentKind, InstrumentRef } from "./domain.ts";
import {
  type Instrument,
  normalizeCryptoIds,
  parseInstrumentRef,
  resolveInstrument,
} from "./instrument.ts";
import type { InvalidSymbol } from "./market-data.ts";

// --- Helpers ---

function resolve(symbol: string, kind: InstrumentKind): Either.Either<Instrument, InvalidSymbol> {
  return Effect.runSync(Effect.either(resolveInstrument(symbol, kind)));
}

function resolveSuccess(symbol: string, kind: InstrumentKind): Instrument {
  const result = resolve(symbol, kind);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left.reason}`);
  return result.right;
}

function parse(text: string): Either.Either<InstrumentRef, InvalidSymbol> {
  return Effect.runSync(Effect.either(parseInstrumentRef(text)));
}

function parseSuccess(text: string): InstrumentRef {
  const result = parse(text);
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left.reason}`);
  return result.right;
}

// --- resolveInstrument ---

test("resolveInstrument: equity is upper-cased and gets the US market suffix on stooq", () => {
  expect(resolveSuccess(" aapl ", "equity")).toEqual({
    symbol: "AAPL",
    kind: "equity",
    source: "equity",
    yahooSymbol: "AAPL",
    stooqSymbol: "aapl.us",
    currency: "USD",
  });
});

test("resolveInstrument: equity with its own market suffix keeps it", () => {
  expect(resolveSuccess("BRK.B", "equity").stooqSymbol).toBe("brk.b");
});

test("resolveInstrument: fx pair maps to Yahoo's =X form and prices in the quote currency", () => {
  expect(resolveSuccess("eurusd", "fx_pair")).toEqual({
    symbol: "EURUSD",
    kind: "fx_pair",
    source: "fx",
    yahooSymbol: "EURUSD=X",
    stooqSymbol: "eurusd",
    currency: "USD",
  });
});

test("resolveInstrument: commodity maps to futures symbols", () => {
  expect(resolveSuccess("gold", "commodity")).toEqual({
    symbol: "GOLD",
    kind: "commodity",
    source: "commodity",
    yahooSymbol: "GC=F",
    stooqSymbol: "gc.f",
    currency: "USD",
  });
});

test("resolveInstrument: rejects an fx pair that is not six letters", () => {
  const result = resolve("EURUS", "fx_pair");
  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left._tag).toBe("InvalidSymbol");
    expect(result.left.kind).toBe("fx_pair");
    expect(result.left.symbol).toBe("EURUS");
  }
});

test("resolveInstrument: rejects an fx pair with a seventh letter", () => {
  const result = resolve("EURUSDX", "fx_pair");
  expect(Either.isLeft(result) && result.left).toMatchObject({
    _tag: "InvalidSymbol",
    symbol: "EURUSDX",
    kind: "fx_pair",
  });
});

test("resolveInstrument: rejects an unknown commodity", () => {
  const result = resolve("PLATINUM", "commodity");
  expect(Either.isLeft(result) && result.left.reason).toBe(
    "unknown commodity; expected one of GOLD, SILVER, WTI, BRENT, NATGAS",
  );
});

test("resolveInstrument: rejects tickers with spaces or over ten characters", () => {
  expect(Either.isLeft(resolve("AA PL", "equity"))).toBe(true);
  expect(Either.isLeft(resolve("ABCDEFGHIJK", "equity"))).toBe(true);
  expect(Either.isLeft(resolve("", "equity"))).toBe(true);
});

// --- parseInstrumentRef ---

test("parseInstrumentRef: a bare symbol is an equity", () => {
  expect(parseSuccess("msft")).toEqual({ symbol: "MSFT", kind: "equity" });
});

test("parseInstrumentRef: prefixes select the instrument kind", () => {
  expect(parseSuccess("fx:gbpusd")).toEqual({ symbol: "GBPUSD", kind: "fx_pair" });
  expect(parseSuccess("Commodity:wti")).toEqual({ symbol: "WTI", kind: "commodity" });
  expect(parseSuccess("equity:IBM")).toEqual({ symbol: "IBM", kind: "equity" });
});

test("parseInstrumentRef: unknown prefix is an InvalidSymbol", () => {
  const result = parse("crypto:BTC");
  expect(Either.isLeft(result) && result.left.reason).toBe(
    'unknown prefix "crypto"; use fx:, commodity: or equity:',
  );
});

// --- normalizeCryptoIds ---

test("normalizeCryptoIds: lower-cases, trims and drops duplicates in first-seen order", () => {
  expect(normalizeCryptoIds([" Bitcoin", "ethereum", "BITCOIN", "", "solana "])).toEqual([
    "bitcoin",
    "ethereum",
    "solana",
  ]);
});
