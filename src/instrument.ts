// Instrument validation, crypto id normalization and provider symbol
// mapping: pure, no I/O.

import { Effect } from "effect";
import type { InstrumentKind, InstrumentRef, QuoteSource } from "./domain.ts";
import { InvalidSymbol } from "./market-data.ts";

/** A validated instrument with the symbols each upstream provider expects. */
export interface Instrument {
  readonly symbol: string;
  readonly kind: InstrumentKind;
  readonly source: QuoteSource;
  readonly yahooSymbol: string;
  readonly stooqSymbol: string;
  /** Daily-close feeds carry no currency; this is what they are priced in. */
  readonly currency: string;
}

export const COMMODITIES = {
  GOLD: { yahoo: "GC=F", stooq: "gc.f" },
  SILVER: { yahoo: "SI=F", stooq: "si.f" },
  WTI: { yahoo: "CL=F", stooq: "cl.f" },
  BRENT: { yahoo: "BZ=F", stooq: "cb.f" },
  NATGAS: { yahoo: "NG=F", stooq: "ng.f" },
} as const;

export type Commodity = keyof typeof COMMODITIES;

function isCommodity(symbol: string): symbol is Commodity {
  return Object.hasOwn(COMMODITIES, symbol);
}

// --- Crypto ids ---

/** Lower-case, trim and de-duplicate ids, keeping first-seen order. */
export function normalizeCryptoIds(ids: ReadonlyArray<string>): ReadonlyArray<string> {
  const seen = new Set<string>();
  for (const id of ids) {
    const normalized = id.trim().toLowerCase();
    if (normalized.length > 0) seen.add(normalized);
  }
  return [...seen];
}

// --- Exchange instruments ---

const FX_PAIR = /^[A-Z]{6}$/;
const EQUITY = /^[A-Z0-9.^=-]{1,10}$/;

export function resolveInstrument(
  symbol: string,
  kind: InstrumentKind,
): Effect.Effect<Instrument, InvalidSymbol> {
  const normalized = symbol.trim().toUpperCase();
  const invalid = (reason: string) =>
    Effect.fail(new InvalidSymbol({ symbol, kind, reason }));

  switch (kind) {
    case "fx_pair":
      if (!FX_PAIR.test(normalized)) {
        return invalid("an FX pair is exactly six letters, e.g. EURUSD");
      }
      return Effect.succeed({
        symbol: normalized,
        kind,
        source: "fx",
        yahooSymbol: `${normalized}=X`,
        stooqSymbol: normalized.toLowerCase(),
        currency: normalized.slice(3),
      });
    case "commodity":
      if (!isCommodity(normalized)) {
        return invalid(
          `unknown commodity; expected one of ${Object.keys(COMMODITIES).join(", ")}`,
        );
      }
      return Effect.succeed({
        symbol: normalized,
        kind,
        source: "commodity",
        yahooSymbol: COMMODITIES[normalized].yahoo,
        stooqSymbol: COMMODITIES[normalized].stooq,
        currency: "USD",
      });
    case "equity":
      if (!EQUITY.test(normalized)) {
        return invalid("a ticker is 1-10 letters, digits or . - ^ =");
      }
      return Effect.succeed({
        symbol: normalized,
        kind,
        source: "equity",
        yahooSymbol: normalized,
        // Stooq lists US shares with a market suffix; other markets carry their own.
        stooqSymbol: normalized.includes(".")
          ? normalized.toLowerCase()
          : `${normalized.toLowerCase()}.us`,
        currency: "USD",
      });
  }
}

/** Parse the command-line form: `AAPL`, `fx:EURUSD`, `commodity:GOLD`. */
export function parseInstrumentRef(
  text: string,
): Effect.Effect<InstrumentRef, InvalidSymbol> {
  const [prefix, ...rest] = text.trim().split(":");
  if (rest.length === 0) {
    return resolveInstrument(text, "equity").pipe(Effect.map(toRef));
  }
  const symbol = rest.join(":");
  switch (prefix.toLowerCase()) {
    case "fx":
      return resolveInstrument(symbol, "fx_pair").pipe(Effect.map(toRef));
    case "commodity":
      return resolveInstrument(symbol, "commodity").pipe(Effect.map(toRef));
    case "equity":
      return resolveInstrument(symbol, "equity").pipe(Effect.map(toRef));
    default:
      return Effect.fail(
        new InvalidSymbol({
          symbol: text,
          kind: "equity",
          reason: `unknown prefix "${prefix}"; use fx:, commodity: or equity:`,
        }),
      );
  }
}

function toRef(instrument: Instrument): InstrumentRef {
  return { symbol: instrument.symbol, kind: instrument.kind };
}
