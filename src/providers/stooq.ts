// Stooq daily history: last-close quote tier.
//
// The CSV download is reliable for illiquid symbols where live endpoints
// come back empty, at the cost of being one daily bar stale.

import { HttpClientRequest } from "@effect/platform";
import { Effect, Option } from "effect";
import { AppConfig } from "../config.ts";
import { fetchText, makeGuard, StatusCheckedClient, type Upstream } from "../http.ts";
import type { Instrument } from "../instrument.ts";
import { MalformedResponse } from "../market-data.ts";
import type { PricePoint, QuoteTier } from "../quotes.ts";

// --- Decode the daily CSV into the most recent close ---

export function decodeStooqDailyCsv(
  csv: string,
  instrument: Instrument,
): Effect.Effect<Option.Option<PricePoint>, MalformedResponse> {
  const malformed = (message: string) =>
    Effect.fail(new MalformedResponse({ provider: "equity", message: `stooq: ${message}` }));

  const lines = csv
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  // Unknown symbols are answered with a plain "No data" body.
  if (lines.length === 0 || /^no data/i.test(lines[0])) {
    return Effect.succeed(Option.none());
  }

  const header = lines[0].split(",").map((h) => h.trim().toLowerCase());
  const closeAt = header.indexOf("close");
  if (header[0] !== "date" || closeAt < 0) {
    return malformed(`unexpected CSV header "${lines[0]}"`);
  }
  if (lines.length === 1) return Effect.succeed(Option.none());

  const lastRow = lines[lines.length - 1].split(",");
  const rawClose = (lastRow[closeAt] ?? "").trim();
  const close = Number(rawClose);
  if (rawClose.length === 0 || !Number.isFinite(close)) {
    return malformed(`non-numeric close "${rawClose}"`);
  }

  return Effect.succeed(Option.some({ price: close, currency: instrument.currency }));
}

// --- Stooq tier ---

export const makeStooqTier = Effect.gen(function* () {
  const client = yield* StatusCheckedClient;
  const config = yield* AppConfig;
  const upstream: Upstream = {
    provider: "equity",
    name: "stooq",
    timeout: config.requestTimeout,
  };
  const guard = yield* makeGuard(upstream, config.circuit);

  const tier: QuoteTier = {
    name: "stooq",
    basis: "last_close",
    lookup: (instrument) =>
      guard(
        fetchText(
          client,
          HttpClientRequest.get(config.baseUrls.stooq).pipe(
            HttpClientRequest.setUrlParams({ s: instrument.stooqSymbol, i: "d" }),
          ),
          upstream,
        ).pipe(Effect.flatMap((csv) => decodeStooqDailyCsv(csv, instrument))),
      ),
  };
  return tier;
});
