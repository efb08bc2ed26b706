import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import {
  type AdviceResult,
  decodeSnapshotJson,
  encodeAdviceJson,
  encodeSnapshotJson,
  type Snapshot,
} from "./domain.ts";

// --- Test data ---

const FETCHED = Date.parse("2025-06-15T16:00:00Z");

const snapshot: Snapshot = {
  quotes: [
    {
      symbol: "bitcoin",
      price: 64250.5,
      currency: "USD",
      source: "crypto",
      basis: "live",
      fetchedAt: FETCHED,
    },
    {
      symbol: "TSLA",
      price: null,
      currency: "USD",
      source: "equity",
      basis: "live",
      fetchedAt: FETCHED,
    },
  ],
  headlines: [
    {
      title: "Stocks edge higher",
      source: "Sample Wire",
      url: "https://news.example.com/markets/1",
      publishedAt: null,
    },
  ],
  requestedAt: FETCHED - 500,
};

// --- Snapshot JSON ---

test("encodeSnapshotJson: snake_case field names and ISO timestamps", () => {
  const json = Effect.runSync(encodeSnapshotJson(snapshot));
  expect(JSON.parse(json)).toEqual({
    quotes: [
      {
        symbol: "bitcoin",
        price: 64250.5,
        currency: "USD",
        source: "crypto",
        basis: "live",
        fetched_at: "2025-06-15T16:00:00.000Z",
      },
      {
        symbol: "TSLA",
        price: null,
        currency: "USD",
        source: "equity",
        basis: "live",
        fetched_at: "2025-06-15T16:00:00.000Z",
      },
    ],
    headlines: [
      {
        title: "Stocks edge higher",
        source: "Sample Wire",
        url: "https://news.example.com/markets/1",
        published_at: null,
      },
    ],
    requested_at: "2025-06-15T15:59:59.500Z",
  });
});

test("decodeSnapshotJson: reads back what encodeSnapshotJson wrote", () => {
  const decoded = Effect.runSync(
    encodeSnapshotJson(snapshot).pipe(Effect.flatMap(decodeSnapshotJson)),
  );
  expect(decoded).toEqual(snapshot);
});

test("decodeSnapshotJson: rejects a timestamp that is not ISO-8601", () => {
  const result = Effect.runSync(
    Effect.either(
      decodeSnapshotJson(JSON.stringify({ quotes: [], headlines: [], requested_at: "yesterday" })),
    ),
  );
  expect(Either.isLeft(result) && result.left._tag).toBe("ParseError");
});

test("decodeSnapshotJson: rejects an unknown quote basis", () => {
  const body = {
    quotes: [
      {
        symbol: "AAPL",
        price: 1,
        currency: "USD",
        source: "equity",
        basis: "delayed",
        fetched_at: "2025-06-15T16:00:00.000Z",
      },
    ],
    headlines: [],
    requested_at: "2025-06-15T16:00:00.000Z",
  };
  const result = Effect.runSync(Effect.either(decodeSnapshotJson(JSON.stringify(body))));
  expect(Either.isLeft(result)).toBe(true);
});

// --- Advice JSON ---

test("encodeAdviceJson: pretty-printed with the narrative first", () => {
  const advice: AdviceResult = {
    narrative: "Quiet session.",
    snapshot: { quotes: [], headlines: [], requestedAt: 0 },
    disclaimer: "Not advice.",
  };
  const json = Effect.runSync(encodeAdviceJson(advice));
  expect(json).toBe(
    [
      "{",
      '  "narrative": "Quiet session.",',
      '  "snapshot": {',
      '    "quotes": [],',
      '    "headlines": [],',
      '    "requested_at": "1970-01-01T00:00:00.000Z"',
      "  },",
      '  "disclaimer": "Not advice."',
      "}",
    ].join("\n"),
  );
});
