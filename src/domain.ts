// Domain types and their JSON wire form: no I/O.
//
// In memory every timestamp is epoch milliseconds; on the wire it is an
// ISO-8601 string and field names are snake_case.

import { ParseResult, Schema } from "effect";

// --- Instruments ---

export type InstrumentKind = "equity" | "fx_pair" | "commodity";

export interface InstrumentRef {
  readonly symbol: string;
  readonly kind: InstrumentKind;
}

// --- Wire primitives ---

const EpochMillisFromIso = Schema.transformOrFail(Schema.String, Schema.Number, {
  strict: true,
  decode: (iso, _, ast) => {
    const ms = Date.parse(iso);
    return Number.isNaN(ms)
      ? ParseResult.fail(
          new ParseResult.Type(ast, iso, `Expected an ISO-8601 timestamp, got "${iso}"`),
        )
      : ParseResult.succeed(ms);
  },
  encode: (ms, _, ast) =>
    Number.isFinite(ms)
      ? ParseResult.succeed(new Date(ms).toISOString())
      : ParseResult.fail(new ParseResult.Type(ast, ms, "Timestamp is not finite")),
});

// --- Quote ---

export const QuoteSource = Schema.Literal("crypto", "equity", "fx", "commodity");
export type QuoteSource = typeof QuoteSource.Type;

/** `live` is a last-traded price; `last_close` is the most recent daily
 *  close and therefore up to one bar stale. A not-found quote (null price)
 *  carries `last_close`, the tier that gave the final answer. */
export const QuoteBasis = Schema.Literal("live", "last_close");
export type QuoteBasis = typeof QuoteBasis.Type;

export const Quote = Schema.Struct({
  symbol: Schema.String,
  /** null only when the provider explicitly answered "not found". */
  price: Schema.NullOr(Schema.Number),
  currency: Schema.String,
  source: QuoteSource,
  basis: QuoteBasis,
  fetchedAt: Schema.propertySignature(EpochMillisFromIso).pipe(
    Schema.fromKey("fetched_at"),
  ),
});
export interface Quote extends Schema.Schema.Type<typeof Quote> {}

// --- Headline ---

export const Headline = Schema.Struct({
  title: Schema.String,
  source: Schema.NullOr(Schema.String),
  url: Schema.NullOr(Schema.String),
  publishedAt: Schema.propertySignature(Schema.NullOr(EpochMillisFromIso)).pipe(
    Schema.fromKey("published_at"),
  ),
});
export interface Headline extends Schema.Schema.Type<typeof Headline> {}

// --- Snapshot ---

export const Snapshot = Schema.Struct({
  quotes: Schema.Array(Quote),
  headlines: Schema.Array(Headline),
  requestedAt: Schema.propertySignature(EpochMillisFromIso).pipe(
    Schema.fromKey("requested_at"),
  ),
});
export interface Snapshot extends Schema.Schema.Type<typeof Snapshot> {}

export const AdviceResult = Schema.Struct({
  narrative: Schema.String,
  snapshot: Snapshot,
  disclaimer: Schema.String,
});
export interface AdviceResult extends Schema.Schema.Type<typeof AdviceResult> {}

// --- Chat ---

export const ChatRole = Schema.Literal("system", "user", "assistant");
export type ChatRole = typeof ChatRole.Type;

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

// --- JSON codecs ---

export const encodeSnapshotJson = Schema.encode(Schema.parseJson(Snapshot));
export const decodeSnapshotJson = Schema.decodeUnknown(Schema.parseJson(Snapshot));
export const encodeAdviceJson = Schema.encode(
  Schema.parseJson(AdviceResult, { space: 2 }),
);
