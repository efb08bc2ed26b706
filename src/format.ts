// Pure formatting functions: no I/O.

import type { ParseResult } from "effect";
import type { AdviceResult, Headline, Quote, Snapshot } from "./domain.ts";
import type {
  AllProvidersUnavailable,
  InvalidSymbol,
  LanguageModelError,
  UpstreamError,
} from "./market-data.ts";

// --- ANSI escape codes ---

const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Snapshot formatting ---

export function formatPrice(price: number): string {
  // Sub-unit prices (FX crosses, small coins) need more than two decimals.
  return Math.abs(price) >= 1 ? price.toFixed(2) : price.toPrecision(4);
}

export function formatQuote(quote: Quote): string {
  if (quote.price === null) {
    return `  ${BOLD}${quote.symbol}${RESET}  ${DIM}not found${RESET}`;
  }
  const stale = quote.basis === "last_close" ? ` ${YELLOW}(last close)${RESET}` : "";
  return `  ${BOLD}${quote.symbol}${RESET}  ${formatPrice(quote.price)} ${quote.currency}${stale}`;
}

export function formatHeadline(headline: Headline): string {
  const meta = [
    headline.source,
    headline.publishedAt === null ? null : new Date(headline.publishedAt).toISOString(),
  ].filter((part): part is string => part !== null);
  const suffix = meta.length > 0 ? ` ${DIM}(${meta.join(", ")})${RESET}` : "";
  return `  • ${headline.title}${suffix}`;
}

export function formatSnapshot(snapshot: Snapshot): string {
  const lines = ["", `${BOLD}Quotes${RESET}`];
  lines.push(
    ...(snapshot.quotes.length > 0
      ? snapshot.quotes.map(formatQuote)
      : [`  ${DIM}none available${RESET}`]),
  );
  lines.push("", `${BOLD}Headlines${RESET}`);
  lines.push(
    ...(snapshot.headlines.length > 0
      ? snapshot.headlines.map(formatHeadline)
      : [`  ${DIM}none available${RESET}`]),
  );
  lines.push("", `  ${DIM}as of ${new Date(snapshot.requestedAt).toISOString()}${RESET}`, "");
  return lines.join("\n");
}

export function formatAdvice(result: AdviceResult): string {
  return [
    formatSnapshot(result.snapshot),
    `${BOLD}Commentary${RESET}`,
    result.narrative,
    "",
    `${DIM}${result.disclaimer}${RESET}`,
    "",
  ].join("\n");
}

// --- Error formatting ---

export type CliError =
  | InvalidSymbol
  | AllProvidersUnavailable
  | LanguageModelError
  | ParseResult.ParseError;

export function formatError(error: CliError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

export function classifyError(error: CliError): ClassifiedError {
  switch (error._tag) {
    case "InvalidSymbol":
      return {
        title: `Invalid symbol "${error.symbol}"`,
        hint: `${error.reason}.`,
      };
    case "AllProvidersUnavailable":
      return {
        title: "No market data available",
        hint: `Every data provider failed (${error.failures.join("; ")}). Check your connection and try again.`,
      };
    case "Unauthorized":
      return {
        title: "AI is not configured",
        hint: "Set OPENAI_API_KEY to enable commentary and chat.",
      };
    case "ProviderUnavailable":
      return {
        title: "Network error",
        hint: "Could not reach the provider. Check your internet connection.",
      };
    case "Timeout":
      return {
        title: "Request timed out",
        hint: "The provider did not answer in time. Try again, or raise REQUEST_TIMEOUT / LLM_TIMEOUT.",
      };
    case "UpstreamError":
      return classifyUpstreamError(error);
    case "MalformedResponse":
      return {
        title: "Unexpected response",
        hint: "The provider returned data in an unexpected format.",
      };
    case "ParseError":
      return {
        title: "Invalid data",
        hint: error.message,
      };
  }
}

function classifyUpstreamError(error: UpstreamError): ClassifiedError {
  if (error.status === 401 || error.status === 403) {
    return {
      title: "Access denied",
      hint: "The provider rejected the API key. Check that it is valid.",
    };
  }
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests. Wait a moment and try again.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: "Server error",
      hint: "The provider is having issues. Try again in a few minutes.",
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${error.status}`,
  };
}
