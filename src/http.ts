// Outbound HTTP: one place that turns platform client failures into the
// domain taxonomy, applies the per-call timeout, and guards each upstream
// with its circuit breaker.

import {
  HttpClient,
  type HttpClientError,
  type HttpClientRequest,
  type HttpClientResponse,
} from "@effect/platform";
import { Duration, Effect } from "effect";
import { type CircuitOpenError, makeCircuitBreaker } from "./circuit-breaker.ts";
import type { AppConfigShape } from "./config.ts";
import {
  type InvalidSymbol,
  MalformedResponse,
  ProviderUnavailable,
  type ProviderKind,
  type QuoteNotFound,
  Timeout,
  type TransportError,
  type Unauthorized,
  UpstreamError,
} from "./market-data.ts";

/** Identifies one upstream provider behind an adapter. */
export interface Upstream {
  readonly provider: ProviderKind;
  readonly name: string;
  readonly timeout: Duration.DurationInput;
}

/** The platform client with non-2xx responses turned into failures. */
export const StatusCheckedClient = Effect.map(
  HttpClient.HttpClient,
  HttpClient.filterStatusOk,
);

function send<A>(
  client: HttpClient.HttpClient,
  request: HttpClientRequest.HttpClientRequest,
  upstream: Upstream,
  read: (
    response: HttpClientResponse.HttpClientResponse,
  ) => Effect.Effect<A, HttpClientError.ResponseError>,
): Effect.Effect<A, TransportError> {
  const { provider, name } = upstream;
  return client.execute(request).pipe(
    Effect.flatMap(read),
    Effect.catchTags({
      RequestError: (e) =>
        Effect.fail(
          new ProviderUnavailable({ provider, message: `${name}: ${e.message}` }),
        ),
      ResponseError: (e) =>
        e.reason === "StatusCode"
          ? Effect.fail(new UpstreamError({ provider, status: e.response.status }))
          : Effect.fail(
              new MalformedResponse({
                provider,
                message: `${name}: could not read response body: ${e.message}`,
              }),
            ),
    }),
    Effect.timeoutFail({
      duration: upstream.timeout,
      onTimeout: () =>
        new Timeout({
          provider,
          message: `${name}: no response within ${Duration.format(upstream.timeout)}`,
        }),
    }),
    Effect.annotateLogs("upstream", name),
  );
}

export function fetchJson(
  client: HttpClient.HttpClient,
  request: HttpClientRequest.HttpClientRequest,
  upstream: Upstream,
): Effect.Effect<unknown, TransportError> {
  return send(client, request, upstream, (response) => response.json);
}

export function fetchText(
  client: HttpClient.HttpClient,
  request: HttpClientRequest.HttpClientRequest,
  upstream: Upstream,
): Effect.Effect<string, TransportError> {
  return send(client, request, upstream, (response) => response.text);
}

// --- Circuit breaker boundary ---

/** Errors that say the provider is unhealthy. Not-found answers, bad input
 *  and 4xx responses are valid answers and never trip a breaker. */
export function isTrippable(
  e: TransportError | QuoteNotFound | InvalidSymbol | Unauthorized | CircuitOpenError,
): boolean {
  switch (e._tag) {
    case "ProviderUnavailable":
    case "MalformedResponse":
    case "Timeout":
    case "CircuitOpenError":
      return true;
    case "UpstreamError":
      return e.status >= 500;
    case "QuoteNotFound":
    case "InvalidSymbol":
    case "Unauthorized":
      return false;
  }
}

/** Runs one upstream call through that upstream's breaker. */
export type Guard = <A>(
  effect: Effect.Effect<A, TransportError>,
) => Effect.Effect<A, TransportError>;

/** Build the breaker for one upstream; an open circuit is reported as
 *  ProviderUnavailable so callers only ever see the domain taxonomy. */
export function makeGuard(
  upstream: Pick<Upstream, "provider" | "name">,
  circuit: AppConfigShape["circuit"],
): Effect.Effect<Guard> {
  return Effect.map(
    makeCircuitBreaker<TransportError>({
      name: upstream.name,
      maxFailures: circuit.maxFailures,
      resetTimeout: circuit.resetTimeout,
      isTrippable,
    }),
    (breaker): Guard =>
      (effect) =>
        breaker.execute(effect).pipe(
          Effect.catchTag("CircuitOpenError", () =>
            Effect.fail(
              new ProviderUnavailable({
                provider: upstream.provider,
                message: `${upstream.name}: circuit open after repeated failures`,
              }),
            ),
          ),
        ),
  );
}
