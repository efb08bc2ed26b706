// In-process HttpClient for tests: answers from a handler and records every
// request, so adapters run end to end without a network.

import {
  type Headers,
  HttpClient,
  HttpClientError,
  type HttpClientRequest,
  HttpClientResponse,
} from "@effect/platform";
import { type Duration, Effect, Layer } from "effect";

export type MockReply =
  | {
      readonly _tag: "Respond";
      readonly status: number;
      readonly body: string;
      readonly delay?: Duration.DurationInput;
    }
  | { readonly _tag: "Unreachable" };

export const jsonReply = (body: unknown, status = 200): MockReply => ({
  _tag: "Respond",
  status,
  body: JSON.stringify(body),
});

export const textReply = (body: string, status = 200): MockReply => ({
  _tag: "Respond",
  status,
  body,
});

export const delayed = (
  reply: MockReply,
  delay: Duration.DurationInput,
): MockReply => (reply._tag === "Respond" ? { ...reply, delay } : reply);

export const unreachable: MockReply = { _tag: "Unreachable" };

export interface RecordedRequest {
  readonly method: string;
  readonly url: URL;
  readonly headers: Headers.Headers;
  /** Parsed JSON body, when the request carried one. */
  readonly body: unknown;
}

function readJsonBody(request: HttpClientRequest.HttpClientRequest): unknown {
  if (request.body._tag !== "Uint8Array") return undefined;
  const parsed: unknown = JSON.parse(new TextDecoder().decode(request.body.body));
  return parsed;
}

export function mockHttpClient(
  handler: (url: URL, request: HttpClientRequest.HttpClientRequest) => MockReply,
) {
  const requests: Array<RecordedRequest> = [];

  const client = HttpClient.make((request, url) => {
    requests.push({
      method: request.method,
      url,
      headers: request.headers,
      body: readJsonBody(request),
    });
    const reply = handler(url, request);
    if (reply._tag === "Unreachable") {
      return Effect.fail(
        new HttpClientError.RequestError({
          request,
          reason: "Transport",
          cause: new Error("connection refused"),
        }),
      );
    }
    const response = Effect.sync(() =>
      HttpClientResponse.fromWeb(request, new Response(reply.body, { status: reply.status })),
    );
    return reply.delay === undefined ? response : Effect.delay(response, reply.delay);
  });

  return {
    layer: Layer.succeed(HttpClient.HttpClient, client),
    requests,
  };
}
