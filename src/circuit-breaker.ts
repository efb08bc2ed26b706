// Circuit breaker: Effect shell.
//
// Wires the pure state machine (circuit-breaker-state.ts) to Ref and Clock.
// One breaker guards one upstream provider for the life of the process.

import { Clock, Data, Duration, Effect, Ref } from "effect";
import {
  type CircuitState,
  gate,
  initialState,
  onHealthy,
  onProbeAbandoned,
  onTrippableFailure,
} from "./circuit-breaker-state.ts";

export type { CircuitState } from "./circuit-breaker-state.ts";
export { Closed, HalfOpen, initialState, Open } from "./circuit-breaker-state.ts";

// --- Config ---

export interface CircuitBreakerConfig<E> {
  readonly name: string;
  readonly maxFailures: number;
  readonly resetTimeout: Duration.DurationInput;
  readonly isTrippable: (e: E) => boolean;
}

// --- Error ---

export class CircuitOpenError extends Data.TaggedError("CircuitOpenError")<{
  readonly name: string;
}> {}

// --- Circuit breaker ---

export interface CircuitBreaker<E> {
  /** Run `effect` through the breaker. Trippable errors count toward the
   *  threshold; any other outcome means the provider answered and resets
   *  the count. */
  readonly execute: <A, R>(
    effect: Effect.Effect<A, E, R>,
  ) => Effect.Effect<A, E | CircuitOpenError, R>;

  readonly state: Effect.Effect<CircuitState>;
}

export function makeCircuitBreaker<E>(
  config: CircuitBreakerConfig<E>,
): Effect.Effect<CircuitBreaker<E>> {
  return Effect.gen(function* () {
    const resetMs = Duration.toMillis(Duration.decode(config.resetTimeout));
    const { isTrippable, maxFailures, name } = config;
    const ref = yield* Ref.make<CircuitState>(initialState);

    const recordFailure = Clock.currentTimeMillis.pipe(
      Effect.flatMap((failedAt) =>
        Ref.updateAndGet(ref, (s) => onTrippableFailure(s, failedAt, maxFailures)),
      ),
      Effect.tap((next) =>
        next._tag === "Open"
          ? Effect.logDebug("circuit opened")
          : next._tag === "Closed"
            ? Effect.logDebug(`failure ${next.failures}/${maxFailures}`)
            : Effect.void,
      ),
    );

    const execute = <A, R>(
      effect: Effect.Effect<A, E, R>,
    ): Effect.Effect<A, E | CircuitOpenError, R> =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const decision = yield* Ref.modify(ref, (s) => gate(s, now, resetMs));

        if (decision === "reject") {
          yield* Effect.logDebug("circuit open, rejecting call");
          return yield* Effect.fail(new CircuitOpenError({ name }));
        }

        const guarded = effect.pipe(
          Effect.tap(() => Ref.set(ref, onHealthy())),
          Effect.tapError((e) =>
            isTrippable(e) ? recordFailure : Ref.set(ref, onHealthy()),
          ),
        );

        if (decision === "probe") {
          yield* Effect.logDebug("half-open, letting one probe through");
          return yield* guarded.pipe(
            Effect.onInterrupt(() => Ref.update(ref, onProbeAbandoned)),
          );
        }
        return yield* guarded;
      }).pipe(Effect.annotateLogs("circuit", name));

    return {
      execute,
      state: Ref.get(ref),
    } satisfies CircuitBreaker<E>;
  });
}
