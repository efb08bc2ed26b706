// Circuit breaker: pure state machine.
//
// States:
//   Closed   → calls flow through, consecutive failures are counted
//   Open     → calls rejected immediately until the reset timeout elapses
//   HalfOpen → exactly one probe call is in flight; every other call is
//              rejected until the probe settles
//
// Quote lookups run concurrently, so HalfOpen admits a single probe rather
// than every caller that arrives after the timeout.

// --- State ---

export type Closed = { readonly _tag: "Closed"; readonly failures: number };
export type Open = { readonly _tag: "Open"; readonly openedAt: number };
export type HalfOpen = { readonly _tag: "HalfOpen"; readonly openedAt: number };

export type CircuitState = Closed | Open | HalfOpen;

export const Closed = (failures: number): Closed => ({
  _tag: "Closed",
  failures,
});

export const Open = (openedAt: number): Open => ({
  _tag: "Open",
  openedAt,
});

/** `openedAt` is kept so an abandoned probe can restore the Open state. */
export const HalfOpen = (openedAt: number): HalfOpen => ({
  _tag: "HalfOpen",
  openedAt,
});

export const initialState: CircuitState = Closed(0);

// --- Transitions ---

export type GateDecision = "allow" | "probe" | "reject";

/** Decide whether a call may go through, and the resulting state. */
export function gate(
  state: CircuitState,
  now: number,
  resetMs: number,
): [GateDecision, CircuitState] {
  switch (state._tag) {
    case "Closed":
      return ["allow", state];
    case "HalfOpen":
      return ["reject", state];
    case "Open":
      return now - state.openedAt >= resetMs
        ? ["probe", HalfOpen(state.openedAt)]
        : ["reject", state];
  }
}

/** State after the provider answered, with data or with a domain-level
 *  "no" such as not-found. Either way it is healthy. */
export function onHealthy(): CircuitState {
  return Closed(0);
}

/** State after a failure that counts against the provider. */
export function onTrippableFailure(
  state: CircuitState,
  now: number,
  maxFailures: number,
): CircuitState {
  switch (state._tag) {
    case "HalfOpen":
      return Open(now);
    case "Closed": {
      const next = state.failures + 1;
      return next >= maxFailures ? Open(now) : Closed(next);
    }
    case "Open":
      // A call admitted while Closed may settle after another opened the circuit.
      return state;
  }
}

/** State after the probe was interrupted before it settled: back to Open
 *  with the original timestamp, so the next caller probes again. */
export function onProbeAbandoned(state: CircuitState): CircuitState {
  return state._tag === "HalfOpen" ? Open(state.openedAt) : state;
}
