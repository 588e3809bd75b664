/**
 * packages/node/src/dispatcher.ts — Host-side key router around a chord matcher.
 *
 * Why: The matcher only sees the keys inside a chord. The host decides when a
 * chord attempt starts (the activation key), which keys abort it, and where
 * keys go when no chord wants them. This is that host, driven one key at a
 * time from an event loop.
 *
 * States:
 *   idle    -- keys pass through; the activation key switches to active
 *   active  -- keys are fed to the matcher until matched / none / cancel
 *
 * Without an activation key the dispatcher is always active.
 */

import {
  type ChordMatcher,
  type ChordMatcherOptions,
  type ChordTable,
  ConfigurationError,
  EMPTY_MODS,
  KEY_ESCAPE,
  type KeySymbol,
  type Outcome,
  createChordMatcher,
  keysEqual,
} from "@keychords/core";

export type DispatchResult =
  | "passthrough"
  | "activated"
  | "pending"
  | "matched"
  | "cancelled"
  | "none";

/** Timer functions; defaults to the global setTimeout/clearTimeout. */
export type DispatcherTimers<H = unknown> = Readonly<{
  setTimeout: (callback: () => void, delayMs: number) => H;
  clearTimeout: (handle: H) => void;
}>;

export type ChordDispatcherOptions<H = NodeJS.Timeout> = Readonly<{
  table: ChordTable;
  /** Leading key consumed before a chord attempt; absent means always active. */
  activation?: KeySymbol;
  /** Keys that abort an active attempt. Default: [escape]. */
  cancelKeys?: readonly KeySymbol[];
  /**
   * Abort an active attempt after this many ms without input.
   * 0 or absent disables the timer.
   */
  idleTimeoutMs?: number;
  /** Receives keys no chord wants, including the key that broke a chord. */
  passthrough?: (key: KeySymbol) => void;
  /** Sees every matcher outcome, e.g. to render a pending-chord hint. */
  onOutcome?: (outcome: Outcome) => void;
  /** Called when an active attempt ends without a match (cancel key or timer). */
  onCancel?: (reason: "key" | "timeout") => void;
  timers?: DispatcherTimers<H>;
  /** Passed through to the matcher (trace, clock). */
  matcher?: Omit<ChordMatcherOptions, "idleTimeoutMs">;
}>;

export type ChordDispatcher = Readonly<{
  handleKey: (key: KeySymbol) => DispatchResult;
  isActive: () => boolean;
  matcher: ChordMatcher;
  /** Abort any active attempt and stop the idle timer. */
  dispose: () => void;
}>;

const DEFAULT_CANCEL_KEYS: readonly KeySymbol[] = Object.freeze([
  Object.freeze({ key: KEY_ESCAPE, mods: EMPTY_MODS }),
]);

function resolveIdleTimeout(value: number | undefined): number {
  if (value === undefined) return 0;
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(
      "INVALID_OPTION",
      `createChordDispatcher: idleTimeoutMs=${String(value)} must be a non-negative integer. Fix: pass 0 to disable the timer.`,
    );
  }
  return value;
}

function defaultTimers(): DispatcherTimers<NodeJS.Timeout> {
  return {
    setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
    clearTimeout: (handle) => clearTimeout(handle),
  };
}

/** Schedule through `timers`; the returned function clears the timer. */
function bindTimers<H>(timers: DispatcherTimers<H>): (callback: () => void, delayMs: number) => () => void {
  return (callback, delayMs) => {
    const handle = timers.setTimeout(callback, delayMs);
    return () => timers.clearTimeout(handle);
  };
}

export function createChordDispatcher<H = NodeJS.Timeout>(
  options: ChordDispatcherOptions<H>,
): ChordDispatcher {
  const idleTimeoutMs = resolveIdleTimeout(options.idleTimeoutMs);
  const matcher = createChordMatcher(options.table, options.matcher);
  const cancelKeys = options.cancelKeys ?? DEFAULT_CANCEL_KEYS;
  const activation = options.activation;
  const schedule = options.timers ? bindTimers(options.timers) : bindTimers(defaultTimers());
  let active = activation === undefined;
  let clearTimer: (() => void) | null = null;
  let disposed = false;

  function stopTimer(): void {
    if (clearTimer === null) return;
    const clear = clearTimer;
    clearTimer = null;
    clear();
  }

  function startTimer(): void {
    stopTimer();
    if (idleTimeoutMs === 0) return;
    clearTimer = schedule(() => {
      clearTimer = null;
      endAttempt();
      matcher.expire();
      options.onCancel?.("timeout");
    }, idleTimeoutMs);
  }

  /** Stop the timer and return to idle (when an activation key is in use). */
  function endAttempt(): void {
    stopTimer();
    if (activation !== undefined) active = false;
  }

  function finishAttempt(): void {
    endAttempt();
    matcher.cancel();
  }

  /** Update timer and activation for an outcome, before any callback runs. */
  function settle(outcome: Outcome): DispatchResult {
    switch (outcome.kind) {
      case "pending":
        startTimer();
        return "pending";
      case "matched":
        endAttempt();
        return "matched";
      case "none":
        endAttempt();
        return "none";
    }
  }

  function handleKey(key: KeySymbol): DispatchResult {
    if (disposed) return "passthrough";

    if (!active) {
      if (activation !== undefined && keysEqual(key, activation)) {
        active = true;
        startTimer();
        return "activated";
      }
      options.passthrough?.(key);
      return "passthrough";
    }

    const attemptStarted = activation !== undefined || matcher.pending().length > 0;
    if (attemptStarted && cancelKeys.some((k) => keysEqual(k, key))) {
      finishAttempt();
      options.onCancel?.("key");
      return "cancelled";
    }

    const outcome = matcher.feed(key);
    const result = settle(outcome);
    options.onOutcome?.(outcome);
    if (result === "none") options.passthrough?.(key);
    return result;
  }

  return Object.freeze({
    handleKey,
    isActive: () => active,
    matcher,
    dispose: () => {
      if (disposed) return;
      disposed = true;
      finishAttempt();
    },
  });
}
