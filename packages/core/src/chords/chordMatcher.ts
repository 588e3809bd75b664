/**
 * packages/core/src/chords/chordMatcher.ts — Prefix-matching automaton over key presses.
 *
 * Why: Turns a stream of discrete key presses into at most one action per
 * completed chord. `matchKey` is the pure transition; `createChordMatcher`
 * owns one MatchState, runs actions, and records a trace.
 *
 * Transition for one key:
 *   1. pending state older than the idle timeout is discarded ("expired")
 *   2. the key extends the pending prefix
 *   3. prefix leaves the trie        -> none, reset
 *   4. prefix ends at a binding      -> matched, reset (even if longer chords
 *                                       continue from here)
 *   5. otherwise                     -> pending, keep state
 */

import { ConfigurationError, KeychordError } from "../errors.js";
import type { MatchTrace } from "../trace/matchTrace.js";
import { collectBindings, findNode } from "./chordTable.js";
import { makeTrieKey } from "./keyCodes.js";
import { chordToString, keyToString } from "./parser.js";
import type { Binding, ChordTable, KeySymbol, MatchState, Outcome, TrieNode } from "./types.js";

/** Idle state. Every terminal outcome returns to this exact object. */
export const INITIAL_MATCH_STATE: MatchState = Object.freeze({
  pendingKeys: Object.freeze([]),
  startTimeMs: 0,
  lastKeyTimeMs: 0,
});

const NONE: Outcome = Object.freeze({ kind: "none" });

/**
 * Whether a pending state has been idle for longer than `idleTimeoutMs`.
 * A gap of exactly `idleTimeoutMs` is still in time. Idle states never expire.
 */
export function isMatchExpired(state: MatchState, timeMs: number, idleTimeoutMs: number): boolean {
  if (idleTimeoutMs <= 0) return false;
  if (state.pendingKeys.length === 0) return false;
  return timeMs - state.lastKeyTimeMs > idleTimeoutMs;
}

export type MatchKeyResult = Readonly<{
  outcome: Outcome;
  nextState: MatchState;
  /** Keys discarded by the idle timeout before this key was applied. */
  expired: readonly KeySymbol[];
}>;

/**
 * Pure transition: apply one key to `state`.
 * Does not run the action of a matched binding.
 *
 * @param idleTimeoutMs - 0 disables expiry
 */
export function matchKey(
  table: ChordTable,
  state: MatchState,
  key: KeySymbol,
  timeMs: number,
  idleTimeoutMs = 0,
): MatchKeyResult {
  let current = state;
  let expired: readonly KeySymbol[] = Object.freeze([]);
  if (isMatchExpired(current, timeMs, idleTimeoutMs)) {
    expired = current.pendingKeys;
    current = INITIAL_MATCH_STATE;
  }

  const from = findNode(table, current.pendingKeys);
  const node: TrieNode | undefined = from?.children.get(makeTrieKey(key.key, key.mods));

  if (!node) {
    return Object.freeze({ outcome: NONE, nextState: INITIAL_MATCH_STATE, expired });
  }

  // First complete match wins, even when longer chords share this prefix.
  if (node.binding) {
    const matched: Outcome = { kind: "matched", binding: node.binding };
    return Object.freeze({
      outcome: Object.freeze(matched),
      nextState: INITIAL_MATCH_STATE,
      expired,
    });
  }

  const pendingKeys = Object.freeze([...current.pendingKeys, key]);
  const pending: Outcome = { kind: "pending", pending: pendingKeys };
  const nextState: MatchState = {
    pendingKeys,
    startTimeMs: current.pendingKeys.length === 0 ? timeMs : current.startTimeMs,
    lastKeyTimeMs: timeMs,
  };
  return Object.freeze({
    outcome: Object.freeze(pending),
    nextState: Object.freeze(nextState),
    expired,
  });
}

export type ChordMatcherOptions = Readonly<{
  /**
   * Discard a pending sequence when the next key arrives more than this many
   * ms after the previous one. 0 or absent disables the timeout.
   */
  idleTimeoutMs?: number;
  /** Time source used when feed() is called without a timestamp. */
  clock?: () => number;
  trace?: MatchTrace;
}>;

export type ChordMatcher = Readonly<{
  table: ChordTable;
  /**
   * Feed the next key press.
   * A matched action runs synchronously before this returns; if it throws,
   * the error is returned as `actionError` and the matcher stays usable.
   */
  feed: (key: KeySymbol, timeMs?: number) => Outcome;
  /** Discard any pending keys. Returns true if something was pending. */
  cancel: () => boolean;
  /**
   * Discard pending keys because the host's idle timer ran out.
   * Same as cancel() but traced as "expired".
   */
  expire: () => boolean;
  pending: () => readonly KeySymbol[];
  /** Pending keys as canonical text ("s a"), or null when idle. */
  pendingString: () => string | null;
  /** Bindings still reachable from the pending prefix (all bindings when idle). */
  candidates: () => readonly Binding[];
  /** Snapshot of the current MatchState. */
  state: () => MatchState;
}>;

function resolveIdleTimeout(value: number | undefined): number {
  if (value === undefined) return 0;
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(
      "INVALID_OPTION",
      `idleTimeoutMs=${String(value)} must be a non-negative finite number. Fix: pass 0 to disable the timeout.`,
    );
  }
  return value;
}

function defaultClock(): number {
  return Date.now();
}

/**
 * Create a matcher that owns its MatchState.
 *
 * @example
 * ```ts
 * const { table } = createChordTableFromMap({ "i k": openTerminal, "j j": openBrowser });
 * const matcher = createChordMatcher(table);
 * matcher.feed(keyOf("i")); // { kind: "pending", ... }
 * matcher.feed(keyOf("k")); // { kind: "matched", ... } and openTerminal() ran
 * ```
 */
export function createChordMatcher(table: ChordTable, options?: ChordMatcherOptions): ChordMatcher {
  const idleTimeoutMs = resolveIdleTimeout(options?.idleTimeoutMs);
  const clock = options?.clock ?? defaultClock;
  const trace = options?.trace;
  let state = INITIAL_MATCH_STATE;
  let inAction = false;

  function assertNotReentrant(op: string): void {
    if (inAction) {
      throw new KeychordError(
        "REENTRANT_CALL",
        `${op}() was called from inside a chord action. Fix: defer the call (e.g. queueMicrotask) until the action returns.`,
      );
    }
  }

  function feed(key: KeySymbol, timeMs?: number): Outcome {
    assertNotReentrant("feed");
    const now = timeMs ?? clock();
    const before = state;
    const result = matchKey(table, state, key, now, idleTimeoutMs);
    state = result.nextState;

    if (result.expired.length > 0) {
      trace?.record({ timeMs: now, kind: "expired", pending: chordToString(result.expired) });
    }
    const pendingBefore = result.expired.length > 0 ? "" : chordToString(before.pendingKeys);

    const outcome = result.outcome;
    if (outcome.kind !== "matched") {
      trace?.record({
        timeMs: now,
        kind: "feed",
        key: keyToString(key),
        outcome: outcome.kind,
        pending: pendingBefore,
      });
      return outcome;
    }

    const chord = chordToString(outcome.binding.chord);
    trace?.record({
      timeMs: now,
      kind: "feed",
      key: keyToString(key),
      outcome: "matched",
      pending: pendingBefore,
      chord,
    });

    inAction = true;
    try {
      outcome.binding.action();
    } catch (error: unknown) {
      trace?.record({ timeMs: now, kind: "action-error", pending: "", chord, error });
      const failed: Outcome = { kind: "matched", binding: outcome.binding, actionError: error };
      return Object.freeze(failed);
    } finally {
      inAction = false;
    }
    return outcome;
  }

  function discard(op: "cancel" | "expire", kind: "cancel" | "expired"): boolean {
    assertNotReentrant(op);
    const hadPending = state.pendingKeys.length > 0;
    if (hadPending) {
      trace?.record({ timeMs: clock(), kind, pending: chordToString(state.pendingKeys) });
    }
    state = INITIAL_MATCH_STATE;
    return hadPending;
  }

  return Object.freeze({
    table,
    feed,
    cancel: () => discard("cancel", "cancel"),
    expire: () => discard("expire", "expired"),
    pending: () => state.pendingKeys,
    pendingString: () => (state.pendingKeys.length === 0 ? null : chordToString(state.pendingKeys)),
    candidates: () => {
      const node = findNode(table, state.pendingKeys);
      return Object.freeze(node ? collectBindings(node) : []);
    },
    state: () => state,
  });
}
