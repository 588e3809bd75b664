import { assert, describe, test } from "@keychords/testkit";
import { ConfigurationError, KeychordError } from "../../errors.js";
import { createMatchTrace } from "../../trace/matchTrace.js";
import { INITIAL_MATCH_STATE, createChordMatcher, matchKey } from "../chordMatcher.js";
import { createChordTable } from "../chordTable.js";
import { chordToString } from "../parser.js";
import type { ChordMatcher } from "../chordMatcher.js";
import { bind, counter, keyOf } from "./helpers.js";

function threeChordTable() {
  const a1 = counter();
  const a2 = counter();
  const a3 = counter();
  const table = createChordTable([bind("i k", a1.action), bind("i w", a2.action), bind("j j", a3.action)]);
  return { table, a1, a2, a3 };
}

describe("chord matcher end to end", () => {
  test("i k, j j, then an unknown key", () => {
    const { table, a1, a2, a3 } = threeChordTable();
    const matcher = createChordMatcher(table);

    assert.equal(matcher.feed(keyOf("i")).kind, "pending");
    const r1 = matcher.feed(keyOf("k"));
    assert.equal(r1.kind, "matched");
    if (r1.kind !== "matched") return;
    assert.equal(r1.binding, table.bindings[0]);
    assert.equal(a1.count(), 1);
    assert.equal(matcher.pending().length, 0);

    assert.equal(matcher.feed(keyOf("j")).kind, "pending");
    assert.equal(matcher.feed(keyOf("j")).kind, "matched");
    assert.equal(a3.count(), 1);

    assert.equal(matcher.feed(keyOf("x")).kind, "none");
    assert.equal(matcher.pendingString(), null);
    assert.equal(a2.count(), 0);
  });

  test("modifier mask is part of key equality", () => {
    const a4 = counter();
    const table = createChordTable([bind("s a shift+t", a4.action)]);
    const matcher = createChordMatcher(table);

    assert.equal(matcher.feed(keyOf("s")).kind, "pending");
    assert.equal(matcher.feed(keyOf("a")).kind, "pending");
    assert.equal(matcher.pendingString(), "s a");
    assert.equal(matcher.feed(keyOf("shift+t")).kind, "matched");
    assert.equal(a4.count(), 1);

    assert.equal(matcher.feed(keyOf("s")).kind, "pending");
    assert.equal(matcher.feed(keyOf("a")).kind, "pending");
    assert.equal(matcher.feed(keyOf("t")).kind, "none");
    assert.equal(matcher.pending().length, 0);
    assert.equal(a4.count(), 1);
  });

  test("pending outcome carries the keys so far", () => {
    const { table } = threeChordTable();
    const matcher = createChordMatcher(table);
    const outcome = matcher.feed(keyOf("i"));
    assert.equal(outcome.kind, "pending");
    if (outcome.kind !== "pending") return;
    assert.equal(chordToString(outcome.pending), "i");
  });
});

describe("first complete match wins", () => {
  test("shorter chord fires without waiting for the longer one", () => {
    const short = counter();
    const long = counter();
    const table = createChordTable([bind("i k", short.action), bind("i k l", long.action)], {
      prefixPolicy: "shortest-wins",
    });
    const matcher = createChordMatcher(table);

    assert.equal(matcher.feed(keyOf("i")).kind, "pending");
    const outcome = matcher.feed(keyOf("k"));
    assert.equal(outcome.kind, "matched");
    if (outcome.kind !== "matched") return;
    assert.equal(chordToString(outcome.binding.chord), "i k");
    assert.equal(short.count(), 1);

    // State was reset, so "l" starts a fresh attempt
    assert.equal(matcher.feed(keyOf("l")).kind, "none");
    assert.equal(long.count(), 0);
  });

  test("single-key chord fires on its own key", () => {
    const g = counter();
    const table = createChordTable([bind("g g"), bind("g", g.action)], {
      prefixPolicy: "shortest-wins",
    });
    const matcher = createChordMatcher(table);
    assert.equal(matcher.feed(keyOf("g")).kind, "matched");
    assert.equal(g.count(), 1);
  });
});

describe("reset behavior", () => {
  test("first key that starts no chord yields none and leaves state empty", () => {
    const { table, a1 } = threeChordTable();
    const matcher = createChordMatcher(table);

    assert.equal(matcher.feed(keyOf("z")).kind, "none");
    assert.equal(matcher.state(), INITIAL_MATCH_STATE);
    assert.equal(matcher.feed(keyOf("i")).kind, "pending");
    assert.equal(matcher.feed(keyOf("k")).kind, "matched");
    assert.equal(a1.count(), 1);
  });

  test("matching the same chord twice fires twice", () => {
    const { table, a1 } = threeChordTable();
    const matcher = createChordMatcher(table);

    for (let i = 0; i < 2; i++) {
      assert.equal(matcher.feed(keyOf("i")).kind, "pending");
      assert.equal(matcher.feed(keyOf("k")).kind, "matched");
      assert.equal(matcher.state(), INITIAL_MATCH_STATE);
    }
    assert.equal(a1.count(), 2);
  });

  test("mismatch mid-chord resets instead of restarting from the offending key", () => {
    const { table, a3 } = threeChordTable();
    const matcher = createChordMatcher(table);

    assert.equal(matcher.feed(keyOf("i")).kind, "pending");
    assert.equal(matcher.feed(keyOf("j")).kind, "none");
    assert.equal(matcher.pending().length, 0);
    assert.equal(matcher.feed(keyOf("j")).kind, "pending");
    assert.equal(matcher.feed(keyOf("j")).kind, "matched");
    assert.equal(a3.count(), 1);
  });
});

describe("cancel", () => {
  test("discards a pending sequence without running anything", () => {
    const { table, a1, a2 } = threeChordTable();
    const matcher = createChordMatcher(table);

    matcher.feed(keyOf("i"));
    assert.equal(matcher.cancel(), true);
    assert.equal(matcher.pending().length, 0);

    // "k" alone starts no chord
    assert.equal(matcher.feed(keyOf("k")).kind, "none");
    assert.equal(matcher.feed(keyOf("i")).kind, "pending");
    assert.equal(matcher.feed(keyOf("w")).kind, "matched");
    assert.equal(a1.count(), 0);
    assert.equal(a2.count(), 1);
  });

  test("returns false when idle", () => {
    const { table } = threeChordTable();
    const matcher = createChordMatcher(table);
    assert.equal(matcher.cancel(), false);
  });
});

describe("expire", () => {
  test("discards pending keys and traces them as expired", () => {
    const { table, a1 } = threeChordTable();
    const trace = createMatchTrace();
    const matcher = createChordMatcher(table, { trace, clock: () => 42 });

    matcher.feed(keyOf("i"));
    assert.equal(matcher.expire(), true);
    assert.equal(matcher.pending().length, 0);
    assert.equal(matcher.feed(keyOf("k")).kind, "none");
    assert.equal(a1.count(), 0);

    assert.deepEqual(trace.records()[1], {
      timeMs: 42,
      kind: "expired",
      pending: "i",
      seq: 2,
      severity: "info",
    });
  });

  test("returns false and records nothing when idle", () => {
    const { table } = threeChordTable();
    const trace = createMatchTrace();
    const matcher = createChordMatcher(table, { trace });

    assert.equal(matcher.expire(), false);
    assert.equal(trace.records().length, 0);
  });
});

describe("candidates", () => {
  test("lists every binding when idle and narrows while pending", () => {
    const { table } = threeChordTable();
    const matcher = createChordMatcher(table);

    assert.equal(matcher.candidates().length, 3);
    matcher.feed(keyOf("i"));
    assert.deepEqual(
      matcher.candidates().map((b) => chordToString(b.chord)),
      ["i k", "i w"],
    );
  });
});

describe("actions", () => {
  test("a throwing action is reported and the matcher stays usable", () => {
    const boom = new Error("boom");
    const table = createChordTable([
      bind("x x", () => {
        throw boom;
      }),
      bind("y y"),
    ]);
    const matcher = createChordMatcher(table);

    matcher.feed(keyOf("x"));
    const outcome = matcher.feed(keyOf("x"));
    assert.equal(outcome.kind, "matched");
    if (outcome.kind !== "matched") return;
    assert.equal(outcome.actionError, boom);

    assert.equal(matcher.feed(keyOf("y")).kind, "pending");
    assert.equal(matcher.feed(keyOf("y")).kind, "matched");
  });

  test("feeding from inside an action is refused", () => {
    let matcher: ChordMatcher | null = null;
    const table = createChordTable([
      bind("r r", () => {
        matcher?.feed(keyOf("r"));
      }),
    ]);
    matcher = createChordMatcher(table);

    matcher.feed(keyOf("r"));
    const outcome = matcher.feed(keyOf("r"));
    assert.equal(outcome.kind, "matched");
    if (outcome.kind !== "matched") return;
    const err = outcome.actionError;
    assert.equal(err instanceof KeychordError, true);
    if (!(err instanceof KeychordError)) return;
    assert.equal(err.code, "REENTRANT_CALL");

    // Guard is released after the action returns
    assert.equal(matcher.feed(keyOf("r")).kind, "pending");
  });
});

describe("idle timeout", () => {
  test("gap of exactly the timeout is still in time", () => {
    const { table, a1 } = threeChordTable();
    const matcher = createChordMatcher(table, { idleTimeoutMs: 100 });

    matcher.feed(keyOf("i"), 0);
    assert.equal(matcher.feed(keyOf("k"), 100).kind, "matched");
    assert.equal(a1.count(), 1);
  });

  test("longer gap discards the pending keys before the new key", () => {
    const { table, a1 } = threeChordTable();
    const matcher = createChordMatcher(table, { idleTimeoutMs: 100 });

    matcher.feed(keyOf("i"), 0);
    assert.equal(matcher.feed(keyOf("k"), 101).kind, "none");
    assert.equal(a1.count(), 0);

    matcher.feed(keyOf("i"), 200);
    assert.equal(matcher.feed(keyOf("i"), 400).kind, "pending");
    assert.equal(matcher.state().startTimeMs, 400);
  });

  test("timeout is measured from the last key, not the first", () => {
    const table = createChordTable([bind("s a t")]);
    const matcher = createChordMatcher(table, { idleTimeoutMs: 50 });

    matcher.feed(keyOf("s"), 0);
    matcher.feed(keyOf("a"), 40);
    assert.equal(matcher.feed(keyOf("t"), 80).kind, "matched");
  });

  test("clock supplies the time when feed has no timestamp", () => {
    const times = [0, 500];
    const { table } = threeChordTable();
    const matcher = createChordMatcher(table, {
      idleTimeoutMs: 100,
      clock: () => times.shift() ?? 0,
    });

    matcher.feed(keyOf("i"));
    assert.equal(matcher.feed(keyOf("k")).kind, "none");
  });

  test("negative timeout is a configuration error", () => {
    const { table } = threeChordTable();
    assert.throws(
      () => createChordMatcher(table, { idleTimeoutMs: -1 }),
      (err: unknown) => err instanceof ConfigurationError && err.code === "INVALID_OPTION",
    );
  });
});

describe("matchKey", () => {
  test("is a pure transition that records timing", () => {
    const { table, a1 } = threeChordTable();

    const r1 = matchKey(table, INITIAL_MATCH_STATE, keyOf("i"), 10);
    assert.equal(r1.outcome.kind, "pending");
    assert.equal(r1.nextState.startTimeMs, 10);
    assert.equal(r1.nextState.lastKeyTimeMs, 10);

    const r2 = matchKey(table, r1.nextState, keyOf("k"), 20);
    assert.equal(r2.outcome.kind, "matched");
    assert.equal(r2.nextState, INITIAL_MATCH_STATE);
    assert.equal(a1.count(), 0);
  });

  test("reports expired keys", () => {
    const { table } = threeChordTable();
    const r1 = matchKey(table, INITIAL_MATCH_STATE, keyOf("i"), 0, 10);
    const r2 = matchKey(table, r1.nextState, keyOf("j"), 11, 10);
    assert.equal(chordToString(r2.expired), "i");
    assert.equal(r2.outcome.kind, "pending");
  });
});

describe("trace", () => {
  test("records one entry per fed key", () => {
    const { table } = threeChordTable();
    const trace = createMatchTrace();
    const matcher = createChordMatcher(table, { trace });

    matcher.feed(keyOf("i"), 5);
    matcher.feed(keyOf("k"), 6);

    const records = trace.records();
    assert.equal(records.length, 2);
    assert.deepEqual(records[0], {
      timeMs: 5,
      kind: "feed",
      key: "i",
      outcome: "pending",
      pending: "",
      seq: 1,
      severity: "trace",
    });
    assert.deepEqual(records[1], {
      timeMs: 6,
      kind: "feed",
      key: "k",
      outcome: "matched",
      pending: "i",
      chord: "i k",
      seq: 2,
      severity: "info",
    });
  });

  test("records cancel, expiry and action errors", () => {
    const table = createChordTable([
      bind("x x", () => {
        throw new Error("nope");
      }),
    ]);
    const trace = createMatchTrace();
    const matcher = createChordMatcher(table, { trace, idleTimeoutMs: 10, clock: () => 0 });

    matcher.feed(keyOf("x"), 0);
    matcher.cancel();
    matcher.feed(keyOf("x"), 100);
    matcher.feed(keyOf("x"), 200);
    matcher.feed(keyOf("x"), 205);

    assert.deepEqual(
      trace.records().map((r) => `${r.kind}:${r.pending}`),
      ["feed:", "cancel:x", "feed:", "expired:x", "feed:", "feed:x", "action-error:"],
    );
    assert.equal(trace.records()[6]?.severity, "error");
  });
});
