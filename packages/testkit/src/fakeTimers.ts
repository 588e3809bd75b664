/**
 * Deterministic timer source for tests.
 *
 * Handles are plain numbers; nothing fires until `advance()` is called.
 */

type PendingTimer = {
  readonly id: number;
  readonly dueMs: number;
  readonly callback: () => void;
};

export type FakeTimers = Readonly<{
  setTimeout: (callback: () => void, delayMs: number) => number;
  clearTimeout: (handle: number) => void;
  /** Current fake time in ms. */
  now: () => number;
  /** Move time forward, firing due timers in due order. */
  advance: (ms: number) => void;
  /** Number of timers not yet fired or cleared. */
  pendingCount: () => number;
}>;

export function createFakeTimers(startMs = 0): FakeTimers {
  let nowMs = startMs;
  let nextId = 1;
  const timers: PendingTimer[] = [];

  function remove(id: number): void {
    const index = timers.findIndex((t) => t.id === id);
    if (index >= 0) timers.splice(index, 1);
  }

  return Object.freeze({
    setTimeout: (callback: () => void, delayMs: number) => {
      const id = nextId++;
      timers.push({ id, dueMs: nowMs + Math.max(0, delayMs), callback });
      return id;
    },
    clearTimeout: (handle: number) => {
      remove(handle);
    },
    now: () => nowMs,
    advance: (ms: number) => {
      const target = nowMs + ms;
      for (;;) {
        let next: PendingTimer | undefined;
        for (const t of timers) {
          if (t.dueMs > target) continue;
          if (next === undefined || t.dueMs < next.dueMs) next = t;
        }
        if (next === undefined) break;
        remove(next.id);
        nowMs = next.dueMs;
        next.callback();
      }
      nowMs = target;
    },
    pendingCount: () => timers.length,
  });
}
