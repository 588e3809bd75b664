/**
 * packages/core/src/chords/types.ts — Chord system type definitions.
 *
 * Why: Defines the shapes shared by the parser, the table builder, and the
 * matcher. Everything handed out by the library is frozen; the only mutable
 * state is the MatchState a matcher keeps privately.
 */

/**
 * Keyboard modifier state.
 * Mirrors the MOD_* bitmask in keyCodes.ts.
 */
export type Modifiers = Readonly<{
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}>;

/**
 * One key press: base key code plus the modifiers held.
 * Two symbols are equal iff the code and every modifier flag are equal.
 */
export type KeySymbol = Readonly<{
  key: number;
  mods: Modifiers;
}>;

/** Ordered, non-empty sequence of key symbols. */
export type Chord = readonly KeySymbol[];

/** Callback run when a chord completes. */
export type Action = () => void;

export type Binding = Readonly<{
  chord: Chord;
  action: Action;
  /** Optional user-facing description for help overlays/introspection. */
  description?: string;
}>;

/**
 * How the table treats a chord that is a strict prefix of another.
 *
 *   - "reject": construction fails with PREFIX_CONFLICT
 *   - "shortest-wins": the shorter chord fires as soon as it completes
 */
export type PrefixPolicy = "reject" | "shortest-wins";

/**
 * Node of the compiled prefix trie.
 * Edges are keyed by makeTrieKey(); `binding` is set where a chord ends.
 */
export type TrieNode = Readonly<{
  children: ReadonlyMap<number, TrieNode>;
  binding: Binding | null;
  /** Number of bindings at or below this node. */
  reachable: number;
}>;

/** Immutable chord configuration. */
export type ChordTable = Readonly<{
  bindings: readonly Binding[];
  prefixPolicy: PrefixPolicy;
  root: TrieNode;
}>;

/**
 * Progress through the current attempt.
 * `startTimeMs`/`lastKeyTimeMs` are 0 while idle.
 */
export type MatchState = Readonly<{
  pendingKeys: readonly KeySymbol[];
  startTimeMs: number;
  lastKeyTimeMs: number;
}>;

/**
 * Per-event result of feeding a key.
 *
 * Discriminated union:
 *   - "matched": a chord completed and its action ran
 *   - "pending": the keys so far are a prefix of at least one chord
 *   - "none": no chord starts with the keys so far; state was reset
 */
export type Outcome =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "pending"; pending: readonly KeySymbol[] }>
  | Readonly<{ kind: "matched"; binding: Binding; actionError?: unknown }>;

export type OutcomeKind = Outcome["kind"];

/**
 * Error returned when parsing a key or chord string fails.
 */
export type KeyParseError = Readonly<{
  code: "INVALID_KEY" | "EMPTY_SEQUENCE" | "INVALID_MODIFIER";
  detail: string;
}>;

export type ParseResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: KeyParseError }>;
