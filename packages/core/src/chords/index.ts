/**
 * packages/core/src/chords/index.ts — Public exports for the chord system.
 */

// =============================================================================
// Type Exports
// =============================================================================

export type {
  Action,
  Binding,
  Chord,
  ChordTable,
  KeyParseError,
  KeySymbol,
  MatchState,
  Modifiers,
  Outcome,
  OutcomeKind,
  ParseResult,
  PrefixPolicy,
  TrieNode,
} from "./types.js";

export type {
  BindingDefinition,
  BindingMap,
  BindingsFromMapResult,
  InvalidKey,
} from "./parser.js";

export type { ChordTableFromMapResult, ChordTableOptions } from "./chordTable.js";

export type { ChordMatcher, ChordMatcherOptions, MatchKeyResult } from "./chordMatcher.js";

// =============================================================================
// Key Codes and Constants
// =============================================================================

export {
  KEY_SPACE,
  KEY_ESCAPE,
  KEY_ENTER,
  KEY_TAB,
  KEY_BACKSPACE,
  KEY_INSERT,
  KEY_DELETE,
  KEY_RIGHT,
  KEY_LEFT,
  KEY_DOWN,
  KEY_UP,
  KEY_PAGE_UP,
  KEY_PAGE_DOWN,
  KEY_HOME,
  KEY_END,
  KEY_F1,
  KEY_F12,
  MOD_SHIFT,
  MOD_CTRL,
  MOD_ALT,
  MOD_META,
  EMPTY_MODS,
  KEY_NAME_TO_CODE,
  MODIFIER_ALIASES,
  charToKeyCode,
  keyNameToCode,
  keyCodeToName,
  modsFromBitmask,
  modsToBitmask,
} from "./keyCodes.js";

// =============================================================================
// Parser
// =============================================================================

export {
  parseKeySymbol,
  parseChord,
  keysEqual,
  keyToString,
  chordToString,
  bindingsFromMap,
} from "./parser.js";

// =============================================================================
// Table and Matcher
// =============================================================================

export { createChordTable, createChordTableFromMap } from "./chordTable.js";

export {
  INITIAL_MATCH_STATE,
  createChordMatcher,
  isMatchExpired,
  matchKey,
} from "./chordMatcher.js";
