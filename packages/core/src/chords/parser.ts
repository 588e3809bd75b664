/**
 * packages/core/src/chords/parser.ts — Parse chord strings to KeySymbols.
 *
 * Why: Tables are written by people. This converts strings like "ctrl+k" or
 * "s a shift+t" into frozen KeySymbol sequences, and prints them back in a
 * canonical form for error messages and traces.
 *
 * Format examples:
 *   - Single key: "a", "escape", "f1"
 *   - With modifiers: "ctrl+s", "shift+t", "ctrl+alt+delete"
 *   - Chords (space-separated): "i k", "s a shift+t"
 */

import {
  EMPTY_MODS,
  MODIFIER_ALIASES,
  type ModifierName,
  keyCodeToName,
  keyNameToCode,
} from "./keyCodes.js";
import type { Action, Binding, Chord, KeySymbol, Modifiers, ParseResult } from "./types.js";

function parseKeyPart(part: string): ParseResult<KeySymbol> {
  if (part.length === 0) {
    return { ok: false, error: { code: "EMPTY_SEQUENCE", detail: "empty key part" } };
  }

  const pieces = part.toLowerCase().split("+");
  const flags: Record<ModifierName, boolean> = {
    shift: false,
    ctrl: false,
    alt: false,
    meta: false,
  };
  let keyName: string | undefined;

  // All but the last piece must be modifiers
  for (let i = 0; i < pieces.length; i++) {
    const piece = pieces[i];
    if (piece === undefined || piece.length === 0) {
      return {
        ok: false,
        error: { code: "INVALID_KEY", detail: `empty component in "${part}"` },
      };
    }

    const isLast = i === pieces.length - 1;
    if (isLast) {
      keyName = piece;
      break;
    }

    const modifier = MODIFIER_ALIASES.get(piece);
    if (modifier === undefined) {
      return {
        ok: false,
        error: {
          code: "INVALID_MODIFIER",
          detail: `"${piece}" is not a valid modifier in "${part}"`,
        },
      };
    }
    if (flags[modifier]) {
      return {
        ok: false,
        error: { code: "INVALID_MODIFIER", detail: `duplicate modifier "${piece}" in "${part}"` },
      };
    }
    flags[modifier] = true;
  }

  if (keyName === undefined) {
    return { ok: false, error: { code: "INVALID_KEY", detail: `no key found in "${part}"` } };
  }
  if (MODIFIER_ALIASES.has(keyName)) {
    return {
      ok: false,
      error: {
        code: "INVALID_KEY",
        detail: `modifier "${keyName}" cannot be the final key in "${part}"`,
      },
    };
  }

  const code = keyNameToCode(keyName);
  if (code === null) {
    return {
      ok: false,
      error: { code: "INVALID_KEY", detail: `unknown key "${keyName}" in "${part}"` },
    };
  }

  const mods: Modifiers =
    flags.shift || flags.ctrl || flags.alt || flags.meta ? Object.freeze(flags) : EMPTY_MODS;
  return { ok: true, value: Object.freeze({ key: code, mods }) };
}

/**
 * Parse one key symbol such as "ctrl+shift+t".
 * Whitespace inside the input is an error; use parseChord for sequences.
 */
export function parseKeySymbol(input: string): ParseResult<KeySymbol> {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return { ok: false, error: { code: "EMPTY_SEQUENCE", detail: "key string is empty" } };
  }
  if (/\s/.test(trimmed)) {
    return {
      ok: false,
      error: { code: "INVALID_KEY", detail: `"${trimmed}" is a sequence, expected one key` },
    };
  }
  return parseKeyPart(trimmed);
}

/**
 * Parse a space-separated chord string into a frozen Chord.
 *
 * Modifier names (case-insensitive):
 *   - shift
 *   - ctrl, control
 *   - alt, option, mod1
 *   - meta, cmd, command, super, win, mod4
 *
 * @example
 * ```ts
 * parseChord("i k")          // two plain keys
 * parseChord("s a shift+t")  // third key carries shift
 * ```
 */
export function parseChord(input: string): ParseResult<Chord> {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return { ok: false, error: { code: "EMPTY_SEQUENCE", detail: "chord string is empty" } };
  }

  const keys: KeySymbol[] = [];
  for (const part of trimmed.split(/\s+/)) {
    const result = parseKeyPart(part);
    if (!result.ok) return result;
    keys.push(result.value);
  }

  return { ok: true, value: Object.freeze(keys) };
}

export function keysEqual(a: KeySymbol, b: KeySymbol): boolean {
  return (
    a.key === b.key &&
    a.mods.shift === b.mods.shift &&
    a.mods.ctrl === b.mods.ctrl &&
    a.mods.alt === b.mods.alt &&
    a.mods.meta === b.mods.meta
  );
}

/**
 * Canonical text for a key symbol, e.g. "ctrl+alt+t".
 * Modifier order is ctrl, alt, shift, meta.
 */
export function keyToString(key: KeySymbol): string {
  const parts: string[] = [];
  if (key.mods.ctrl) parts.push("ctrl");
  if (key.mods.alt) parts.push("alt");
  if (key.mods.shift) parts.push("shift");
  if (key.mods.meta) parts.push("meta");
  parts.push(keyCodeToName(key.key));
  return parts.join("+");
}

export function chordToString(chord: Chord): string {
  return chord.map(keyToString).join(" ");
}

/** Value side of a binding record: a bare action or one with a description. */
export type BindingDefinition = Action | Readonly<{ action: Action; description?: string }>;

export type BindingMap = Readonly<Record<string, BindingDefinition>>;

/** Chord string that failed to parse while reading a BindingMap. */
export type InvalidKey = Readonly<{
  key: string;
  detail: string;
}>;

export type BindingsFromMapResult = Readonly<{
  bindings: readonly Binding[];
  invalidKeys: readonly InvalidKey[];
}>;

/**
 * Parse a `{ "chord string": action }` record into Bindings.
 * Invalid chord strings are collected and skipped rather than thrown.
 */
export function bindingsFromMap(map: BindingMap): BindingsFromMapResult {
  const bindings: Binding[] = [];
  const invalidKeys: InvalidKey[] = [];

  for (const [keyStr, def] of Object.entries(map)) {
    const parsed = parseChord(keyStr);
    if (!parsed.ok) {
      invalidKeys.push(Object.freeze({ key: keyStr, detail: parsed.error.detail }));
      continue;
    }

    if (typeof def === "function") {
      bindings.push(Object.freeze({ chord: parsed.value, action: def }));
    } else if (def.description !== undefined) {
      bindings.push(
        Object.freeze({ chord: parsed.value, action: def.action, description: def.description }),
      );
    } else {
      bindings.push(Object.freeze({ chord: parsed.value, action: def.action }));
    }
  }

  return Object.freeze({
    bindings: Object.freeze(bindings),
    invalidKeys: Object.freeze(invalidKeys),
  });
}
