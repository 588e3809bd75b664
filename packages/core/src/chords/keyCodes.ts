/**
 * packages/core/src/chords/keyCodes.ts — Key codes, modifier bits, and name tables.
 *
 * Why: A KeySymbol stores its base key as a number so equality is a cheap
 * integer compare. Printable characters use their ASCII code (letters are
 * folded to uppercase); named keys live above the ASCII range.
 */

import type { Modifiers } from "./types.js";

// =============================================================================
// Named key codes
// =============================================================================

export const KEY_SPACE = 32;
export const KEY_ESCAPE = 256;
export const KEY_ENTER = 257;
export const KEY_TAB = 258;
export const KEY_BACKSPACE = 259;
export const KEY_INSERT = 260;
export const KEY_DELETE = 261;
export const KEY_RIGHT = 262;
export const KEY_LEFT = 263;
export const KEY_DOWN = 264;
export const KEY_UP = 265;
export const KEY_PAGE_UP = 266;
export const KEY_PAGE_DOWN = 267;
export const KEY_HOME = 268;
export const KEY_END = 269;
export const KEY_F1 = 290;
export const KEY_F12 = 301;

// =============================================================================
// Modifier bits
// =============================================================================

export const MOD_SHIFT = 1 << 0;
export const MOD_CTRL = 1 << 1;
export const MOD_ALT = 1 << 2;
export const MOD_META = 1 << 3;

export const EMPTY_MODS: Modifiers = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

export type ModifierName = keyof Modifiers;

/** Accepted modifier spellings mapped to the flag they set. */
export const MODIFIER_ALIASES: ReadonlyMap<string, ModifierName> = new Map<string, ModifierName>([
  ["shift", "shift"],
  ["ctrl", "ctrl"],
  ["control", "ctrl"],
  ["alt", "alt"],
  ["option", "alt"],
  ["mod1", "alt"],
  ["meta", "meta"],
  ["cmd", "meta"],
  ["command", "meta"],
  ["super", "meta"],
  ["win", "meta"],
  ["mod4", "meta"],
]);

function buildNameTable(): Map<string, number> {
  const table = new Map<string, number>([
    ["escape", KEY_ESCAPE],
    ["enter", KEY_ENTER],
    ["tab", KEY_TAB],
    ["backspace", KEY_BACKSPACE],
    ["space", KEY_SPACE],
    // "+" separates modifiers, so it needs a spelled-out name
    ["plus", 43],
    ["insert", KEY_INSERT],
    ["delete", KEY_DELETE],
    ["right", KEY_RIGHT],
    ["left", KEY_LEFT],
    ["down", KEY_DOWN],
    ["up", KEY_UP],
    ["pageup", KEY_PAGE_UP],
    ["pagedown", KEY_PAGE_DOWN],
    ["home", KEY_HOME],
    ["end", KEY_END],
  ]);
  for (let i = 0; i < 12; i++) {
    table.set(`f${String(i + 1)}`, KEY_F1 + i);
  }
  return table;
}

/** Canonical key names. Iteration order decides the name printed for a code. */
export const KEY_NAME_TO_CODE: ReadonlyMap<string, number> = buildNameTable();

/** Secondary spellings accepted by the parser but never printed. */
export const KEY_NAME_ALIASES: ReadonlyMap<string, number> = new Map([
  ["esc", KEY_ESCAPE],
  ["return", KEY_ENTER],
  ["del", KEY_DELETE],
  ["pgup", KEY_PAGE_UP],
  ["pgdn", KEY_PAGE_DOWN],
]);

/**
 * Convert a single printable character to its key code.
 * Letters are case-folded, so "a" and "A" share a code.
 *
 * @returns The key code, or null for non-printable input
 */
export function charToKeyCode(ch: string): number | null {
  if (ch.length !== 1) return null;
  const code = ch.charCodeAt(0);
  if (code >= 97 && code <= 122) return code - 32;
  if (code >= 33 && code <= 126) return code;
  if (code === 32) return KEY_SPACE;
  return null;
}

/** Resolve a (lowercase) key name or single character to a key code. */
export function keyNameToCode(name: string): number | null {
  const named = KEY_NAME_TO_CODE.get(name) ?? KEY_NAME_ALIASES.get(name);
  if (named !== undefined) return named;
  return charToKeyCode(name);
}

/** Printable name for a key code: canonical name, character, or `key<N>`. */
export function keyCodeToName(code: number): string {
  for (const [name, value] of KEY_NAME_TO_CODE) {
    if (value === code) return name;
  }
  if (code >= 65 && code <= 90) return String.fromCharCode(code + 32);
  if (code >= 33 && code <= 126) return String.fromCharCode(code);
  return `key${String(code)}`;
}

export function modsFromBitmask(mask: number): Modifiers {
  if (mask === 0) return EMPTY_MODS;
  return Object.freeze({
    shift: (mask & MOD_SHIFT) !== 0,
    ctrl: (mask & MOD_CTRL) !== 0,
    alt: (mask & MOD_ALT) !== 0,
    meta: (mask & MOD_META) !== 0,
  });
}

export function modsToBitmask(mods: Modifiers): number {
  let mask = 0;
  if (mods.shift) mask |= MOD_SHIFT;
  if (mods.ctrl) mask |= MOD_CTRL;
  if (mods.alt) mask |= MOD_ALT;
  if (mods.meta) mask |= MOD_META;
  return mask;
}

/**
 * Single-number identity of a key symbol, used as the trie edge key.
 * Modifier bits sit below the key code so distinct symbols never collide.
 */
export function makeTrieKey(key: number, mods: Modifiers): number {
  return key * 16 + modsToBitmask(mods);
}
