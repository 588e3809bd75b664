/**
 * packages/node/src/keypress.ts — Convert readline keypress events to KeySymbols.
 *
 * Why: `readline.emitKeypressEvents` already decodes terminal escape
 * sequences into `{ name, ctrl, meta, shift }`. This maps that shape onto the
 * core KeySymbol so chords written as "ctrl+a" or "shift+t" match what the
 * terminal sends.
 *
 * Terminals report Alt as an ESC prefix, which readline surfaces as `meta`;
 * it is mapped to the `alt` modifier.
 */

import type { Key } from "node:readline";
import {
  EMPTY_MODS,
  type KeySymbol,
  type Modifiers,
  charToKeyCode,
  keyNameToCode,
} from "@keychords/core";

function isUpperAsciiLetter(ch: string): boolean {
  return ch.length === 1 && ch >= "A" && ch <= "Z";
}

/**
 * Build a KeySymbol from the `(str, key)` pair of a "keypress" event.
 *
 * @returns null for input that has no key code (e.g. a pasted multi-char chunk)
 */
export function keySymbolFromKeypress(str: string | undefined, key: Key | undefined): KeySymbol | null {
  let code: number | null = null;
  let shift = key?.shift === true;

  const name = key?.name;
  if (name !== undefined && name.length > 0) {
    code = keyNameToCode(name.toLowerCase());
  }
  if (code === null && str !== undefined) {
    code = charToKeyCode(str);
    if (code !== null && isUpperAsciiLetter(str)) shift = true;
  }
  // alt+punctuation arrives as ESC + char with neither name nor str
  const sequence = key?.sequence;
  if (code === null && key?.meta === true && sequence !== undefined && sequence.startsWith("\x1b")) {
    const ch = sequence.slice(1);
    code = charToKeyCode(ch);
    if (code !== null && isUpperAsciiLetter(ch)) shift = true;
  }
  if (code === null) return null;

  const ctrl = key?.ctrl === true;
  const alt = key?.meta === true;
  const mods: Modifiers = shift || ctrl || alt ? Object.freeze({ shift, ctrl, alt, meta: false }) : EMPTY_MODS;
  return Object.freeze({ key: code, mods });
}
