import { parseChord, parseKeySymbol } from "../parser.js";
import type { Action, Binding, Chord, KeySymbol } from "../types.js";

export function keyOf(text: string): KeySymbol {
  const parsed = parseKeySymbol(text);
  if (!parsed.ok) throw new Error(`Invalid key: ${text}`);
  return parsed.value;
}

export function chordOf(text: string): Chord {
  const parsed = parseChord(text);
  if (!parsed.ok) throw new Error(`Invalid chord: ${text}`);
  return parsed.value;
}

export function bind(text: string, action: Action = () => {}): Binding {
  return Object.freeze({ chord: chordOf(text), action });
}

/** Action that counts its invocations. */
export type Counter = Readonly<{ action: Action; count: () => number }>;

export function counter(): Counter {
  let n = 0;
  return {
    action: () => {
      n++;
    },
    count: () => n,
  };
}
