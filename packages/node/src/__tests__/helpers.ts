import { type Binding, type KeySymbol, parseChord, parseKeySymbol } from "@keychords/core";

export function keyOf(text: string): KeySymbol {
  const parsed = parseKeySymbol(text);
  if (!parsed.ok) throw new Error(`Invalid key: ${text}`);
  return parsed.value;
}

export function bind(text: string, action: () => void = () => {}): Binding {
  const parsed = parseChord(text);
  if (!parsed.ok) throw new Error(`Invalid chord: ${text}`);
  return Object.freeze({ chord: parsed.value, action });
}

/** Let stream "data" events and resume() ticks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export type Capture = Readonly<{ write: (text: string) => boolean; text: () => string }>;

export function capture(): Capture {
  let out = "";
  return {
    write: (text: string) => {
      out += text;
      return true;
    },
    text: () => out,
  };
}
