/**
 * packages/node/src/keypressSource.ts — Feed a readable stream's keypresses to a dispatcher.
 *
 * Why: This is the event loop of the host. `readline.emitKeypressEvents`
 * turns raw bytes into keypress events; each one becomes a KeySymbol and is
 * routed through the dispatcher, strictly in order, on the main thread.
 *
 * Raw mode swallows SIGINT, so the interrupt key (ctrl+c by default) is
 * checked before the dispatcher sees it.
 */

import { type Key, emitKeypressEvents } from "node:readline";
import { type KeySymbol, keysEqual, parseKeySymbol } from "@keychords/core";
import type { ChordDispatcher } from "./dispatcher.js";
import { keySymbolFromKeypress } from "./keypress.js";

/** Readable with the optional TTY surface of `process.stdin`. */
export type KeypressStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type KeypressSourceOptions = Readonly<{
  /** Key that calls onInterrupt instead of reaching the dispatcher. Default ctrl+c. */
  interruptKey?: KeySymbol | null;
  onInterrupt?: () => void;
  /** Raw keypress data that produced no KeySymbol. */
  onUnmapped?: (str: string | undefined, key: Key | undefined) => void;
}>;

function defaultInterruptKey(): KeySymbol {
  const parsed = parseKeySymbol("ctrl+c");
  if (!parsed.ok) throw new Error(`keypressSource: invariant violated (${parsed.error.detail})`);
  return parsed.value;
}

/**
 * Start routing keypresses from `stream` to `dispatcher`.
 *
 * @returns Detach function: removes the listener, restores raw mode, pauses the stream
 */
export function attachKeypressSource(
  stream: KeypressStream,
  dispatcher: ChordDispatcher,
  options?: KeypressSourceOptions,
): () => void {
  const interruptKey = options?.interruptKey === undefined ? defaultInterruptKey() : options.interruptKey;
  const canRaw = stream.isTTY === true && typeof stream.setRawMode === "function";
  const wasRaw = stream.isRaw === true;

  const onKeypress = (str: string | undefined, key: Key | undefined): void => {
    const symbol = keySymbolFromKeypress(str, key);
    if (symbol === null) {
      options?.onUnmapped?.(str, key);
      return;
    }
    if (interruptKey !== null && keysEqual(symbol, interruptKey)) {
      options?.onInterrupt?.();
      return;
    }
    dispatcher.handleKey(symbol);
  };

  emitKeypressEvents(stream);
  if (canRaw && !wasRaw) stream.setRawMode?.(true);
  stream.on("keypress", onKeypress);
  stream.resume();

  let detached = false;
  return () => {
    if (detached) return;
    detached = true;
    stream.removeListener("keypress", onKeypress);
    if (canRaw && !wasRaw) stream.setRawMode?.(false);
    stream.pause();
  };
}
