/**
 * packages/core/src/chords/chordTable.ts — Build and validate the chord table.
 *
 * Why: All configuration mistakes surface here, once, before any key is fed.
 * The compiled trie lets the matcher advance one edge per key instead of
 * rescanning every binding.
 */

import { ConfigurationError } from "../errors.js";
import { makeTrieKey } from "./keyCodes.js";
import { type BindingMap, type InvalidKey, bindingsFromMap, chordToString } from "./parser.js";
import type { Binding, ChordTable, KeySymbol, PrefixPolicy, TrieNode } from "./types.js";

export type ChordTableOptions = Readonly<{
  /** Default: "reject". */
  prefixPolicy?: PrefixPolicy;
}>;

type MutableTrieNode = {
  readonly children: Map<number, MutableTrieNode>;
  binding: Binding | null;
  reachable: number;
};

function createNode(): MutableTrieNode {
  return { children: new Map(), binding: null, reachable: 0 };
}

function freezeNode(node: MutableTrieNode): TrieNode {
  const children = new Map<number, TrieNode>();
  for (const [edge, child] of node.children) {
    children.set(edge, freezeNode(child));
  }
  return Object.freeze({ children, binding: node.binding, reachable: node.reachable });
}

function resolvePrefixPolicy(value: unknown): PrefixPolicy {
  if (value === undefined) return "reject";
  if (value === "reject" || value === "shortest-wins") return value;
  throw new ConfigurationError(
    "INVALID_OPTION",
    `prefixPolicy=${JSON.stringify(value)} is not supported. Fix: use "reject" or "shortest-wins".`,
  );
}

/** Any binding ending strictly below `node`, for error messages. */
function firstBindingBelow(node: MutableTrieNode): Binding | null {
  for (const child of node.children.values()) {
    if (child.binding) return child.binding;
    const deeper = firstBindingBelow(child);
    if (deeper) return deeper;
  }
  return null;
}

function prefixConflict(shorter: Binding, longer: Binding): ConfigurationError {
  return new ConfigurationError(
    "PREFIX_CONFLICT",
    `chord "${chordToString(shorter.chord)}" is a prefix of "${chordToString(longer.chord)}". Fix: rename one of them, or build the table with prefixPolicy "shortest-wins" to let the shorter chord fire first.`,
  );
}

/**
 * Build the immutable chord table.
 *
 * @throws ConfigurationError EMPTY_CHORD, DUPLICATE_CHORD, PREFIX_CONFLICT
 *   (under "reject"), or INVALID_OPTION
 */
export function createChordTable(
  bindings: readonly Binding[],
  options?: ChordTableOptions,
): ChordTable {
  const prefixPolicy = resolvePrefixPolicy(options?.prefixPolicy);
  const root = createNode();

  for (const binding of bindings) {
    if (binding.chord.length === 0) {
      throw new ConfigurationError("EMPTY_CHORD", "a binding has an empty chord");
    }

    const path: MutableTrieNode[] = [root];
    let node = root;
    for (let i = 0; i < binding.chord.length; i++) {
      const key = binding.chord[i];
      if (!key) continue;
      const edge = makeTrieKey(key.key, key.mods);
      let child = node.children.get(edge);
      if (!child) {
        child = createNode();
        node.children.set(edge, child);
      }
      node = child;
      path.push(node);

      // An earlier, shorter chord ends here
      const isLast = i === binding.chord.length - 1;
      if (prefixPolicy === "reject" && !isLast && node.binding) {
        throw prefixConflict(node.binding, binding);
      }
    }

    if (node.binding) {
      throw new ConfigurationError(
        "DUPLICATE_CHORD",
        `chord "${chordToString(binding.chord)}" is bound more than once`,
      );
    }
    if (prefixPolicy === "reject") {
      const longer = firstBindingBelow(node);
      if (longer) throw prefixConflict(binding, longer);
    }

    node.binding = binding;
    for (const visited of path) visited.reachable++;
  }

  return Object.freeze({
    bindings: Object.freeze([...bindings]),
    prefixPolicy,
    root: freezeNode(root),
  });
}

export type ChordTableFromMapResult = Readonly<{
  table: ChordTable;
  invalidKeys: readonly InvalidKey[];
}>;

/**
 * Build a table from a `{ "chord string": action }` record.
 * Unparseable chord strings are reported in `invalidKeys`, not thrown.
 */
export function createChordTableFromMap(
  map: BindingMap,
  options?: ChordTableOptions,
): ChordTableFromMapResult {
  const parsed = bindingsFromMap(map);
  return Object.freeze({
    table: createChordTable(parsed.bindings, options),
    invalidKeys: parsed.invalidKeys,
  });
}

/** Walk the trie along `keys`; null when the prefix leaves the trie. */
export function findNode(table: ChordTable, keys: readonly KeySymbol[]): TrieNode | null {
  let node: TrieNode | undefined = table.root;
  for (const key of keys) {
    node = node.children.get(makeTrieKey(key.key, key.mods));
    if (!node) return null;
  }
  return node;
}

/** Bindings reachable at or below `node`, in trie order. */
export function collectBindings(node: TrieNode): Binding[] {
  const out: Binding[] = [];
  const walk = (n: TrieNode): void => {
    if (n.binding) out.push(n.binding);
    for (const child of n.children.values()) walk(child);
  };
  walk(node);
  return out;
}
