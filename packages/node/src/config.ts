/**
 * packages/node/src/config.ts — JSON chord configuration for the Node host.
 *
 * Format:
 *   {
 *     "activation": "ctrl+a",          // optional leading key
 *     "idleTimeoutMs": 1500,           // optional, positive integer
 *     "prefixPolicy": "reject",        // optional, "reject" | "shortest-wins"
 *     "bindings": {
 *       "i k": "xterm",
 *       "j j": { "command": "firefox", "description": "browser" }
 *     }
 *   }
 *
 * Every problem is reported as ConfigurationError("INVALID_CONFIG") with the
 * offending field and a fix.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  type Binding,
  type Chord,
  type ChordTable,
  ConfigurationError,
  type KeySymbol,
  type PrefixPolicy,
  createChordTable,
  parseChord,
  parseKeySymbol,
} from "@keychords/core";

export type CommandBinding = Readonly<{
  chord: Chord;
  /** Chord as written in the file. */
  chordText: string;
  command: string;
  description?: string;
}>;

export type ChordConfig = Readonly<{
  activation: KeySymbol | null;
  /** 0 when absent. */
  idleTimeoutMs: number;
  prefixPolicy: PrefixPolicy;
  bindings: readonly CommandBinding[];
}>;

function invalid(source: string, detail: string): ConfigurationError {
  return new ConfigurationError("INVALID_CONFIG", `${source}: ${detail}`);
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parsePositiveInt(n: unknown): number | null {
  if (typeof n !== "number") return null;
  if (!Number.isFinite(n)) return null;
  if (!Number.isInteger(n)) return null;
  if (n <= 0) return null;
  return n;
}

function readCommand(
  source: string,
  chordText: string,
  value: unknown,
): Readonly<{ command: string; description?: string }> {
  if (typeof value === "string") {
    if (value.trim().length === 0) {
      throw invalid(source, `bindings["${chordText}"] is an empty command. Fix: give it a shell command.`);
    }
    return { command: value };
  }
  if (isRecord(value)) {
    const command = value.command;
    const description = value.description;
    if (typeof command !== "string" || command.trim().length === 0) {
      throw invalid(
        source,
        `bindings["${chordText}"].command must be a non-empty string. Fix: add "command": "<shell command>".`,
      );
    }
    if (description !== undefined && typeof description !== "string") {
      throw invalid(source, `bindings["${chordText}"].description must be a string.`);
    }
    return description === undefined ? { command } : { command, description };
  }
  throw invalid(
    source,
    `bindings["${chordText}"] must be a command string or { "command": ... }.`,
  );
}

/**
 * Validate a parsed JSON value.
 *
 * @param source - Label used in error messages (usually the file path)
 */
export function parseChordConfig(value: unknown, source = "config"): ChordConfig {
  if (!isRecord(value)) {
    throw invalid(source, "top level must be a JSON object.");
  }

  for (const field of Object.keys(value)) {
    if (field !== "activation" && field !== "idleTimeoutMs" && field !== "prefixPolicy" && field !== "bindings") {
      throw invalid(
        source,
        `unknown field "${field}". Fix: use activation, idleTimeoutMs, prefixPolicy, bindings.`,
      );
    }
  }

  let activation: KeySymbol | null = null;
  if (value.activation !== undefined) {
    if (typeof value.activation !== "string") {
      throw invalid(source, 'activation must be a key string such as "ctrl+a".');
    }
    const parsed = parseKeySymbol(value.activation);
    if (!parsed.ok) {
      throw invalid(source, `activation: ${parsed.error.detail}.`);
    }
    activation = parsed.value;
  }

  let idleTimeoutMs = 0;
  if (value.idleTimeoutMs !== undefined) {
    const parsed = parsePositiveInt(value.idleTimeoutMs);
    if (parsed === null) {
      throw invalid(
        source,
        `idleTimeoutMs=${JSON.stringify(value.idleTimeoutMs)} must be a positive integer. Fix: remove the field to disable the timeout.`,
      );
    }
    idleTimeoutMs = parsed;
  }

  let prefixPolicy: PrefixPolicy = "reject";
  if (value.prefixPolicy !== undefined) {
    if (value.prefixPolicy !== "reject" && value.prefixPolicy !== "shortest-wins") {
      throw invalid(
        source,
        `prefixPolicy=${JSON.stringify(value.prefixPolicy)} is not supported. Fix: use "reject" or "shortest-wins".`,
      );
    }
    prefixPolicy = value.prefixPolicy;
  }

  if (!isRecord(value.bindings)) {
    throw invalid(source, 'bindings must be an object of { "chord": "command" }.');
  }

  const bindings: CommandBinding[] = [];
  for (const [chordText, entry] of Object.entries(value.bindings)) {
    const parsed = parseChord(chordText);
    if (!parsed.ok) {
      throw invalid(source, `bindings["${chordText}"]: ${parsed.error.detail}.`);
    }
    const { command, description } = readCommand(source, chordText, entry);
    bindings.push(
      Object.freeze(
        description === undefined
          ? { chord: parsed.value, chordText, command }
          : { chord: parsed.value, chordText, command, description },
      ),
    );
  }

  return Object.freeze({
    activation,
    idleTimeoutMs,
    prefixPolicy,
    bindings: Object.freeze(bindings),
  });
}

/** Read and validate a JSON config file. */
export function loadChordConfig(path: string): ChordConfig {
  const resolvedPath = resolve(path);
  let text: string;
  try {
    text = readFileSync(resolvedPath, "utf8");
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw invalid(resolvedPath, `cannot read file (${detail}).`);
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw invalid(resolvedPath, `not valid JSON (${detail}).`);
  }
  return parseChordConfig(value, resolvedPath);
}

/**
 * Build the chord table for a config, binding each chord to `run(command)`.
 * Table-level errors (duplicates, prefix conflicts) propagate unchanged.
 */
export function createConfiguredTable(
  config: ChordConfig,
  run: (binding: CommandBinding) => void,
): ChordTable {
  const bindings: Binding[] = config.bindings.map((entry) => {
    const action = () => run(entry);
    return Object.freeze(
      entry.description === undefined
        ? { chord: entry.chord, action }
        : { chord: entry.chord, action, description: entry.description },
    );
  });
  return createChordTable(bindings, { prefixPolicy: config.prefixPolicy });
}
