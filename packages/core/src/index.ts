/**
 * @keychords/core
 *
 * Runtime-agnostic key-chord matching: key symbols, chord tables, and the
 * matcher automaton. This package MUST NOT use Node-specific APIs
 * (Buffer, node:* imports); host adapters live in @keychords/node.
 */

export {
  ConfigurationError,
  type ConfigurationErrorCode,
  KeychordError,
  type KeychordErrorCode,
} from "./errors.js";

export * from "./chords/index.js";
export * from "./trace/index.js";
