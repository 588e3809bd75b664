/**
 * @keychords/node
 *
 * Node.js host for @keychords/core: keypress conversion, the activation-key
 * dispatcher, JSON configuration, and the `keychords` CLI.
 */

export { keySymbolFromKeypress } from "./keypress.js";
export {
  type ChordDispatcher,
  type ChordDispatcherOptions,
  type DispatchResult,
  type DispatcherTimers,
  createChordDispatcher,
} from "./dispatcher.js";
export {
  type KeypressSourceOptions,
  type KeypressStream,
  attachKeypressSource,
} from "./keypressSource.js";
export {
  type ChordConfig,
  type CommandBinding,
  createConfiguredTable,
  loadChordConfig,
  parseChordConfig,
} from "./config.js";
export { type CliIo, type CliOptions, helpText, parseArgs, runCli } from "./cli.js";
