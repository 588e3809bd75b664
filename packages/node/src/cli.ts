/**
 * packages/node/src/cli.ts — `keychords` command: run a chord config on a terminal.
 *
 * The entry point in bin.ts only wires process globals into runCli(); the
 * logic stays importable for tests.
 */

import { spawn } from "node:child_process";
import {
  type MatchTrace,
  type TraceRecord,
  chordToString,
  createMatchTrace,
  formatTraceRecord,
} from "@keychords/core";
import { type ChordConfig, type CommandBinding, createConfiguredTable, loadChordConfig } from "./config.js";
import { createChordDispatcher } from "./dispatcher.js";
import { type KeypressStream, attachKeypressSource } from "./keypressSource.js";

export type CliOptions = {
  configPath?: string;
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
};

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    dryRun: false,
    verbose: false,
    help: false,
  };

  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--dry-run" || arg === "-n") {
      options.dryRun = true;
      continue;
    }
    if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
      continue;
    }
    if (arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    }
    if (!options.configPath) {
      options.configPath = arg;
      continue;
    }
    throw new Error(`Unexpected argument: ${arg}`);
  }

  return options;
}

export function helpText(): string {
  return [
    "keychords",
    "",
    "Usage:",
    "  keychords <config.json> [options]",
    "",
    "Options:",
    "  --dry-run, -n     Print commands instead of running them",
    "  --verbose, -v     Trace every key, including pending steps",
    "  --help, -h        Show this help",
    "",
  ].join("\n");
}

export type Writable = Readonly<{ write: (text: string) => unknown }>;

export type CliIo = Readonly<{
  stdin: KeypressStream;
  stdout: Writable;
  stderr: Writable;
  /** Runs a bound command. Default spawns it through the shell, detached. */
  runCommand?: (binding: CommandBinding) => void;
  /** Defaults to loadChordConfig. */
  loadConfig?: (path: string) => ChordConfig;
}>;

function spawnDetached(binding: CommandBinding, stderr: Writable): void {
  const child = spawn(binding.command, { shell: true, stdio: "ignore", detached: true });
  child.on("error", (err) => {
    stderr.write(`keychords: "${binding.chordText}" failed to start: ${err.message}\n`);
  });
  child.unref();
}

function describeBindings(config: ChordConfig): string {
  return config.bindings
    .map((b) => `  ${chordToString(b.chord).padEnd(16)} ${b.description ?? b.command}\n`)
    .join("");
}

/**
 * Run until the interrupt key (ctrl+c).
 *
 * @returns Process exit code
 */
export function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err: unknown) {
    io.stderr.write(`keychords: ${err instanceof Error ? err.message : String(err)}\n`);
    io.stderr.write(helpText());
    return Promise.resolve(2);
  }

  if (options.help) {
    io.stdout.write(helpText());
    return Promise.resolve(0);
  }
  if (!options.configPath) {
    io.stderr.write("keychords: missing config file\n");
    io.stderr.write(helpText());
    return Promise.resolve(2);
  }

  const run =
    io.runCommand ??
    (options.dryRun
      ? (binding: CommandBinding) => {
          io.stdout.write(`${binding.command}\n`);
        }
      : (binding: CommandBinding) => spawnDetached(binding, io.stderr));

  let config: ChordConfig;
  let trace: MatchTrace;
  let dispatcher: ReturnType<typeof createChordDispatcher>;
  try {
    config = (io.loadConfig ?? loadChordConfig)(options.configPath);
    trace = createMatchTrace({ minSeverity: options.verbose ? "trace" : "info" });
    dispatcher = createChordDispatcher({
      table: createConfiguredTable(config, run),
      ...(config.activation !== null && { activation: config.activation }),
      idleTimeoutMs: config.idleTimeoutMs,
      matcher: { trace },
    });
  } catch (err: unknown) {
    io.stderr.write(`keychords: ${err instanceof Error ? err.message : String(err)}\n`);
    return Promise.resolve(1);
  }

  trace.on("record", (record: TraceRecord) => {
    io.stderr.write(formatTraceRecord(record));
  });

  io.stderr.write(`keychords: ${String(config.bindings.length)} chords loaded\n`);
  io.stderr.write(describeBindings(config));

  return new Promise<number>((resolveExit) => {
    const detach = attachKeypressSource(io.stdin, dispatcher, {
      onInterrupt: () => {
        detach();
        dispatcher.dispose();
        resolveExit(0);
      },
    });
  });
}
