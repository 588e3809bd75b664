#!/usr/bin/env node
import { argv, exit, stderr, stdin, stdout } from "node:process";
import { runCli } from "./cli.js";

runCli(argv.slice(2), { stdin, stdout, stderr }).then(
  (code) => exit(code),
  (err: unknown) => {
    stderr.write(`keychords: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    exit(1);
  },
);
