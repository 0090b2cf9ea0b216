#!/usr/bin/env node
/**
 * fabric-promote CLI entry point
 *
 * Loads .env, wires the Node implementations and runs the requested command.
 */

import { tmpdir } from "os";
import chalk from "chalk";
import dotenv from "dotenv";
import { createNodeFileSystem, createNodeHttpClient, systemClock } from "#/core";
import { GitRepositoryFetcher } from "#/source";
import { errorMessage } from "#/errors";
import { createProgram } from "./program";

async function main(): Promise<void> {
  dotenv.config();

  const program = createProgram({
    env: process.env,
    cwd: process.cwd(),
    tempDir: tmpdir(),
    fs: createNodeFileSystem(),
    http: createNodeHttpClient(),
    clock: systemClock,
    createFetcher: (logger) => new GitRepositoryFetcher(logger),
    write: (line) => console.log(line),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red("Fatal error:"), errorMessage(error));
  process.exitCode = 1;
});
