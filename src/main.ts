#!/usr/bin/env node
import { Command } from "commander";
import dotenv from "dotenv";
import process from "node:process";
import { createCommand } from "./commands/create";
import { scopesCommand } from "./commands/scopes";
import { APP_NAME, APP_VERSION } from "./lib/config";
import { formatError, log } from "./lib/log";

// Capture any uncaught async errors
process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection:", formatError(reason));
  process.exitCode = 1;
});

// Capture any uncaught sync errors
process.on("uncaughtException", (err) => {
  log.error("Uncaught exception:", formatError(err));
  process.exitCode = 1;
});

async function main() {
  // CLI only: the library entry point never touches .env
  dotenv.config();

  // Auto-help only when no args at all
  const argv = process.argv.slice(2);
  const args = argv.length === 0 ? ["--help"] : argv;

  const program = new Command();
  program
    .name(APP_NAME)
    .version(APP_VERSION)
    .description("Create GitHub OAuth authorization tokens from a username and password");

  program.addCommand(createCommand);
  program.addCommand(scopesCommand);

  await program.parseAsync([process.argv[0], process.argv[1], ...args]);
}

main().catch((e: unknown) => {
  log.error(formatError(e));
  process.exitCode = 1;
});
