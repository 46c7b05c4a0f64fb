#!/usr/bin/env node
/**
 * CLI entry point for cxxmatrix.
 *
 * Commander.js-based CLI. Without a subcommand, generates every artifact
 * and then builds all batches.
 */

import { Command } from "commander";

import { build } from "./commands/build.js";
import { createContext, type CommandOptions } from "./commands/context.js";
import { generate } from "./commands/generate.js";
import { listBatches, listTargets } from "./commands/list.js";
import { COMPOSE_FILE, DEFAULT_COMPOSE_COMMAND, REPO_ENV_VAR, VERSION } from "./constants.js";
import { logError } from "./error-handler.js";
import { enableQuietMode, LogLevel, setLogLevel } from "./logger.js";
import { TARGET_KINDS } from "./validation.js";

const program = new Command();

function globalOptions(command: Command): CommandOptions {
  return command.optsWithGlobals();
}

program
  .name("cxxmatrix")
  .description("Generate and build the C++ CI toolkit container image matrix")
  .version(VERSION)
  .option("-q, --quiet", "Suppress all output (exit code only)")
  .option("-v, --verbose", "Show debug output")
  .option("--catalog <file>", "Catalog JSON (default: bundled catalog)")
  .option("--out-dir <dir>", `Directory for Dockerfiles and ${COMPOSE_FILE}`)
  .option("--repo <repo>", `Image repository root (env: ${REPO_ENV_VAR})`)
  .option("--os <versions...>", "Only these OS versions (e.g. 22.04)")
  .option("--kind <kinds...>", `Only these target kinds (${TARGET_KINDS.join(", ")})`)
  .option("--policy <policy>", "On batch failure: abort (default) or continue")
  .option("--compose <command>", `Compose command (default: ${DEFAULT_COMPOSE_COMMAND})`)
  .option("--dry-run", "Print compose commands instead of running them")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    if (opts.quiet) {
      enableQuietMode();
    } else if (opts.verbose) {
      setLogLevel(LogLevel.DEBUG);
    }
  })
  .action(async (_options, command: Command) => {
    const options = globalOptions(command);
    const ctx = createContext(options);
    generate(ctx);
    await build(ctx, { dryRun: options.dryRun ?? false });
  });

program
  .command("generate")
  .description(`Write one Dockerfile per target and ${COMPOSE_FILE}`)
  .action((_options, command: Command) => {
    generate(createContext(globalOptions(command)));
  });

program
  .command("build")
  .description("Build previously generated images, one compose call per batch")
  .action(async (_options, command: Command) => {
    const options = globalOptions(command);
    await build(createContext(options), { dryRun: options.dryRun ?? false });
  });

program
  .command("list")
  .description("List build targets with base image and image tag")
  .action((_options, command: Command) => {
    listTargets(createContext(globalOptions(command)));
  });

program
  .command("batches")
  .description("Show build batches in execution order")
  .action((_options, command: Command) => {
    listBatches(createContext(globalOptions(command)));
  });

program.parseAsync().catch((error: unknown) => {
  logError(error, "run cxxmatrix");
  process.exitCode = 1;
});
