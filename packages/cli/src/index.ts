#!/usr/bin/env node

/**
 * remotefs CLI
 * Main entry point
 */

import { Command } from "commander";
import { logger, initLogger, LogLevel, describeError } from "@remotefs/core";
import { initCommand } from "./commands/init.js";
import { applyCommand } from "./commands/apply.js";
import { planCommand } from "./commands/plan.js";
import { showCommand } from "./commands/show.js";
import { destroyCommand } from "./commands/destroy.js";

const program = new Command();

program
  .name("remotefs")
  .description("Reconcile files and folders on a remote Linux host over SSH")
  .version("1.0.0")
  .option("-v, --verbose", "Log every remote command")
  .option("--log-file", "Also write JSON logs to ~/.remotefs/logs")
  .hook("preAction", (command) => {
    const { verbose, logFile } = command.opts<{ verbose?: boolean; logFile?: boolean }>();
    initLogger({
      level: verbose ? LogLevel.DEBUG : LogLevel.WARN,
      logToFile: logFile ?? false,
    });
  });

/**
 * Init command - write a starter manifest
 */
program
  .command("init")
  .description("Write a starter manifest")
  .requiredOption("--host <host>", "Remote host, e.g. example.com:22")
  .option("-f, --file <path>", "Manifest path (default ~/.remotefs/manifest.yaml)")
  .option("-u, --username <name>", "SSH user (default: current user)")
  .option("--sudo", "Run remote commands through sudo")
  .option("--force", "Overwrite an existing manifest")
  .action(initCommand);

/**
 * Plan command - show pending changes
 */
program
  .command("plan")
  .description("Show what apply would change")
  .option("-f, --file <path>", "Manifest path (default ~/.remotefs/manifest.yaml)")
  .action(planCommand);

/**
 * Apply command - converge the host to the manifest
 */
program
  .command("apply")
  .description("Create missing resources and update drifted ones")
  .option("-f, --file <path>", "Manifest path (default ~/.remotefs/manifest.yaml)")
  .action(applyCommand);

/**
 * Show command - print observed state
 */
program
  .command("show")
  .description("Print the observed state of every declared resource")
  .option("-f, --file <path>", "Manifest path (default ~/.remotefs/manifest.yaml)")
  .action(showCommand);

/**
 * Destroy command - remove declared resources
 */
program
  .command("destroy")
  .description("Remove every declared resource from the host")
  .option("-f, --file <path>", "Manifest path (default ~/.remotefs/manifest.yaml)")
  .option("-y, --yes", "Skip the confirmation prompt")
  .action(destroyCommand);

/**
 * Parse and execute commands
 */
async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    logger.error("CLI error", { error: describeError(error) });
    process.exit(1);
  }
}

void main();

export { program };
