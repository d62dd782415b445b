#!/usr/bin/env node

/**
 * host-harden CLI
 * Check, apply or back out a hardening profile on the local host.
 */

import { Command } from "commander";
import chalk from "chalk";
import { LocalExecutor } from "./execution/executor.js";
import type { ReportStyle } from "./reconciler/report.js";
import { createTerminalPrompt } from "./cli/prompt.js";
import { initConfigCommand, listCommand, runCommand } from "./cli/commands.js";
import type { RunOptions } from "./cli/commands.js";
import { isRoot } from "./system/privilege.js";
import { isHardeningError } from "./errors.js";
import { logger } from "./logger.js";

const style: ReportStyle = {
  ok: (t) => chalk.green(t),
  bad: (t) => chalk.red(t),
  warn: (t) => chalk.yellow(t),
  dim: (t) => chalk.dim(t),
};

const print = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

const program = new Command();

program
  .name("host-harden")
  .description("Idempotent check / apply / verify hardening for Ubuntu hosts")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("list")
  .description("List available hardening profiles")
  .option("--config <path>", "Config file (default ~/.config/host-hardening/config.yaml)")
  .action((options: { config?: string }) => {
    process.exitCode = listCommand({ print, executor: new LocalExecutor() }, options);
  });

program
  .command("init-config")
  .description("Write the default config file")
  .option("-f, --force", "Overwrite an existing config file")
  .option("--config <path>", "Where to write the config")
  .action((options: { config?: string; force?: boolean }) => {
    process.exitCode = initConfigCommand({ print }, options);
  });

program
  .command("run")
  .description("Reconcile a profile: interactive apply by default")
  .argument("<profile>", "Profile id (see 'host-harden list')")
  .option("-c, --check", "Report only, change nothing")
  .option("-n, --non-interactive", "Apply without prompting")
  .option("-b, --backout", "Restore the pre-hardening state")
  .option("--purge", "Allow destructive steps (rpcbind: purge the package)")
  .option("--config <path>", "Config file (default ~/.config/host-hardening/config.yaml)")
  .option("--verbose", "Debug logging on stderr")
  .action(async (profile: string, options: RunOptions) => {
    const prompt = createTerminalPrompt();
    try {
      process.exitCode = await runCommand(profile, options, {
        print, style, interact: prompt.interact, executor: new LocalExecutor(), root: isRoot(),
      });
    } finally {
      prompt.close();
    }
  });

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (isHardeningError(error)) {
    logger.debug({ code: error.code, context: error.context }, "Command failed");
    console.error(chalk.red(`Error: ${error.message}`));
  } else if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG) console.error(chalk.dim(error.stack));
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

program.parseAsync(process.argv).catch(handleError);
