import type { Executor } from "../execution/executor.js";
import type { InteractionFn, RunMode } from "../types/run.js";
import type { ReportStyle } from "../reconciler/report.js";
import { formatRunReport } from "../reconciler/report.js";
import { runSucceeded } from "../reconciler/reconciler.js";
import { loadConfig, writeDefaultConfig, DEFAULT_CONFIG_PATH } from "../config/loader.js";
import { createProfileDeps, createProfileRegistry } from "../profiles/index.js";
import { runProfile } from "../profiles/run.js";
import { assertPrivilege } from "../system/privilege.js";
import { HardeningError, HardeningErrorCode } from "../errors.js";
import { logger } from "../logger.js";

export interface RunOptions {
  check?: boolean;
  nonInteractive?: boolean;
  backout?: boolean;
  purge?: boolean;
  config?: string;
  verbose?: boolean;
}

/** What a command needs from the outside world. */
export interface CliIO {
  readonly print: (line: string) => void;
  readonly interact: InteractionFn;
  readonly style: ReportStyle;
  readonly executor: Executor;
  readonly root: boolean;
}

/** Map the mutually exclusive mode flags to a RunMode; no flag means interactive apply. */
export function resolveMode(options: RunOptions): RunMode {
  const chosen: RunMode[] = [];
  if (options.check) chosen.push("check");
  if (options.nonInteractive) chosen.push("apply-unattended");
  if (options.backout) chosen.push("backout");
  if (chosen.length > 1) {
    throw new HardeningError(HardeningErrorCode.CONFIG_INVALID, "Options --check, --non-interactive and --backout are mutually exclusive");
  }
  return chosen[0] ?? "apply";
}

function configPathFrom(explicit?: string): string | undefined {
  return explicit ?? process.env.HOST_HARDENING_CONFIG ?? undefined;
}

export function listCommand(io: Pick<CliIO, "print" | "executor">, options: { config?: string }): number {
  const { config } = loadConfig(configPathFrom(options.config));
  const deps = createProfileDeps(config, io.executor);
  for (const profile of createProfileRegistry(deps).getAll()) {
    io.print(`${profile.id.padEnd(12)} ${profile.description}${profile.supportsBackout ? " (backout available)" : ""}`);
  }
  return 0;
}

export function initConfigCommand(io: Pick<CliIO, "print">, options: { config?: string; force?: boolean }): number {
  const path = writeDefaultConfig(configPathFrom(options.config) ?? DEFAULT_CONFIG_PATH, options.force ?? false);
  io.print(`Wrote ${path}`);
  return 0;
}

/** Run one profile and print its report. Returns the process exit code. */
export async function runCommand(profileId: string, options: RunOptions, io: CliIO): Promise<number> {
  if (options.verbose) logger.level = "debug";
  const mode = resolveMode(options);
  const { config, configPath, firstRun } = loadConfig(configPathFrom(options.config));
  logger.debug({ configPath, firstRun, mode }, "Configuration loaded");
  assertPrivilege(config, io.root);

  const profile = createProfileRegistry(createProfileDeps(config, io.executor)).require(profileId);
  const result = await runProfile(profile, mode, { purge: options.purge ?? false }, io.interact);
  for (const line of formatRunReport(profile.id, result, io.style)) io.print(line);
  return runSucceeded(result) ? 0 : 1;
}
