export * from "./types/index.js";
export { reconcile, runSucceeded, selectActions } from "./reconciler/reconciler.js";
export { compare } from "./reconciler/comparators.js";
export { judgeFact, targetVerdict, observe } from "./reconciler/judge.js";
export { formatRunReport, formatJudgement, resultLine, PLAIN_STYLE } from "./reconciler/report.js";
export type { ReportStyle } from "./reconciler/report.js";
export { ActionGate } from "./safety/gate.js";
export type { GateDecision } from "./safety/gate.js";
export { HardeningError, HardeningErrorCode, isHardeningError, errorMessage } from "./errors.js";
export { LocalExecutor, COMMAND_NOT_FOUND } from "./execution/executor.js";
export type { Executor, ExecResult } from "./execution/executor.js";
export { CommandRunner } from "./system/runner.js";
export { UbuntuCommands } from "./system/commands.js";
export { loadConfig, writeDefaultConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_PATH } from "./config/loader.js";
export { createProfileDeps, createProfileRegistry, ProfileRegistry } from "./profiles/index.js";
export type { ProfileDeps } from "./profiles/index.js";
export { runProfile } from "./profiles/run.js";
