export type { Command } from "./command.js";
export type { DurationCategory } from "./duration.js";
export { DURATION_TIMEOUTS } from "./duration.js";
export type { FactValue, ComparatorKind, Fact, Target, Observation, FactVerdict, FactJudgement, TargetVerdict } from "./fact.js";
export type { Action } from "./action.js";
export type { RunMode, Question, InteractionFn, RunErrorKind, RunError, SkipReason, SkippedAction, RunRequest, RunResult } from "./run.js";
export type { Collaborator, WriteOutcome } from "./collaborator.js";
export type { HardeningConfig } from "./config.js";
export type { ToolResponse, SuccessResponse, ErrorResponse, ConfirmationResponse, ErrorCategory } from "./response.js";
export type { ToolMetadata, RegisteredTool } from "./tool.js";
export type { HardeningProfile, ProfileOptions, ProfilePlan } from "./profile.js";
