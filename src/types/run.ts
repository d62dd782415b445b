import type { Action } from "./action.js";
import type { FactJudgement, Target, TargetVerdict } from "./fact.js";
import type { Collaborator } from "./collaborator.js";

export type RunMode = "check" | "apply" | "apply-unattended" | "backout";

/** A yes/no question raised by the reconciler. */
export interface Question {
  readonly kind: "reapply" | "confirm-action";
  readonly message: string;
  readonly defaultAnswer: boolean;
  readonly action?: string;
}

/** Synchronous-from-the-run's-view yes/no decision capability. */
export type InteractionFn = (question: Question) => Promise<boolean>;

export type RunErrorKind = "observation" | "action" | "prerequisite" | "validation";

export interface RunError {
  readonly kind: RunErrorKind;
  readonly source: { readonly type: "fact" | "action" | "validation"; readonly name: string };
  readonly message: string;
  readonly fatal: boolean;
  readonly remediation?: readonly string[];
}

/** `unchanged`: the write ran but found nothing to do. `not-applicable`: the action's `onlyWhen` fact did not hold. */
export type SkipReason = "already-satisfied" | "declined" | "not-authorized" | "not-applicable" | "unchanged";

export interface SkippedAction {
  readonly action: string;
  readonly reason: SkipReason;
}

/** Everything a run needs. */
export interface RunRequest {
  readonly target: Target;
  readonly actions: readonly Action[];
  /** Independently declared restore pair used by backout mode. */
  readonly restore?: { readonly target: Target; readonly actions: readonly Action[] };
  readonly collaborator: Collaborator;
  readonly mode: RunMode;
  readonly interact: InteractionFn;
}

/** Outcome of one run. Built only by the reconciler; consumed once by the caller. */
export interface RunResult {
  readonly mode: RunMode;
  readonly target: string;
  satisfiedBefore: boolean;
  verdictBefore: TargetVerdict;
  judgementsBefore: FactJudgement[];
  actionsApplied: string[];
  actionsSkipped: SkippedAction[];
  /** null when the run aborted on a fatal error before re-observing. */
  satisfiedAfter: boolean | null;
  verdictAfter: TargetVerdict | null;
  judgementsAfter: FactJudgement[];
  errors: RunError[];
  aborted: boolean;
}
