import type { Action } from "./action.js";
import type { Collaborator } from "./collaborator.js";
import type { Target } from "./fact.js";

/** Caller-level choices folded into target and action construction. */
export interface ProfileOptions {
  /** Pre-authorize destructive actions (package purge) for unattended runs. */
  readonly purge: boolean;
}

/** Everything one subsystem contributes to a run. */
export interface ProfilePlan {
  readonly target: Target;
  readonly actions: readonly Action[];
  readonly restore?: { readonly target: Target; readonly actions: readonly Action[] };
  readonly collaborator: Collaborator;
}

/** A hardening profile: one subsystem, its facts, its actions and how to reach it. */
export interface HardeningProfile {
  readonly id: string;
  readonly description: string;
  readonly supportsBackout: boolean;
  plan(options: ProfileOptions): ProfilePlan;
}
