import type { HardeningProfile, ProfileOptions } from "../types/profile.js";
import type { InteractionFn, RunMode, RunResult } from "../types/run.js";
import { reconcile } from "../reconciler/reconciler.js";
import { HardeningError, HardeningErrorCode } from "../errors.js";

/** Plan a profile for the given options and reconcile it once. */
export async function runProfile(
  profile: HardeningProfile,
  mode: RunMode,
  options: ProfileOptions,
  interact: InteractionFn,
): Promise<RunResult> {
  if (mode === "backout" && !profile.supportsBackout) {
    throw new HardeningError(HardeningErrorCode.BACKOUT_UNSUPPORTED, `Profile '${profile.id}' has no backout`, { profile: profile.id });
  }
  const plan = profile.plan(options);
  return reconcile({
    target: plan.target,
    actions: plan.actions,
    restore: plan.restore,
    collaborator: plan.collaborator,
    mode,
    interact,
  });
}
