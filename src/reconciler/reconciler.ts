// Check-apply-verify reconciliation loop shared by every hardening profile.
// Observe → judge → select → gate → apply (validate before activation) → re-observe.
// All side effects go through the Collaborator; the reconciler holds no ambient state.
import type { Action } from "../types/action.js";
import type { Collaborator } from "../types/collaborator.js";
import type { FactJudgement } from "../types/fact.js";
import type { RunError, RunRequest, RunResult, SkippedAction } from "../types/run.js";
import { ActionGate } from "../safety/gate.js";
import { HardeningError, HardeningErrorCode, errorMessage, isHardeningError } from "../errors.js";
import { logger } from "../logger.js";
import { observe, recordError, targetVerdict } from "./judge.js";

export async function reconcile(request: RunRequest): Promise<RunResult> {
  const { collaborator, mode, interact } = request;
  const backout = mode === "backout";
  if (backout && !request.restore) {
    throw new HardeningError(HardeningErrorCode.BACKOUT_UNSUPPORTED, `${collaborator.subsystem} declares no backout target`);
  }
  const target = backout && request.restore ? request.restore.target : request.target;
  const actions = backout && request.restore ? request.restore.actions : request.actions;
  const log = logger.child({ subsystem: collaborator.subsystem, target: target.name, mode });

  const result: RunResult = {
    mode,
    target: target.name,
    satisfiedBefore: false,
    verdictBefore: "indeterminate",
    judgementsBefore: [],
    actionsApplied: [],
    actionsSkipped: [],
    satisfiedAfter: null,
    verdictAfter: null,
    judgementsAfter: [],
    errors: [],
    aborted: false,
  };

  // 1-2. Observe and judge
  result.judgementsBefore = await observe(target, collaborator, result.errors);
  result.verdictBefore = targetVerdict(result.judgementsBefore);
  result.satisfiedBefore = result.verdictBefore === "satisfied";
  log.info({ verdict: result.verdictBefore }, "Initial observation complete");

  let force = backout;
  if (!backout && result.satisfiedBefore) {
    if (mode !== "apply") return settle(result);
    const again = await interact({
      kind: "reapply",
      message: `${target.name} already matches the desired state. Reapply anyway?`,
      defaultAnswer: false,
    });
    if (!again) return settle(result);
    force = true;
  }
  if (mode === "check") return settle(result);

  // 3. Select
  const { selected, skipped } = selectActions(actions, result.judgementsBefore, force);
  result.actionsSkipped.push(...skipped);

  // 4-5. Gate and apply in declared order
  const gate = new ActionGate(mode, interact);
  let wrote = false;
  let validated = false;
  for (const action of selected) {
    if (!(await applicable(action, collaborator, result))) {
      result.actionsSkipped.push({ action: action.name, reason: "not-applicable" });
      continue;
    }
    const decision = await gate.check(action);
    if (!decision.proceed) {
      result.actionsSkipped.push({ action: action.name, reason: decision.reason });
      continue;
    }

    if (action.activates && !validated && collaborator.validate) {
      validated = true;
      if (!(await runValidation(collaborator, result))) return abort(result);
    }

    try {
      log.debug({ action: action.name }, "Applying action");
      const outcome = await collaborator.write(action);
      if (outcome === "unchanged") {
        result.actionsSkipped.push({ action: action.name, reason: "unchanged" });
        continue;
      }
      result.actionsApplied.push(action.name);
      wrote = true;
    } catch (err) {
      if (isHardeningError(err, HardeningErrorCode.PREREQUISITE_MISSING)) {
        result.errors.push(actionError(action, err, true));
        log.error({ action: action.name, error: err.message }, "Missing prerequisite - aborting run");
        return abort(result);
      }
      result.errors.push(actionError(action, err, false));
      log.warn({ action: action.name, error: errorMessage(err) }, "Action failed - continuing");
    }
  }

  if (wrote && !validated && collaborator.validate) {
    if (!(await runValidation(collaborator, result))) return abort(result);
  }

  // 6. Re-observe; external state may have drifted even when nothing ran
  result.judgementsAfter = await observe(target, collaborator, result.errors);
  result.verdictAfter = targetVerdict(result.judgementsAfter);
  result.satisfiedAfter = result.verdictAfter === "satisfied";
  log.info({ verdict: result.verdictAfter, applied: result.actionsApplied.length, errors: result.errors.length }, "Run complete");
  return result;
}

/** Success only when the final state is satisfied, nothing failed and the run finished. */
export function runSucceeded(result: RunResult): boolean {
  return !result.aborted && result.satisfiedAfter === true && result.errors.length === 0;
}

/**
 * Forward selection is per action: an action is skipped when every fact it names is
 * satisfied. Actions naming no fact of this target are support steps and always run.
 */
export function selectActions(
  actions: readonly Action[],
  judgements: readonly FactJudgement[],
  force: boolean,
): { selected: Action[]; skipped: SkippedAction[] } {
  const verdicts = new Map(judgements.map((j) => [j.fact.name, j.verdict]));
  const selected: Action[] = [];
  const skipped: SkippedAction[] = [];
  for (const action of actions) {
    const tied = action.facts.filter((f) => verdicts.has(f));
    if (!force && tied.length > 0 && tied.every((f) => verdicts.get(f) === "satisfied")) {
      skipped.push({ action: action.name, reason: "already-satisfied" });
    } else {
      selected.push(action);
    }
  }
  return { selected, skipped };
}

/** An unreadable `onlyWhen` fact is an observation error and the action is not offered. */
async function applicable(action: Action, collaborator: Collaborator, result: RunResult): Promise<boolean> {
  if (!action.onlyWhen) return true;
  const { fact, equals } = action.onlyWhen;
  try {
    return (await collaborator.read(fact)) === equals;
  } catch (err) {
    recordError(result.errors, { kind: "observation", source: { type: "fact", name: fact }, message: errorMessage(err), fatal: false });
    return false;
  }
}

async function runValidation(collaborator: Collaborator, result: RunResult): Promise<boolean> {
  if (!collaborator.validate) return true;
  try {
    await collaborator.validate();
    return true;
  } catch (err) {
    const message = errorMessage(err);
    logger.error({ subsystem: collaborator.subsystem, error: message }, "Validation failed - not activating");
    recordError(result.errors, { kind: "validation", source: { type: "validation", name: collaborator.subsystem }, message, fatal: true });
    return false;
  }
}

function actionError(action: Action, err: unknown, fatal: boolean): RunError {
  return {
    kind: fatal ? "prerequisite" : "action",
    source: { type: "action", name: action.name },
    message: errorMessage(err),
    fatal,
    remediation: remediationOf(err),
  };
}

function remediationOf(err: unknown): string[] | undefined {
  if (!isHardeningError(err)) return undefined;
  const hints = err.context?.["remediation"];
  return Array.isArray(hints) ? hints.filter((r): r is string => typeof r === "string") : undefined;
}

function settle(result: RunResult): RunResult {
  result.satisfiedAfter = result.satisfiedBefore;
  result.verdictAfter = result.verdictBefore;
  result.judgementsAfter = result.judgementsBefore;
  return result;
}

function abort(result: RunResult): RunResult {
  result.aborted = true;
  result.satisfiedAfter = null;
  result.verdictAfter = null;
  return result;
}
