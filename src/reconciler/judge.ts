import type { Collaborator } from "../types/collaborator.js";
import type { Fact, FactJudgement, Observation, Target, TargetVerdict } from "../types/fact.js";
import type { RunError } from "../types/run.js";
import { compare } from "./comparators.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";

export function judgeFact(fact: Fact, observation: Observation): FactJudgement {
  if (observation.status === "unknown") return { fact, observation, verdict: "indeterminate" };
  const ok = compare(fact.comparator, observation.value, fact.desired);
  return { fact, observation, verdict: ok ? "satisfied" : "unsatisfied" };
}

/** Satisfied iff every known fact passes; indeterminate when no fact is known at all. */
export function targetVerdict(judgements: readonly FactJudgement[]): TargetVerdict {
  const known = judgements.filter((j) => j.verdict !== "indeterminate");
  if (known.length === 0) return "indeterminate";
  return known.every((j) => j.verdict === "satisfied") ? "satisfied" : "unsatisfied";
}

/**
 * Read every fact of the target in declared order.
 * A failed read becomes an observation error and an indeterminate judgement; it never aborts.
 */
export async function observe(target: Target, collaborator: Collaborator, errors: RunError[]): Promise<FactJudgement[]> {
  const judgements: FactJudgement[] = [];
  for (const fact of target.facts) {
    let observation: Observation;
    try {
      observation = { status: "known", value: await collaborator.read(fact.name) };
    } catch (err) {
      const message = errorMessage(err);
      logger.warn({ subsystem: collaborator.subsystem, fact: fact.name, error: message }, "Could not observe fact");
      observation = { status: "unknown", reason: message };
      recordError(errors, { kind: "observation", source: { type: "fact", name: fact.name }, message, fatal: false });
    }
    judgements.push(judgeFact(fact, observation));
  }
  return judgements;
}

/** Append an error unless the same failure from the same source is already recorded. */
export function recordError(errors: RunError[], error: RunError): void {
  const duplicate = errors.some((e) =>
    e.kind === error.kind && e.source.type === error.source.type && e.source.name === error.source.name && e.message === error.message);
  if (!duplicate) errors.push(error);
}
