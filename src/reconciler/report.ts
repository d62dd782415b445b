import type { FactJudgement, FactValue, TargetVerdict } from "../types/fact.js";
import type { RunResult } from "../types/run.js";
import { runSucceeded } from "./reconciler.js";

/** Colouring hooks; the CLI passes chalk, everything else gets plain text. */
export interface ReportStyle {
  ok(text: string): string;
  bad(text: string): string;
  warn(text: string): string;
  dim(text: string): string;
}

const identity = (text: string): string => text;

export const PLAIN_STYLE: ReportStyle = { ok: identity, bad: identity, warn: identity, dim: identity };

const VERDICT_TEXT: Record<TargetVerdict, string> = {
  satisfied: "satisfied",
  unsatisfied: "not satisfied",
  indeterminate: "indeterminate",
};

export function formatValue(value: FactValue): string {
  return typeof value === "boolean" ? String(value) : JSON.stringify(value);
}

export function formatJudgement(j: FactJudgement, style: ReportStyle = PLAIN_STYLE): string {
  switch (j.verdict) {
    case "satisfied":
      return `  ${style.ok("✓")} ${j.fact.name}`;
    case "unsatisfied": {
      const observed = j.observation.status === "known" ? formatValue(j.observation.value) : "unknown";
      return `  ${style.bad("✗")} ${j.fact.name}: observed ${observed}, desired ${j.fact.comparator === "excludes" ? "no " : ""}${formatValue(j.fact.desired)}`;
    }
    case "indeterminate": {
      const reason = j.observation.status === "unknown" ? j.observation.reason : "no value";
      return `  ${style.warn("?")} ${j.fact.name}: indeterminate (${reason})`;
    }
  }
}

/** The final line of every report. */
export function resultLine(result: RunResult, style: ReportStyle = PLAIN_STYLE): string {
  if (result.aborted) {
    const fatal = result.errors.find((e) => e.fatal);
    return style.bad(`RESULT: run aborted before completion${fatal ? ` (${fatal.message})` : ""}.`);
  }
  if (runSucceeded(result)) return style.ok(`RESULT: ${result.target} is satisfied.`);
  if (result.verdictAfter === "indeterminate") return style.warn(`RESULT: ${result.target} is indeterminate - no fact could be observed.`);
  if (result.satisfiedAfter) return style.warn(`RESULT: ${result.target} is satisfied, but the run recorded ${result.errors.length} error(s).`);
  return style.bad(`RESULT: ${result.target} is not satisfied. Review status above.`);
}

/** Render a run as the textual status report printed by the CLI. */
export function formatRunReport(profile: string, result: RunResult, style: ReportStyle = PLAIN_STYLE): string[] {
  const lines: string[] = [`==> ${profile}: ${result.target} (mode: ${result.mode})`, "", "==> Observed before:"];
  lines.push(...result.judgementsBefore.map((j) => formatJudgement(j, style)));
  lines.push(`  Verdict: ${VERDICT_TEXT[result.verdictBefore]}`);

  if (result.actionsApplied.length > 0 || result.actionsSkipped.length > 0) {
    lines.push("", "==> Actions:");
    lines.push(...result.actionsApplied.map((a) => `  applied ${a}`));
    lines.push(...result.actionsSkipped.map((s) => style.dim(`  skipped ${s.action} (${s.reason})`)));
  }

  // Early returns share the before judgements; printing them twice adds nothing.
  if (result.verdictAfter !== null && result.judgementsAfter !== result.judgementsBefore) {
    lines.push("", "==> Observed after:");
    lines.push(...result.judgementsAfter.map((j) => formatJudgement(j, style)));
    lines.push(`  Verdict: ${VERDICT_TEXT[result.verdictAfter]}`);
  }

  if (result.errors.length > 0) {
    lines.push("", "==> Errors:");
    for (const e of result.errors) {
      lines.push(style.bad(`  [${e.kind}] ${e.source.name}: ${e.message}`));
      for (const hint of e.remediation ?? []) lines.push(style.dim(`    - ${hint}`));
    }
  }

  lines.push("", resultLine(result, style));
  return lines;
}
