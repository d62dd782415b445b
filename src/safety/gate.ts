// Action gate: decides, per selected action, whether the reconciler may execute it.
// Destructive actions need an interactive yes (apply) or caller pre-authorization
// (apply-unattended, backout). The gate never decides authorization itself.
// Actions that share a prompt share one answer per run.
import type { Action } from "../types/action.js";
import type { InteractionFn, RunMode, SkipReason } from "../types/run.js";
import { logger } from "../logger.js";

export type GateDecision =
  | { readonly proceed: true }
  | { readonly proceed: false; readonly reason: SkipReason };

const PROCEED: GateDecision = { proceed: true };

export class ActionGate {
  private readonly answers = new Map<string, boolean>();

  constructor(
    private readonly mode: RunMode,
    private readonly interact: InteractionFn,
  ) {}

  async check(action: Action): Promise<GateDecision> {
    if (this.mode === "check") return { proceed: false, reason: "not-authorized" };

    if (action.destructive) {
      if (this.mode === "apply") return this.ask(action, action.promptDefault ?? false);
      if (action.preAuthorized) return PROCEED;
      logger.info({ action: action.name, mode: this.mode }, "Destructive action not pre-authorized - skipping");
      return { proceed: false, reason: "not-authorized" };
    }

    if (action.confirm && this.mode === "apply") return this.ask(action, action.promptDefault ?? true);
    return PROCEED;
  }

  private async ask(action: Action, defaultAnswer: boolean): Promise<GateDecision> {
    const message = action.prompt ?? `${action.description}?`;
    let yes = this.answers.get(message);
    if (yes === undefined) {
      yes = await this.interact({ kind: "confirm-action", message, defaultAnswer, action: action.name });
      this.answers.set(message, yes);
    }
    return yes ? PROCEED : { proceed: false, reason: "declined" };
  }
}
