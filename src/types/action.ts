import type { FactValue } from "./fact.js";

/** An idempotent corrective operation. Owned by the caller and never mutated. */
export interface Action {
  readonly name: string;
  readonly description: string;
  /** Facts this action corrects. Empty means it is a support step that runs whenever the run applies. */
  readonly facts: readonly string[];
  readonly reversible: boolean;
  readonly destructive: boolean;
  /** Unattended permission for a destructive action, decided by the caller (e.g. a --purge flag). */
  readonly preAuthorized?: boolean;
  /** Ask in interactive apply mode even though the action is not destructive. */
  readonly confirm?: boolean;
  /** Loads written configuration into the live system; the collaborator's validation must pass first. */
  readonly activates?: boolean;
  /** Offer the action only while the collaborator reads this fact with this value. */
  readonly onlyWhen?: { readonly fact: string; readonly equals: FactValue };
  /** Question shown when the operator is asked about this action. */
  readonly prompt?: string;
  /** Default answer for the prompt. Destructive actions default to "no". */
  readonly promptDefault?: boolean;
}
