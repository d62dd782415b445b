import type { Action } from "./action.js";
import type { FactValue } from "./fact.js";

export type WriteOutcome = "changed" | "unchanged";

/**
 * The reconciler's only boundary to the live system.
 * Implementations throw HardeningError on failure; every write must be safe to repeat.
 */
export interface Collaborator {
  readonly subsystem: string;
  read(fact: string): Promise<FactValue>;
  /** Resolves "unchanged" when the system already matched and nothing was done. */
  write(action: Action): Promise<WriteOutcome>;
  /** Pre-activation sanity check of written configuration (e.g. `sshd -t`). */
  validate?(): Promise<void>;
}
