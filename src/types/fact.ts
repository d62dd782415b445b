/** Observed or desired value of a fact. */
export type FactValue = string | boolean;

/**
 * How an observed value is compared to the desired one.
 *
 * - `exact`: string equality after trimming surrounding whitespace.
 * - `exact-line`: the observed value is one config line; it must equal the desired line byte for byte.
 *   There is no partial credit: one extra algorithm in a list is a mismatch.
 * - `excludes`: the observed text must not contain the desired token anywhere.
 * - `boolean`: both sides are booleans and must be equal.
 */
export type ComparatorKind = "exact" | "exact-line" | "excludes" | "boolean";

/** A named, comparable piece of system state. Owned by the caller and never mutated. */
export interface Fact {
  readonly name: string;
  readonly desired: FactValue;
  readonly comparator: ComparatorKind;
  readonly description?: string;
}

/** Ordered facts that together define one state ("hardened" or "restored") of a subsystem. */
export interface Target {
  readonly name: string;
  readonly facts: readonly Fact[];
}

export type Observation =
  | { readonly status: "known"; readonly value: FactValue }
  | { readonly status: "unknown"; readonly reason: string };

export type FactVerdict = "satisfied" | "unsatisfied" | "indeterminate";

/** One fact's observation paired with the comparator outcome. */
export interface FactJudgement {
  readonly fact: Fact;
  readonly observation: Observation;
  readonly verdict: FactVerdict;
}

/** Verdict for a whole target; `indeterminate` when no fact could be observed. */
export type TargetVerdict = FactVerdict;
