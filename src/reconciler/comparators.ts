import type { ComparatorKind, FactValue } from "../types/fact.js";

/** Evaluate one comparator. Mismatched value types never satisfy, except `exact` which compares as text. */
export function compare(kind: ComparatorKind, observed: FactValue, desired: FactValue): boolean {
  switch (kind) {
    case "exact":
      return String(observed).trim() === String(desired).trim();
    case "exact-line":
      // Byte-for-byte: tool formatting is part of the contract, so no normalisation beyond line ending.
      return typeof observed === "string" && typeof desired === "string" && stripLineEnding(observed) === desired;
    case "excludes":
      return !String(observed).includes(String(desired));
    case "boolean":
      return typeof observed === "boolean" && observed === desired;
  }
}

function stripLineEnding(line: string): string {
  return line.replace(/\r?\n$/, "");
}
