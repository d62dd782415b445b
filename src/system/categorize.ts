import type { ErrorCategory } from "../types/response.js";

// ── Error Categorization ───────────────────────────────────────────

interface ErrorPattern {
  test: (stderr: string) => boolean;
  code: string;
  category: ErrorCategory;
  remediation: string[];
}

const ERROR_PATTERNS: ErrorPattern[] = [
  { test: (s) => s.includes("permission denied") || s.includes("operation not permitted") || s.includes("access denied"),
    code: "PERMISSION_DENIED", category: "privilege",
    remediation: ["Run host-harden as root (sudo host-harden ...)"] },
  { test: (s) => s.includes("could not get lock") || s.includes("dpkg frontend lock"),
    code: "RESOURCE_LOCKED", category: "lock",
    remediation: ["Another package manager process may be running", "Wait for it to complete, then re-run the profile"] },
  { test: (s) => s.includes("unable to locate package"),
    code: "PACKAGE_NOT_FOUND", category: "not_found",
    remediation: ["Run 'apt-get update' to refresh the package index"] },
  { test: (s) => (s.includes("unit") && s.includes("not found")) || s.includes("does not exist"),
    code: "UNIT_NOT_FOUND", category: "not_found",
    remediation: ["Check the unit name with 'systemctl list-unit-files'"] },
  { test: (s) => s.includes("unmet dependencies") || s.includes("dependency problems"),
    code: "DEPENDENCY_CONFLICT", category: "dependency",
    remediation: ["Resolve the package dependency problem with apt-get before re-running"] },
  { test: (s) => s.includes("could not resolve") || s.includes("failed to fetch") || s.includes("network is unreachable"),
    code: "NETWORK_ERROR", category: "network",
    remediation: ["Check network connectivity to the package mirrors"] },
];

export interface Categorized {
  code: string;
  category: ErrorCategory;
  remediation: string[];
}

/** Map a failed command's stderr to a category and remediation hints. */
export function categorizeError(stderr: string): Categorized {
  const s = stderr.toLowerCase();
  for (const p of ERROR_PATTERNS) {
    if (p.test(s)) return { code: p.code, category: p.category, remediation: p.remediation };
  }
  return { code: "COMMAND_FAILED", category: "state", remediation: ["Review the command output above for the specific error"] };
}
