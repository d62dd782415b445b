import type { HardeningConfig } from "../types/config.js";
import { HardeningError, HardeningErrorCode } from "../errors.js";

export function isRoot(): boolean {
  return typeof process.getuid === "function" && process.getuid() === 0;
}

/** Throw NOT_ROOT unless running as root or the config waives the requirement. */
export function assertPrivilege(config: HardeningConfig, root: boolean = isRoot()): void {
  if (!config.privilege.require_root || root) return;
  throw new HardeningError(HardeningErrorCode.NOT_ROOT, "Must run as root (or set privilege.require_root: false)");
}
