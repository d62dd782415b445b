import type { HardeningConfig } from "../types/config.js";
import type { ProfileRegistry } from "../profiles/registry.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared server context: created once at startup, passed to every tool module.
 */
export interface ToolContext {
  readonly config: HardeningConfig;
  readonly profiles: ProfileRegistry;
  readonly registry: ToolRegistry;
  readonly targetHost: string;
  readonly configPath: string;
  readonly firstRun: boolean;
}
