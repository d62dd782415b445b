import type { HardeningProfile } from "../types/profile.js";
import { HardeningError, HardeningErrorCode } from "../errors.js";
import { Registry } from "../registry.js";

/** Hardening profiles by id. The CLI and the MCP tools both resolve profiles here. */
export class ProfileRegistry extends Registry<HardeningProfile> {
  constructor() {
    super("profile", (profile) => profile.id);
  }

  /** Like get(), but an unknown id is an error naming the known ones. */
  require(id: string): HardeningProfile {
    const profile = this.get(id);
    if (!profile) {
      throw new HardeningError(HardeningErrorCode.PROFILE_NOT_FOUND, `Unknown profile '${id}'. Available: ${this.ids().join(", ") || "none"}`, { profile: id });
    }
    return profile;
  }
}
