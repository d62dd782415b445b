import type { ProfileDeps } from "./deps.js";
import type { HardeningConfig } from "../types/config.js";
import type { Executor } from "../execution/executor.js";
import { CommandRunner } from "../system/runner.js";
import { UbuntuCommands } from "../system/commands.js";
import { ProfileRegistry } from "./registry.js";
import { sshdCryptoProfile } from "./sshd-crypto.js";
import { rpcbindProfile } from "./rpcbind.js";
import { ipForwardProfile } from "./ip-forward.js";
import { logger } from "../logger.js";

/** Build the registry of built-in profiles, leaving out those disabled in config. */
export function createProfileRegistry(deps: ProfileDeps): ProfileRegistry {
  const registry = new ProfileRegistry();
  const disabled = new Set(deps.config.profiles.disabled);
  for (const profile of [sshdCryptoProfile(deps), rpcbindProfile(deps), ipForwardProfile(deps)]) {
    if (disabled.has(profile.id)) {
      logger.debug({ profile: profile.id }, "Profile disabled by config");
      continue;
    }
    registry.register(profile);
  }
  return registry;
}

/** Wire config and an executor into profile dependencies. */
export function createProfileDeps(config: HardeningConfig, executor: Executor): ProfileDeps {
  return {
    config,
    runner: new CommandRunner(executor, config.errors.command_timeout_ceiling),
    commands: new UbuntuCommands(),
  };
}

export { ProfileRegistry } from "./registry.js";
export type { ProfileDeps } from "./deps.js";
