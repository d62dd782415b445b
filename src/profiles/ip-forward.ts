// IPv4 forwarding profile.
// The kernel value is read twice (sysctl and /proc) and the persistent drop-in is checked for
// an exact `key=value` line; reload-sysctl is what brings the live value in line.
import { chmod, mkdir, readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import type { Action } from "../types/action.js";
import type { Collaborator, WriteOutcome } from "../types/collaborator.js";
import type { FactValue, Target } from "../types/fact.js";
import type { HardeningProfile, ProfilePlan } from "../types/profile.js";
import type { HardeningConfig } from "../types/config.js";
import type { ProfileDeps } from "./deps.js";
import { HardeningError, HardeningErrorCode, errorMessage } from "../errors.js";
import { logger } from "../logger.js";

export const IP_FORWARD_PROFILE_ID = "ip-forward";

export function ipForwardFacts(key: string): { live: string; proc: string; persistent: string } {
  return { live: `${key}.live`, proc: `${key}.proc`, persistent: `${key}.persistent` };
}

/** Path of the key under the /proc/sys tree (dots become directories). */
export function procPath(key: string, procRoot = "/proc/sys"): string {
  return join(procRoot, ...key.split("."));
}

/** True when the conf text holds an uncommented `key = value` line, whitespace tolerated. */
export function hasPersistentLine(content: string, key: string, desired: string): boolean {
  const esc = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const pattern = new RegExp(`^\\s*${esc(key)}\\s*=\\s*${esc(desired)}\\s*$`);
  return content.split("\n").some((l) => pattern.test(l));
}

export function buildIpForwardTarget(config: HardeningConfig["ip_forward"]): Target {
  const names = ipForwardFacts(config.key);
  return {
    name: `${config.key} = ${config.desired}`,
    facts: [
      { name: names.live, desired: config.desired, comparator: "exact", description: "runtime value from sysctl" },
      { name: names.proc, desired: config.desired, comparator: "exact", description: "runtime value from /proc/sys" },
      { name: names.persistent, desired: true, comparator: "boolean", description: `${config.conf_path} sets the value at boot` },
    ],
  };
}

export function buildIpForwardActions(config: HardeningConfig["ip_forward"]): Action[] {
  const names = ipForwardFacts(config.key);
  return [
    { name: "write-persistent", description: `Write ${config.key}=${config.desired} to ${config.conf_path}`, facts: [names.persistent],
      reversible: true, destructive: false, confirm: true, promptDefault: false,
      prompt: `Write ${config.key}=${config.desired} to ${config.conf_path}?` },
    { name: "reload-sysctl", description: "Reload all sysctl settings (sysctl --system)", facts: [names.live, names.proc],
      reversible: true, destructive: false, confirm: true, promptDefault: false,
      prompt: "Reload sysctl settings now (sysctl --system)?" },
  ];
}

export class IpForwardCollaborator implements Collaborator {
  readonly subsystem = IP_FORWARD_PROFILE_ID;
  private readonly config: HardeningConfig["ip_forward"];
  private readonly names: ReturnType<typeof ipForwardFacts>;

  constructor(private readonly deps: ProfileDeps) {
    this.config = deps.config.ip_forward;
    this.names = ipForwardFacts(this.config.key);
  }

  async read(fact: string): Promise<FactValue> {
    switch (fact) {
      case this.names.live:
        return (await this.deps.runner.query(this.deps.commands.sysctlRead(this.config.key))).trim();
      case this.names.proc: {
        const path = procPath(this.config.key, this.deps.procRoot);
        try {
          return (await readFile(path, "utf-8")).trim();
        } catch (err) {
          throw new HardeningError(HardeningErrorCode.OBSERVATION_FAILED, `Cannot read ${path}: ${errorMessage(err)}`, { path });
        }
      }
      case this.names.persistent:
        if (!existsSync(this.config.conf_path)) return false;
        return hasPersistentLine(await readFile(this.config.conf_path, "utf-8"), this.config.key, this.config.desired);
      default:
        throw new HardeningError(HardeningErrorCode.OBSERVATION_FAILED, `Unknown ip-forward fact '${fact}'`);
    }
  }

  async write(action: Action): Promise<WriteOutcome> {
    switch (action.name) {
      case "write-persistent": {
        const path = this.config.conf_path;
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, `${this.config.key}=${this.config.desired}\n`, { encoding: "utf-8", mode: 0o644 });
        // mode only applies on creation
        await chmod(path, 0o644);
        logger.info({ path }, "Wrote persistent sysctl setting");
        return "changed";
      }
      case "reload-sysctl":
        await this.deps.runner.change(this.deps.commands.sysctlReloadAll());
        return "changed";
      default:
        throw new HardeningError(HardeningErrorCode.ACTION_FAILED, `Unknown ip-forward action '${action.name}'`);
    }
  }
}

export function ipForwardProfile(deps: ProfileDeps): HardeningProfile {
  const { key, desired } = deps.config.ip_forward;
  return {
    id: IP_FORWARD_PROFILE_ID,
    description: `Set ${key}=${desired} now and at boot`,
    supportsBackout: false,
    plan(): ProfilePlan {
      return {
        target: buildIpForwardTarget(deps.config.ip_forward),
        actions: buildIpForwardActions(deps.config.ip_forward),
        collaborator: new IpForwardCollaborator(deps),
      };
    },
  };
}
