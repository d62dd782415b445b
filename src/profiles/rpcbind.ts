// rpcbind exposure profile.
// Hardened: nothing listens on the portmapper port and every rpcbind unit is inactive and masked
// (an absent unit counts as both, so a host without the package is hardened as well).
// Restored: package installed, units unmasked, the socket unit enabled and running.
import type { Action } from "../types/action.js";
import type { Collaborator, WriteOutcome } from "../types/collaborator.js";
import type { Fact, FactValue, Target } from "../types/fact.js";
import type { HardeningProfile, ProfileOptions, ProfilePlan } from "../types/profile.js";
import type { HardeningConfig } from "../types/config.js";
import type { ProfileDeps } from "./deps.js";
import { COMMAND_NOT_FOUND } from "../execution/executor.js";
import { HardeningError, HardeningErrorCode } from "../errors.js";
import { logger } from "../logger.js";

export const RPCBIND_PROFILE_ID = "rpcbind";

export const PORT_FACT = "rpcbind.port-listening";
export const PACKAGE_FACT = "rpcbind.package-installed";

type UnitProperty = "active" | "masked" | "enabled";

export const unitFact = (unit: string, property: UnitProperty): string => `${unit}.${property}`;

function socketUnit(config: HardeningConfig["rpcbind"]): string | undefined {
  return config.units.find((u) => u.endsWith(".socket"));
}

export function buildRpcbindTarget(config: HardeningConfig["rpcbind"], options: ProfileOptions): Target {
  const facts: Fact[] = [
    { name: PORT_FACT, desired: false, comparator: "boolean", description: `no listener on port ${config.port}` },
  ];
  for (const unit of config.units) {
    facts.push({ name: unitFact(unit, "active"), desired: false, comparator: "boolean" });
    facts.push({ name: unitFact(unit, "masked"), desired: true, comparator: "boolean" });
  }
  if (options.purge) facts.push({ name: PACKAGE_FACT, desired: false, comparator: "boolean" });
  return { name: "rpcbind disabled", facts };
}

export function buildRpcbindActions(config: HardeningConfig["rpcbind"], options: ProfileOptions): Action[] {
  const actions: Action[] = [];
  // One question covers every unit.
  const confirm = { confirm: true, promptDefault: true, prompt: `Disable and mask ${config.units.join(" and ")} now?` };
  // Stop/disable strictly before mask for every unit.
  for (const unit of config.units) {
    actions.push({ name: `disable ${unit}`, description: `Stop and disable ${unit}`, facts: [unitFact(unit, "active")], reversible: true, destructive: false, ...confirm });
    actions.push({ name: `mask ${unit}`, description: `Mask ${unit}`, facts: [unitFact(unit, "masked")], reversible: true, destructive: false, ...confirm });
  }
  actions.push({
    name: `purge ${config.package}`,
    description: `Purge the ${config.package} package`,
    facts: options.purge ? [PACKAGE_FACT] : [],
    reversible: false,
    destructive: true,
    preAuthorized: options.purge,
    onlyWhen: { fact: PACKAGE_FACT, equals: true },
    promptDefault: options.purge,
    prompt: `Purge the ${config.package} package via apt-get now?`,
  });
  return actions;
}

export function buildRpcbindRestoreTarget(config: HardeningConfig["rpcbind"]): Target {
  const facts: Fact[] = [{ name: PACKAGE_FACT, desired: true, comparator: "boolean" }];
  for (const unit of config.units) facts.push({ name: unitFact(unit, "masked"), desired: false, comparator: "boolean" });
  const socket = socketUnit(config);
  if (socket) {
    facts.push({ name: unitFact(socket, "active"), desired: true, comparator: "boolean" });
    facts.push({ name: unitFact(socket, "enabled"), desired: true, comparator: "boolean" });
  }
  return { name: "rpcbind restored", facts };
}

export function buildRpcbindRestoreActions(config: HardeningConfig["rpcbind"]): Action[] {
  const actions: Action[] = [
    { name: `install ${config.package}`, description: `Install the ${config.package} package`, facts: [PACKAGE_FACT], reversible: true, destructive: false },
  ];
  for (const unit of config.units) {
    actions.push({ name: `unmask ${unit}`, description: `Unmask ${unit}`, facts: [unitFact(unit, "masked")], reversible: true, destructive: false });
  }
  const socket = socketUnit(config);
  if (socket) {
    actions.push({ name: `enable --now ${socket}`, description: `Enable and start ${socket}`, facts: [unitFact(socket, "active"), unitFact(socket, "enabled")], reversible: true, destructive: false });
  }
  for (const unit of config.units.filter((u) => u.endsWith(".service"))) {
    actions.push({ name: `enable ${unit}`, description: `Enable ${unit}`, facts: [], reversible: true, destructive: false });
  }
  return actions;
}

export class RpcbindCollaborator implements Collaborator {
  readonly subsystem = RPCBIND_PROFILE_ID;
  private readonly config: HardeningConfig["rpcbind"];

  constructor(private readonly deps: ProfileDeps) {
    this.config = deps.config.rpcbind;
  }

  async read(fact: string): Promise<FactValue> {
    if (fact === PORT_FACT) return this.portListening();
    if (fact === PACKAGE_FACT) return this.packageInstalled();
    for (const unit of this.config.units) {
      if (fact === unitFact(unit, "active")) return this.unitActive(unit);
      if (fact === unitFact(unit, "masked")) return this.unitMasked(unit);
      if (fact === unitFact(unit, "enabled")) return this.unitEnabled(unit);
    }
    throw new HardeningError(HardeningErrorCode.OBSERVATION_FAILED, `Unknown rpcbind fact '${fact}'`);
  }

  async write(action: Action): Promise<WriteOutcome> {
    const { runner, commands } = this.deps;
    const [verb, ...rest] = action.name.split(" ");
    const subject = rest[rest.length - 1] ?? "";

    switch (verb) {
      case "disable": {
        if (!(await this.unitExists(subject))) return "unchanged";
        const running = await this.unitActive(subject);
        if (!running && !(await this.unitEnabled(subject))) return "unchanged";
        await runner.change(commands.unitControl(subject, "disable", { now: running }));
        return "changed";
      }
      case "mask":
        if (!(await this.unitExists(subject)) || (await this.unitMasked(subject))) return "unchanged";
        await runner.change(commands.unitControl(subject, "mask"));
        return "changed";
      case "purge":
        if (!(await this.packageInstalled())) {
          logger.info({ package: subject }, "Package already not installed - skipping purge");
          return "unchanged";
        }
        await runner.change(commands.packagePurge(subject), "long_running");
        return "changed";
      case "install":
        if (await this.packageInstalled()) return "unchanged";
        await runner.change(commands.packageInstall(subject), "long_running");
        return "changed";
      case "unmask":
        if (!(await this.unitExists(subject)) || !(await this.unitMasked(subject))) return "unchanged";
        await runner.change(commands.unitControl(subject, "unmask"));
        return "changed";
      case "enable": {
        if (!(await this.unitExists(subject))) {
          throw new HardeningError(HardeningErrorCode.ACTION_FAILED, `${subject} unit not found`);
        }
        const now = rest.includes("--now");
        if ((await this.unitEnabled(subject)) && (!now || (await this.unitActive(subject)))) return "unchanged";
        await runner.change(commands.unitControl(subject, "enable", { now }));
        return "changed";
      }
      default:
        throw new HardeningError(HardeningErrorCode.ACTION_FAILED, `Unknown rpcbind action '${action.name}'`);
    }
  }

  private async portListening(): Promise<boolean> {
    const out = await this.deps.runner.query(this.deps.commands.listeningSockets());
    // Local address column: 0.0.0.0:111, [::]:111, *:111
    const pattern = new RegExp(`:${this.config.port}$`);
    return out.split("\n").some((l) => l.trim().split(/\s+/).some((field) => pattern.test(field)));
  }

  private async packageInstalled(): Promise<boolean> {
    const r = await this.deps.runner.run(this.deps.commands.packageStatus(this.config.package), "quick");
    if (r.exitCode === COMMAND_NOT_FOUND) {
      throw new HardeningError(HardeningErrorCode.OBSERVATION_FAILED, "dpkg-query is not available");
    }
    // dpkg-query exits non-zero for a package it has never seen.
    return r.exitCode === 0 && r.stdout.includes("install ok installed");
  }

  private async unitExists(unit: string): Promise<boolean> {
    const out = await this.deps.runner.query(this.deps.commands.unitFiles());
    return out.split("\n").some((l) => l.trim().split(/\s+/)[0] === unit);
  }

  private async unitActive(unit: string): Promise<boolean> {
    if (!(await this.unitExists(unit))) return false;
    const r = await this.deps.runner.run(this.deps.commands.unitIsActive(unit), "quick");
    return r.exitCode === 0;
  }

  private async unitMasked(unit: string): Promise<boolean> {
    if (!(await this.unitExists(unit))) return true;
    const r = await this.deps.runner.run(this.deps.commands.unitIsEnabled(unit), "quick");
    return `${r.stdout}${r.stderr}`.includes("masked");
  }

  private async unitEnabled(unit: string): Promise<boolean> {
    if (!(await this.unitExists(unit))) return false;
    const r = await this.deps.runner.run(this.deps.commands.unitIsEnabled(unit), "quick");
    return r.exitCode === 0 && r.stdout.trim().split("\n")[0] === "enabled";
  }
}

export function rpcbindProfile(deps: ProfileDeps): HardeningProfile {
  return {
    id: RPCBIND_PROFILE_ID,
    description: `Disable and mask ${deps.config.rpcbind.units.join(", ")}; optionally purge ${deps.config.rpcbind.package}`,
    supportsBackout: true,
    plan(options: ProfileOptions): ProfilePlan {
      const config = deps.config.rpcbind;
      return {
        target: buildRpcbindTarget(config, options),
        actions: buildRpcbindActions(config, options),
        restore: { target: buildRpcbindRestoreTarget(config), actions: buildRpcbindRestoreActions(config) },
        collaborator: new RpcbindCollaborator(deps),
      };
    },
  };
}
