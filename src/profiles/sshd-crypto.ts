// sshd strong crypto profile.
// Facts are the keyword lines of `sshd -T` (the merged server config), compared exactly.
// The GSSAPI key-exchange algorithm list is not a fact: sshd -T prints its legacy values
// even with GSSAPIKeyExchange disabled.
import { copyFile, mkdir, readFile, stat, utimes, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { basename } from "node:path";
import type { Action } from "../types/action.js";
import type { Collaborator, WriteOutcome } from "../types/collaborator.js";
import type { Fact, FactValue, Target } from "../types/fact.js";
import type { HardeningProfile, ProfilePlan } from "../types/profile.js";
import type { HardeningConfig } from "../types/config.js";
import type { ProfileDeps } from "./deps.js";
import { COMMAND_NOT_FOUND } from "../execution/executor.js";
import { HardeningError, HardeningErrorCode } from "../errors.js";
import { logger } from "../logger.js";

export const SSHD_PROFILE_ID = "sshd-crypto";

export const SSHD_FACTS = {
  gssapiKeyExchange: "sshd.gssapikeyexchange",
  gssapiAuthentication: "sshd.gssapiauthentication",
  kex: "sshd.kexalgorithms",
  macs: "sshd.macs",
  hostKeys: "sshd.hostkeyalgorithms",
  noSha1Macs: "sshd.no-sha1-macs",
} as const;

const CRYPTO_FACTS: readonly string[] = Object.values(SSHD_FACTS);

/** Expected lines exactly as `sshd -T` prints them (lower-case keyword, comma-joined list). */
export function hardenedLines(config: HardeningConfig["sshd"]): Record<string, string> {
  return {
    [SSHD_FACTS.gssapiKeyExchange]: "gssapikeyexchange no",
    [SSHD_FACTS.gssapiAuthentication]: "gssapiauthentication no",
    [SSHD_FACTS.kex]: `kexalgorithms ${config.kex_algorithms.join(",")}`,
    [SSHD_FACTS.macs]: `macs ${config.macs.join(",")}`,
    [SSHD_FACTS.hostKeys]: `hostkeyalgorithms ${config.host_key_algorithms.join(",")}`,
  };
}

export function buildSshdTarget(config: HardeningConfig["sshd"]): Target {
  const lines = hardenedLines(config);
  const facts: Fact[] = Object.entries(lines).map(([name, desired]): Fact => ({ name, desired, comparator: "exact-line" }));
  facts.push({ name: SSHD_FACTS.noSha1Macs, desired: "hmac-sha1", comparator: "excludes", description: "no SHA1 MAC anywhere in the effective config" });
  return { name: "sshd hardened crypto", facts };
}

export function buildSshdActions(config: HardeningConfig["sshd"]): Action[] {
  return [
    { name: "backup-configs", description: `Back up ${config.main_config} and the drop-in to ${config.backup_dir}`, facts: [], reversible: false, destructive: false,
      confirm: true, promptDefault: true, prompt: "Create backup of existing configs before changes?" },
    { name: "ensure-include", description: `Ensure ${config.main_config} includes ${config.dropin_dir}/*.conf`, facts: CRYPTO_FACTS, reversible: true, destructive: false },
    { name: "comment-deprecated", description: "Comment out deprecated UsePrivilegeSeparation", facts: [], reversible: true, destructive: false },
    { name: "write-dropin", description: `Write strong crypto drop-in ${config.dropin_path}`, facts: CRYPTO_FACTS, reversible: true, destructive: false },
    { name: "reload-sshd", description: "Reload ssh/sshd to apply changes", facts: [], reversible: true, destructive: false,
      confirm: true, activates: true, promptDefault: true, prompt: "Reload sshd now to apply changes?" },
  ];
}

/** Render the drop-in, LF line endings only. */
export function renderDropin(config: HardeningConfig["sshd"]): string {
  return [
    "# Strong crypto profile managed by host-hardening.",
    "#",
    "# Validate:  sshd -t",
    "# Apply:     systemctl reload ssh",
    "# Verify:    sshd -T | grep -Ei 'gss|kexalgorithms|macs|hostkeyalgorithms'",
    "",
    "# Disable GSSAPI key exchange to drop the SHA1 based groups",
    "GSSAPIAuthentication no",
    "GSSAPIKeyExchange no",
    "",
    `KexAlgorithms ${config.kex_algorithms.join(",")}`,
    `MACs ${config.macs.join(",")}`,
    `HostKeyAlgorithms ${config.host_key_algorithms.join(",")}`,
    "",
  ].join("\n");
}

/**
 * Insert an Include directive before the first line that is not a comment,
 * or append it when the file holds only comments. Returns null when the
 * drop-in directory is already included.
 */
export function insertInclude(content: string, dropinDir: string): string | null {
  const escaped = dropinDir.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
  const lines = content === "" ? [] : content.replace(/\n$/, "").split("\n");
  if (lines.some((l) => new RegExp(`^\\s*Include\\s+${escaped}/`).test(l))) return null;

  const directive = `Include ${dropinDir}/*.conf`;
  const firstBody = lines.findIndex((l) => !l.startsWith("#"));
  if (firstBody === -1) lines.push(directive);
  else lines.splice(firstBody, 0, directive);
  return lines.join("\n") + "\n";
}

/** Comment out every active UsePrivilegeSeparation line. */
export function commentDeprecated(content: string): string {
  return content.replace(/^[ \t]*UsePrivilegeSeparation.*$/gm, (line) => `#${line}`);
}

/** YYMMDD_HHMMSS in local time. */
export function backupStamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${pad(date.getFullYear() % 100)}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export class SshdCryptoCollaborator implements Collaborator {
  readonly subsystem = SSHD_PROFILE_ID;
  private readonly config: HardeningConfig["sshd"];

  constructor(private readonly deps: ProfileDeps) {
    this.config = deps.config.sshd;
  }

  async read(fact: string): Promise<FactValue> {
    if (!CRYPTO_FACTS.includes(fact)) {
      throw new HardeningError(HardeningErrorCode.OBSERVATION_FAILED, `Unknown sshd fact '${fact}'`);
    }
    const out = await this.deps.runner.query(this.deps.commands.sshdEffectiveConfig());
    if (fact === SSHD_FACTS.noSha1Macs) return out;
    const keyword = fact.slice("sshd.".length);
    // A missing keyword line reads as empty, which never matches a desired line.
    return out.split("\n").find((l) => l.startsWith(`${keyword} `)) ?? "";
  }

  async write(action: Action): Promise<WriteOutcome> {
    switch (action.name) {
      case "backup-configs": return this.backup();
      case "ensure-include": return this.ensureInclude();
      case "comment-deprecated": return this.commentDeprecated();
      case "write-dropin": return this.writeDropin();
      case "reload-sshd": return this.reload();
      default:
        throw new HardeningError(HardeningErrorCode.ACTION_FAILED, `Unknown sshd action '${action.name}'`);
    }
  }

  async validate(): Promise<void> {
    const command = this.deps.commands.sshdTestConfig();
    const r = await this.deps.runner.run(command, "quick");
    if (r.exitCode === COMMAND_NOT_FOUND) {
      throw new HardeningError(HardeningErrorCode.VALIDATION_FAILED, "sshd not found - cannot validate configuration");
    }
    if (r.exitCode !== 0) {
      throw new HardeningError(HardeningErrorCode.VALIDATION_FAILED, `sshd -t rejected the configuration: ${r.stderr.trim() || `exit ${r.exitCode}`}`, { stderr: r.stderr });
    }
  }

  private async backup(): Promise<WriteOutcome> {
    let outcome: WriteOutcome = "unchanged";
    const stamp = backupStamp((this.deps.now ?? (() => new Date()))());
    await mkdir(this.config.backup_dir, { recursive: true });
    for (const source of [this.config.main_config, this.config.dropin_path]) {
      if (!existsSync(source)) continue;
      const dest = `${this.config.backup_dir}/${basename(source)}-${stamp}.backup`;
      await copyFile(source, dest);
      const s = await stat(source);
      await utimes(dest, s.atime, s.mtime);
      logger.info({ source, dest }, "Backed up config");
      outcome = "changed";
    }
    return outcome;
  }

  private async ensureInclude(): Promise<WriteOutcome> {
    if (!existsSync(this.config.main_config)) {
      logger.warn({ path: this.config.main_config }, "Main sshd config not found - skipping Include check");
      return "unchanged";
    }
    const updated = insertInclude(await readFile(this.config.main_config, "utf-8"), this.config.dropin_dir);
    if (updated === null) return "unchanged";
    await writeFile(this.config.main_config, updated, "utf-8");
    logger.info({ path: this.config.main_config }, "Added Include for drop-in directory");
    return "changed";
  }

  private async commentDeprecated(): Promise<WriteOutcome> {
    if (!existsSync(this.config.main_config)) return "unchanged";
    const content = await readFile(this.config.main_config, "utf-8");
    const updated = commentDeprecated(content);
    if (updated === content) return "unchanged";
    await writeFile(this.config.main_config, updated, "utf-8");
    return "changed";
  }

  private async writeDropin(): Promise<WriteOutcome> {
    const content = renderDropin(this.config);
    if (existsSync(this.config.dropin_path) && (await readFile(this.config.dropin_path, "utf-8")) === content) return "unchanged";
    await mkdir(this.config.dropin_dir, { recursive: true });
    await writeFile(this.config.dropin_path, content, { encoding: "utf-8", mode: 0o644 });
    return "changed";
  }

  private async reload(): Promise<WriteOutcome> {
    const { runner, commands } = this.deps;
    for (const unit of ["sshd", "ssh"]) {
      const r = await runner.run(commands.unitIsActive(unit), "quick");
      if (r.exitCode === COMMAND_NOT_FOUND) {
        throw new HardeningError(HardeningErrorCode.PREREQUISITE_MISSING, "systemctl not found - cannot reload sshd");
      }
      if (r.exitCode === 0) {
        await runner.change(commands.unitControl(unit, "reload"), "quick");
        return "changed";
      }
    }
    throw new HardeningError(HardeningErrorCode.ACTION_FAILED, "Could not find a running sshd/ssh service to reload");
  }
}

export function sshdCryptoProfile(deps: ProfileDeps): HardeningProfile {
  return {
    id: SSHD_PROFILE_ID,
    description: "OpenSSH server strong crypto drop-in (KEX, MACs, host key algorithms, GSSAPI off)",
    supportsBackout: false,
    plan(): ProfilePlan {
      return {
        target: buildSshdTarget(deps.config.sshd),
        actions: buildSshdActions(deps.config.sshd),
        collaborator: new SshdCryptoCollaborator(deps),
      };
    },
  };
}
