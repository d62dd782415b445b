import type { Command } from "../types/command.js";

export type UnitAction = "start" | "stop" | "reload" | "enable" | "disable" | "mask" | "unmask";

/**
 * Command dispatch for the tools the hardening profiles drive.
 * Profiles express intent; this class translates it to Ubuntu argv.
 * Commands run without sudo: the CLI requires root instead.
 */
export class UbuntuCommands {
  private readonly aptEnv = { DEBIAN_FRONTEND: "noninteractive" };

  packageStatus(pkg: string): Command {
    return { argv: ["dpkg-query", "-W", "-f=${Status}", pkg] };
  }

  packageInstall(pkg: string): Command {
    return { argv: ["apt-get", "install", "-y", pkg], env: this.aptEnv };
  }

  packagePurge(pkg: string): Command {
    return { argv: ["apt-get", "purge", "-y", pkg], env: this.aptEnv };
  }

  unitFiles(): Command {
    return { argv: ["systemctl", "list-unit-files", "--type=service", "--type=socket", "--no-legend", "--no-pager"] };
  }

  unitIsActive(unit: string): Command {
    return { argv: ["systemctl", "is-active", unit] };
  }

  unitIsEnabled(unit: string): Command {
    return { argv: ["systemctl", "is-enabled", unit] };
  }

  unitControl(unit: string, action: UnitAction, options?: { now?: boolean }): Command {
    const argv = ["systemctl", action];
    if (options?.now) argv.push("--now");
    argv.push(unit);
    return { argv };
  }

  listeningSockets(): Command {
    return { argv: ["ss", "-tulpn"] };
  }

  sysctlRead(key: string): Command {
    return { argv: ["sysctl", "-n", key] };
  }

  sysctlReloadAll(): Command {
    return { argv: ["sysctl", "--system"] };
  }

  sshdEffectiveConfig(): Command {
    return { argv: ["sshd", "-T"] };
  }

  sshdTestConfig(): Command {
    return { argv: ["sshd", "-t"] };
  }
}
