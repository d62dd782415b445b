import type { HardeningConfig } from "../types/config.js";
import type { CommandRunner } from "../system/runner.js";
import type { UbuntuCommands } from "../system/commands.js";

/** What every profile needs to reach the host. */
export interface ProfileDeps {
  readonly config: HardeningConfig;
  readonly runner: CommandRunner;
  readonly commands: UbuntuCommands;
  /** Clock for backup file names. */
  readonly now?: () => Date;
  /** Root of the kernel parameter tree, /proc/sys on a real host. */
  readonly procRoot?: string;
}
