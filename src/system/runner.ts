// Thin layer between collaborators and the Executor.
// Translates exit codes into HardeningError so the reconciler can tell
// observation failures, action failures and missing prerequisites apart.
import type { Command } from "../types/command.js";
import type { DurationCategory } from "../types/duration.js";
import type { ExecResult, Executor } from "../execution/executor.js";
import { COMMAND_NOT_FOUND, formatCommand, timeoutFor } from "../execution/executor.js";
import { HardeningError, HardeningErrorCode } from "../errors.js";
import { categorizeError } from "./categorize.js";

export class CommandRunner {
  constructor(
    private readonly executor: Executor,
    private readonly timeoutCeilingSeconds: number,
  ) {}

  /** Run and return the raw result; a missing binary still resolves with exit code 127. */
  async run(command: Command, duration: DurationCategory): Promise<ExecResult> {
    return this.executor.execute(command, timeoutFor(duration, this.timeoutCeilingSeconds));
  }

  /** Run a read-side query. Missing tool or non-zero exit is an observation failure. */
  async query(command: Command, duration: DurationCategory = "quick"): Promise<string> {
    const r = await this.run(command, duration);
    if (r.exitCode === COMMAND_NOT_FOUND) {
      throw new HardeningError(HardeningErrorCode.OBSERVATION_FAILED, `${command.argv[0]} is not available`, { command: formatCommand(command) });
    }
    if (r.exitCode !== 0) {
      throw new HardeningError(HardeningErrorCode.OBSERVATION_FAILED, `${formatCommand(command)} exited with ${r.exitCode}: ${r.stderr.trim()}`, { command: formatCommand(command), stderr: r.stderr });
    }
    return r.stdout;
  }

  /** Run a state-changing command. Missing tool is a missing prerequisite; non-zero exit an action failure. */
  async change(command: Command, duration: DurationCategory = "normal"): Promise<ExecResult> {
    const r = await this.run(command, duration);
    if (r.exitCode === COMMAND_NOT_FOUND) {
      throw new HardeningError(HardeningErrorCode.PREREQUISITE_MISSING, `${command.argv[0]} not found - cannot run '${formatCommand(command)}'`, { command: formatCommand(command) });
    }
    if (r.exitCode !== 0) {
      const cat = categorizeError(r.stderr);
      throw new HardeningError(HardeningErrorCode.ACTION_FAILED, `'${formatCommand(command)}' exited with ${r.exitCode}: ${r.stderr.trim()}`, {
        command: formatCommand(command),
        stderr: r.stderr,
        error_code: cat.code,
        category: cat.category,
        remediation: cat.remediation,
      });
    }
    return r;
  }
}
