// Command execution layer: every collaborator command passes through this module.
// LocalExecutor.execute() is the boundary between profile code and the OS;
// tests substitute a scripted Executor instead of touching the host.
import { execFile } from "node:child_process";
import type { Command } from "../types/command.js";
import type { DurationCategory } from "../types/duration.js";
import { DURATION_TIMEOUTS } from "../types/duration.js";
import { logger } from "../logger.js";

/** Exit code reported when argv[0] cannot be found, matching the shell's convention. */
export const COMMAND_NOT_FOUND = 127;

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** Executor interface: local today, scripted in tests. */
export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Local executor using child_process.execFile, never a shell. */
export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      throw new Error("Cannot execute an empty command");
    }

    return new Promise<ExecResult>((resolve) => {
      const child = execFile(
        cmd,
        args,
        {
          timeout: timeoutMs,
          // sshd -T and apt-get output stay well below this; it only bounds runaway commands.
          maxBuffer: 10 * 1024 * 1024,
          env: command.env ? { ...process.env, ...command.env } : process.env,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          let exitCode = 0;
          if (error) {
            if (error.code === "ENOENT") exitCode = COMMAND_NOT_FOUND;
            else if (typeof error.code === "number") exitCode = error.code;
            else exitCode = 1;
          }
          logger.debug({ argv: command.argv, exitCode, durationMs }, "Command finished");
          resolve({ stdout: stdout ?? "", stderr: stderr ?? "", exitCode, durationMs });
        },
      );

      if (command.stdin && child.stdin) {
        child.stdin.write(command.stdin);
        child.stdin.end();
      }
    });
  }
}

/** Resolve the timeout for a duration category, capped by the configured ceiling (seconds, 0 = none). */
export function timeoutFor(duration: DurationCategory, ceilingSeconds: number): number {
  return ceilingSeconds > 0
    ? Math.min(DURATION_TIMEOUTS[duration], ceilingSeconds * 1000)
    : DURATION_TIMEOUTS[duration];
}

/** Render argv for logs and error messages. */
export function formatCommand(command: Command): string {
  return command.argv.join(" ");
}
