// Command execution layer: every package-index query, metadata download and
// package install passes through this module.
// LocalExecutor.execute() is the hard boundary between the core and the OS.
// It never rejects: spawn failures and timeouts come back as a non-zero exitCode,
// which is how the resolver and fetcher turn transport trouble into "absent".
import { execFile } from "node:child_process";
import type { Command } from "../types/command.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** Executor interface. Tests substitute an in-process fake. */
export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Local executor using child_process. */
export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      return { stdout: "", stderr: "empty command", exitCode: 127, durationMs: 0 };
    }

    return new Promise<ExecResult>((resolve) => {
      execFile(
        cmd,
        args,
        {
          timeout: timeoutMs,
          // The binary release database is the largest payload we read (a few MB of desc text).
          maxBuffer: 32 * 1024 * 1024,
          // No shell: argv values are never re-parsed. Pipelines arrive as ["bash", "-c", script] from the command layer.
          env: command.env ? { ...process.env, ...command.env } : process.env,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          const exitCode = error ? (typeof error.code === "number" ? error.code : 1) : 0;
          if (error) logger.debug({ argv: command.argv, exitCode, durationMs }, "Command failed");
          resolve({ stdout: stdout ?? "", stderr: stderr ?? "", exitCode, durationMs });
        },
      );
    });
  }
}

/** Single-quote a value for interpolation into a bash string. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
