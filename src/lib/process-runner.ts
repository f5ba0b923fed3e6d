/**
 * Process Runner
 * Spawns external tools (ffmpeg / ffprobe) and converts every outcome into a Result
 */

import { spawn } from "child_process";
import { ToolInvocationError } from "./errors";
import { createLogger } from "./logger";
import { err, ok, type Result } from "./result";

const log = createLogger("PROCESS");

const STDERR_TAIL_LENGTH = 500;
// ffmpeg logs progress to stderr for the whole run; only the end is ever reported
const STDERR_BUFFER_LENGTH = 8 * 1024;

export interface ProcessOutput {
  stdout: Buffer;
  /** Last few KB of stderr */
  stderr: string;
  durationMs: number;
}

export interface RunProcessOptions {
  timeoutMs: number;
}

// Anything outside this set gets single-quoted in the reconstructed command
const SHELL_SAFE = /^[A-Za-z0-9_\-+=.,/:@%]+$/;

function quoteArg(arg: string): string {
  if (arg.length > 0 && SHELL_SAFE.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Rebuild a command line that can be pasted into a POSIX shell
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArg).join(" ");
}

/**
 * Run a command to completion. Never rejects.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions
): Promise<Result<ProcessOutput, ToolInvocationError>> {
  const commandLine = formatCommand(command, args);
  const start = performance.now();
  log.debug("SPAWN", { command: commandLine });

  return new Promise((resolve) => {
    let settled = false;
    let stderr = "";
    const chunks: Buffer[] = [];

    const finish = (result: Result<ProcessOutput, ToolInvocationError>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      resolve(result);
    };

    const proc = spawn(command, [...args]);

    const timeout = setTimeout(() => {
      proc.kill("SIGKILL");
      log.error("TIMEOUT", undefined, { command: commandLine, timeoutMs: options.timeoutMs });
      finish(
        err(
          new ToolInvocationError(`${command} timed out after ${options.timeoutMs}ms`, {
            command: commandLine,
            exitCode: null,
            stderrTail: stderr.slice(-STDERR_TAIL_LENGTH),
            timedOut: true,
          })
        )
      );
    }, options.timeoutMs);

    proc.stdout?.on("data", (data: Buffer) => {
      chunks.push(data);
    });

    proc.stderr?.on("data", (data: Buffer) => {
      stderr = (stderr + data.toString()).slice(-STDERR_BUFFER_LENGTH);
    });

    proc.on("error", (spawnError) => {
      log.error("SPAWN_FAILED", spawnError, { command: commandLine });
      finish(
        err(
          new ToolInvocationError(
            `Failed to spawn ${command}: ${spawnError.message}. Make sure it is installed`,
            { command: commandLine, exitCode: null, stderrTail: "", timedOut: false },
            { cause: spawnError }
          )
        )
      );
    });

    proc.on("close", (code) => {
      // Already resolved by the timeout or a spawn error
      if (settled) return;
      const durationMs = Math.round(performance.now() - start);
      if (code !== 0) {
        log.error("EXITED_WITH_ERROR", undefined, { command: commandLine, code, durationMs });
        finish(
          err(
            new ToolInvocationError(`${command} failed with code ${code}`, {
              command: commandLine,
              exitCode: code,
              stderrTail: stderr.slice(-STDERR_TAIL_LENGTH),
              timedOut: false,
            })
          )
        );
        return;
      }

      log.info("COMPLETED", { command: command, durationMs });
      finish(ok({ stdout: Buffer.concat(chunks), stderr, durationMs }));
    });
  });
}
