import { spawn } from "node:child_process";
import { ToolUnavailableError } from "./errors.js";

const KILL_GRACE_MILLISECONDS = 5000;

export interface CommandOptions {
  timeoutSeconds: number;
  input?: string;
}

export interface CommandResult {
  // null when the process was killed by a signal.
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

export function runCommand(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    let stdoutBuffer = "";
    let stderrBuffer = "";
    let timedOut = false;
    let settled = false;

    const child = spawn(command, args, {
      stdio: ["pipe", "pipe", "pipe"],
      env: { PATH: process.env.PATH },
    });

    child.stdout.on("data", (chunk: Buffer) => {
      stdoutBuffer += chunk.toString();
    });

    child.stderr.on("data", (chunk: Buffer) => {
      stderrBuffer += chunk.toString();
    });

    // The child may exit before reading all of stdin; the resulting EPIPE is
    // reported through the exit code instead.
    child.stdin.on("error", (error: Error) => {
      console.warn(`[pdf-unlocker] ${command} stdin error: ${error.message}`);
    });
    child.stdin.end(options.input ?? "");

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGTERM");
      const killTimer = setTimeout(() => {
        child.kill("SIGKILL");
      }, KILL_GRACE_MILLISECONDS);
      child.on("close", () => {
        clearTimeout(killTimer);
      });
    }, options.timeoutSeconds * 1000);

    child.on("error", (error: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      console.error(`[pdf-unlocker] Failed to spawn ${command}: ${error.message}`);
      reject(new ToolUnavailableError(command, error));
    });

    child.on("close", (exitCode) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        exitCode: timedOut ? null : exitCode,
        stdout: stdoutBuffer,
        stderr: stderrBuffer,
        timedOut,
      });
    });
  });
}
