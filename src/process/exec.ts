import { spawn } from "node:child_process";
import { constants } from "node:os";
import { pathExists } from "../utils/paths.js";

export type ProcessStdio = "inherit" | "pipe";

export interface RunProcessOptions {
  cwd?: string;
  env?: Record<string, string>;
  stdio?: ProcessStdio;
  timeoutMs?: number;
}

export interface RunProcessResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export class CommandNotFoundError extends Error {
  readonly command: string;

  constructor(command: string, options?: ErrorOptions) {
    super(`Command not found: '${command}'. Install it or make sure it is on PATH.`, options);
    this.name = "CommandNotFoundError";
    this.command = command;
  }
}

export class WorkingDirectoryNotFoundError extends Error {
  readonly cwd: string;

  constructor(cwd: string, options?: ErrorOptions) {
    super(`Working directory '${cwd}' does not exist.`, options);
    this.name = "WorkingDirectoryNotFoundError";
    this.cwd = cwd;
  }
}

export class CommandTimeoutError extends Error {
  readonly command: string;
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command '${command}' timed out after ${timeoutMs}ms.`);
    this.name = "CommandTimeoutError";
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Spawns `program` without a shell and resolves once it exits.
 *
 * With `stdio: "inherit"` the child shares the terminal, so interactive tools
 * (and Ctrl-C) behave as if run directly; `stdout`/`stderr` are then empty.
 * A child killed by a signal resolves with the conventional `128 + signo` code.
 */
export async function runProcess(program: string, args: string[], options: RunProcessOptions = {}): Promise<RunProcessResult> {
  const stdio = options.stdio ?? "inherit";

  return new Promise<RunProcessResult>((resolvePromise, rejectPromise) => {
    const child = spawn(program, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: stdio === "inherit" ? "inherit" : ["ignore", "pipe", "pipe"]
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    child.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    let timedOut = false;
    const timeoutMs = options.timeoutMs ?? 0;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGTERM");
          }, timeoutMs)
        : null;

    child.once("error", (error) => {
      if (timer) {
        clearTimeout(timer);
      }
      void describeSpawnError(error, program, options.cwd).then(rejectPromise, rejectPromise);
    });

    child.once("close", (code, signal) => {
      if (timer) {
        clearTimeout(timer);
      }
      if (timedOut) {
        rejectPromise(new CommandTimeoutError(program, timeoutMs));
        return;
      }

      resolvePromise({
        exitCode: code ?? signalExitCode(signal),
        signal,
        stdout: Buffer.concat(stdoutChunks).toString("utf8"),
        stderr: Buffer.concat(stderrChunks).toString("utf8")
      });
    });
  });
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) {
    return 1;
  }

  const signo = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
  return typeof signo === "number" ? 128 + signo : 1;
}

// A missing cwd also surfaces as `spawn <cmd> ENOENT`.
async function describeSpawnError(error: Error, program: string, cwd: string | undefined): Promise<Error> {
  if (!isSpawnEnoentError(error, program)) {
    return new Error(`Failed to start '${program}': ${error.message}`, { cause: error });
  }
  if (cwd !== undefined && !(await pathExists(cwd))) {
    return new WorkingDirectoryNotFoundError(cwd, { cause: error });
  }
  return new CommandNotFoundError(program, { cause: error });
}

function isSpawnEnoentError(error: unknown, command: string): boolean {
  return error instanceof Error && error.message.includes(`spawn ${command} ENOENT`);
}
