import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import { basename } from "node:path";
import type { ProcessCommand } from "../adapters/types.js";
import { splitLines } from "../adapters/jsonl.js";
import { ProcessFailedError, TurnTimeoutError } from "../errors.js";
import { componentLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export type ProcessSignal =
  | { kind: "line"; line: string }
  | { kind: "timeout"; timeoutMs: number }
  | { kind: "exit"; exitCode: number | null; stderr: string };

export interface RunOptions {
  /** Whole-process deadline in buffered mode, per stdout read in streaming mode. */
  timeoutMs: number;
}

export interface ProcessExecutor {
  run(command: ProcessCommand, options: RunOptions): Promise<string>;
  stream(command: ProcessCommand, options: RunOptions): AsyncIterable<ProcessSignal>;
}

export const KILL_GRACE_MS = 2_000;

const TIMED_OUT = Symbol("timed-out");

async function withDeadline<T>(promise: Promise<T>, timeoutMs: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

function isRunning(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

/** SIGTERM, then SIGKILL if the child is still around after the grace period. */
export function terminate(child: ChildProcess, graceMs = KILL_GRACE_MS): void {
  if (!isRunning(child)) return;
  child.kill("SIGTERM");
  const timer = setTimeout(() => {
    if (isRunning(child)) child.kill("SIGKILL");
  }, graceMs);
  timer.unref();
}

interface ExitOutcome {
  exitCode: number | null;
  spawnError?: Error;
}

function waitForExit(child: ChildProcess): Promise<ExitOutcome> {
  return new Promise((resolve) => {
    child.once("error", (error) => resolve({ exitCode: null, spawnError: error }));
    child.once("close", (code) => resolve({ exitCode: code }));
  });
}

export class ChildProcessExecutor implements ProcessExecutor {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? componentLogger("executor");
  }

  run(command: ProcessCommand, options: RunOptions): Promise<string> {
    const label = basename(command.file);
    this.logger.info({ command: label, args: command.args.length, cwd: command.cwd }, "Running agent process");

    return new Promise((resolve, reject) => {
      const child = spawn(command.file, command.args, {
        cwd: command.cwd,
        stdio: ["ignore", "pipe", "pipe"]
      });
      let stdout = "";
      let stderr = "";
      let settled = false;

      const settle = (finish: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        finish();
      };

      const timer = setTimeout(() => {
        settle(() => {
          this.logger.error({ command: label, timeoutMs: options.timeoutMs }, "Agent process timed out");
          terminate(child);
          reject(new TurnTimeoutError(options.timeoutMs, label));
        });
      }, options.timeoutMs);

      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.once("error", (error) => {
        settle(() => reject(new ProcessFailedError(null, error.message, label)));
      });
      child.once("close", (code) => {
        settle(() => {
          if (code === 0) {
            resolve(stdout.trim());
            return;
          }
          const message = stderr.trim();
          this.logger.error({ command: label, exitCode: code, stderr: message }, "Agent process failed");
          reject(new ProcessFailedError(code, message, label));
        });
      });
    });
  }

  async *stream(command: ProcessCommand, options: RunOptions): AsyncGenerator<ProcessSignal> {
    const label = basename(command.file);
    this.logger.info({ command: label, args: command.args.length, cwd: command.cwd }, "Streaming agent process");

    const child = spawn(command.file, command.args, {
      cwd: command.cwd,
      stdio: ["ignore", "pipe", "pipe"]
    });
    const exit = waitForExit(child);
    let stderr = "";
    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.stdout.setEncoding("utf8");

    // A failed spawn may never close stdout, so reads also race the spawn error.
    const spawnFailed = new Promise<{ spawnError: Error }>((resolve) => {
      child.once("error", (spawnError) => resolve({ spawnError }));
    });
    const lines = splitLines(child.stdout);
    let exited = false;
    try {
      while (true) {
        const next = await withDeadline(Promise.race([lines.next(), spawnFailed]), options.timeoutMs);
        if (next !== TIMED_OUT && "spawnError" in next) {
          exited = true;
          yield { kind: "exit", exitCode: null, stderr: next.spawnError.message };
          return;
        }
        if (next === TIMED_OUT) {
          this.logger.error({ command: label, timeoutMs: options.timeoutMs }, "Stream read timed out");
          yield { kind: "timeout", timeoutMs: options.timeoutMs };
          return;
        }
        if (next.done) break;
        yield { kind: "line", line: next.value };
      }

      const outcome = await withDeadline(exit, options.timeoutMs);
      if (outcome === TIMED_OUT) {
        yield { kind: "timeout", timeoutMs: options.timeoutMs };
        return;
      }
      exited = true;
      const message = outcome.spawnError ? outcome.spawnError.message : stderr.trim();
      if (outcome.exitCode !== 0) {
        this.logger.error({ command: label, exitCode: outcome.exitCode, stderr: message }, "Agent process failed");
      }
      yield { kind: "exit", exitCode: outcome.exitCode, stderr: message };
    } finally {
      // Timeouts, errors and consumers that stop early all end up here with the child still alive.
      if (!exited) terminate(child);
    }
  }
}
