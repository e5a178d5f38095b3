/**
 * Child process execution with captured output and cooperative kill.
 *
 * Each stage script and each per-record invocation is a separate child
 * process, so a crashing script cannot take the controller down with it.
 */

import { spawn } from "node:child_process";

/** How long to wait for stdio to drain after the child exited */
const STDIO_DRAIN_MS = 1000;

export interface ProcessRequest {
  command: string;
  args: readonly string[];
  /** Written to the child's stdin, which is then closed */
  stdin?: string;
  /** Added to the inherited environment */
  env?: Readonly<Record<string, string>>;
  cwd?: string;
  signal?: AbortSignal;
  /** SIGTERM -> SIGKILL delay after an abort (default 5000) */
  killGraceMs?: number;
}

export interface ProcessResult {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  /** Raw bytes; decoded by whoever reads them as a list */
  readonly stdout: Buffer;
  readonly stderr: string;
  /** The abort signal fired while the child was running */
  readonly cancelled: boolean;
  /** The child could not be started, or its stdin failed */
  readonly spawnError?: Error;
}

/**
 * Run a command to completion. Never rejects: failures to start are
 * reported through `spawnError`.
 */
export function runProcess(request: ProcessRequest): Promise<ProcessResult> {
  return new Promise((resolve) => {
    if (request.signal?.aborted) {
      resolve({ exitCode: null, signal: null, stdout: Buffer.alloc(0), stderr: "", cancelled: true });
      return;
    }

    const child = spawn(request.command, [...request.args], {
      cwd: request.cwd,
      env: { ...process.env, ...request.env },
      stdio: ["pipe", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let cancelled = false;
    let settled = false;
    let spawnError: Error | undefined;
    let killTimer: NodeJS.Timeout | undefined;
    let drainTimer: NodeJS.Timeout | undefined;

    const onAbort = (): void => {
      cancelled = true;
      child.kill("SIGTERM");
      killTimer = setTimeout(() => child.kill("SIGKILL"), request.killGraceMs ?? 5000);
    };

    const finish = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
      if (settled) return;
      settled = true;
      clearTimeout(killTimer);
      clearTimeout(drainTimer);
      request.signal?.removeEventListener("abort", onAbort);
      resolve({
        exitCode,
        signal,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        cancelled,
        ...(spawnError ? { spawnError } : {}),
      });
    };

    request.signal?.addEventListener("abort", onAbort, { once: true });

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err) => {
      spawnError = err;
      if (child.pid === undefined) {
        finish(null, null);
      }
    });

    // A grandchild holding our pipes open must not keep us waiting forever
    child.on("exit", (code, signal) => {
      drainTimer = setTimeout(() => {
        child.stdout.destroy();
        child.stderr.destroy();
        finish(code, signal);
      }, STDIO_DRAIN_MS);
    });

    child.on("close", (code, signal) => finish(code, signal));

    child.stdin.on("error", (err: NodeJS.ErrnoException) => {
      // The child may exit without reading its input
      if (err.code !== "EPIPE") {
        spawnError = err;
      }
    });
    child.stdin.end(request.stdin ?? "");
  });
}

/**
 * Last non-empty line of a script's stderr, for failure reasons.
 */
export function lastLine(text: string, maxLength = 500): string {
  const lines = text.split(/\r?\n/).map((line) => line.trim()).filter((line) => line.length > 0);
  const line = lines[lines.length - 1] ?? "";
  return line.length > maxLength ? `${line.slice(0, maxLength)}...` : line;
}
