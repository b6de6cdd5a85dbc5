// src/core/process/runner.ts
import { spawn, type ChildProcessByStdio } from 'node:child_process';
import type { Readable } from 'node:stream';

export interface ProcessResult {
  stdout: string;
  stderr: string;
  /** null when the process timed out or never started */
  exitCode: number | null;
  timedOut: boolean;
  spawnError?: string;
  durationMs: number;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], timeoutMs: number): Promise<ProcessResult>;
}

/**
 * Runs a command with a discrete argument list (no shell) and a hard
 * wall-clock deadline. Output is captured in full; there is no size cap.
 */
export class ChildProcessRunner implements ProcessRunner {
  run(command: string, args: readonly string[], timeoutMs: number): Promise<ProcessResult> {
    const startedAt = Date.now();

    return new Promise<ProcessResult>((resolve) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let timer: NodeJS.Timeout | undefined;
      let timedOut = false;
      let settled = false;

      const finish = (exitCode: number | null, spawnError?: string): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
          exitCode: timedOut ? null : exitCode,
          timedOut,
          spawnError,
          durationMs: Date.now() - startedAt,
        });
      };

      let child: ChildProcessByStdio<null, Readable, Readable>;
      try {
        child = spawn(command, [...args], {
          shell: false,
          windowsHide: true,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        finish(null, `Failed to start ${command}: ${error instanceof Error ? error.message : String(error)}`);
        return;
      }

      timer = setTimeout(() => {
        timedOut = true;
        // A grandchild may still hold the pipes open after the kill; drop
        // them once the child itself has exited so 'close' can fire.
        const releasePipes = (): void => {
          child.stdout.destroy();
          child.stderr.destroy();
        };
        if (child.exitCode !== null || child.signalCode !== null) {
          releasePipes();
          return;
        }
        child.once('exit', releasePipes);
        child.kill('SIGKILL');
      }, timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

      child.on('error', (error: NodeJS.ErrnoException) => {
        // Once started, the outcome is reported through 'close'
        if (child.pid !== undefined) return;
        finish(null, `Failed to start ${command}: ${error.code ?? error.message}`);
      });

      child.on('close', (code) => finish(code));
    });
  }
}

export const processRunner = new ChildProcessRunner();

export function isSuccessful(result: ProcessResult): boolean {
  return !result.timedOut && result.spawnError === undefined && result.exitCode === 0;
}
