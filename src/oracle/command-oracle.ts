import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';

import type { OcrOracle } from '../processors/types.js';

import { describeError, externalServiceError, processingTimeout } from '../errors.js';
import { truncateTail } from '../utils.js';

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface CommandOracleOptions {
  command: string;
  args?: readonly string[];
  /** Kill the command and fail with processing_timeout after this many ms. */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  spawnImpl?: SpawnFn;
}

export const DEFAULT_ORACLE_TIMEOUT_MS = 30_000;
const STDERR_TAIL_CHARS = 2000;

/**
 * OCR oracle backed by an external program: image bytes go to stdin,
 * recognized text is read from stdout.
 */
export class CommandOracle implements OcrOracle {
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly timeoutMs: number;
  private readonly env?: NodeJS.ProcessEnv;
  private readonly spawnImpl: SpawnFn;

  constructor(options: CommandOracleOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;
    this.env = options.env;
    this.spawnImpl = options.spawnImpl ?? spawn;
  }

  classification(image: Buffer): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const context = { command: this.command, args: [...this.args] };
      let child: ChildProcess;
      try {
        child = this.spawnImpl(this.command, this.args, {
          stdio: ['pipe', 'pipe', 'pipe'],
          env: this.env ?? process.env,
        });
      } catch (e) {
        reject(externalServiceError('OCR command could not be started', { ...context, error: describeError(e) }, e));
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let stdinError: string | undefined;
      let settled = false;

      const settle = (fn: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        fn();
      };

      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        settle(() => { reject(processingTimeout(this.timeoutMs, context)); });
      }, this.timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => { stdout.push(chunk); });
      child.stderr?.on('data', (chunk: Buffer) => { stderr.push(chunk); });
      child.on('error', (error: Error) => {
        settle(() => {
          reject(externalServiceError('OCR command failed', { ...context, error: error.message }, error));
        });
      });
      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        settle(() => {
          if (code === 0) {
            resolve(Buffer.concat(stdout).toString('utf8').replace(/[\r\n]+$/, ''));
            return;
          }
          reject(externalServiceError(`OCR command exited with ${code === null ? `signal ${String(signal)}` : `code ${String(code)}`}`, {
            ...context,
            exitCode: code,
            signal,
            stderr: truncateTail(Buffer.concat(stderr).toString('utf8'), STDERR_TAIL_CHARS),
            stdinError,
          }));
        });
      });
      // A child that exits before draining stdin raises EPIPE here; the exit status carries the failure.
      child.stdin?.on('error', (error: Error) => { stdinError = error.message; });
      child.stdin?.end(image);
    });
  }
}
