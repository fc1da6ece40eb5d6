/**
 * External command execution
 *
 * Runs git, dvc and tar with a timeout, collecting stdout and stderr. A
 * non-zero exit becomes a {@link CommandFailedError}; a timeout becomes a
 * transient `timeout` error. Secrets passed in `redact` never appear in error
 * messages, and URL credentials are always masked.
 *
 * @example
 * ```typescript
 * const runner = new SpawnProcessRunner({ timeoutMs: 60000 });
 * const { stdout } = await runner.run('git', ['rev-parse', 'HEAD'], { cwd: repoDir });
 * ```
 */

import { spawn } from 'node:child_process';
import {
  CommandFailedError,
  ConfigurationError,
  TransientError,
  errorCode,
  redactUrlCredentials,
  toDatasetError,
} from '../errors/index.js';

export interface RunOptions {
  cwd?: string;
  /** Added to the inherited environment. */
  env?: Record<string, string>;
  timeoutMs?: number;
  /** Values masked in error messages, such as secrets passed as arguments. */
  redact?: readonly string[];
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessResult>;
}

export interface SpawnRunnerConfig {
  timeoutMs: number;
  /** Limit on stdout plus stderr; larger output kills the command. */
  maxOutputBytes?: number;
}

export const DEFAULT_MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Grace period before SIGKILL after SIGTERM
 */
const KILL_GRACE_PERIOD_MS = 5000;

export class SpawnProcessRunner implements ProcessRunner {
  constructor(private readonly config: SpawnRunnerConfig) {}

  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    const timeout = options.timeoutMs ?? this.config.timeoutMs;
    const display = describeCommand(command, args, options.redact);
    const startTime = Date.now();
    const maxOutput = this.config.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;

    return new Promise<ProcessResult>((resolve, reject) => {
      const proc = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let outputBytes = 0;
      let overflowed = false;
      const collect =
        (chunks: Buffer[]) =>
        (chunk: Buffer): void => {
          if (overflowed) return;
          outputBytes += chunk.length;
          if (outputBytes > maxOutput) {
            overflowed = true;
            proc.kill('SIGKILL');
            return;
          }
          chunks.push(chunk);
        };
      proc.stdout.on('data', collect(stdoutChunks));
      proc.stderr.on('data', collect(stderrChunks));

      let timedOut = false;
      let forceKillId: NodeJS.Timeout | undefined;
      const timeoutId =
        timeout > 0
          ? setTimeout(() => {
              timedOut = true;
              proc.kill('SIGTERM');
              forceKillId = setTimeout(() => proc.kill('SIGKILL'), KILL_GRACE_PERIOD_MS);
            }, timeout)
          : undefined;

      const cleanup = (): void => {
        if (timeoutId) clearTimeout(timeoutId);
        if (forceKillId) clearTimeout(forceKillId);
      };

      proc.on('error', (error) => {
        cleanup();
        if (errorCode(error) === 'ENOENT') {
          reject(new ConfigurationError(`Executable not found: ${command}`, { operation: display, cause: error }));
          return;
        }
        reject(toDatasetError(error, display));
      });

      proc.on('close', (exitCode, signal) => {
        cleanup();
        const stdout = Buffer.concat(stdoutChunks).toString('utf8');
        const stderr = redact(Buffer.concat(stderrChunks).toString('utf8'), options.redact);

        if (timedOut) {
          reject(new TransientError('timeout', `Command '${display}' timed out after ${timeout}ms`, { operation: display }));
          return;
        }
        if (overflowed) {
          reject(new CommandFailedError(display, exitCode, `output exceeded ${maxOutput} bytes`));
          return;
        }
        if (exitCode !== 0) {
          const failure = new CommandFailedError(display, exitCode, signal ? `${stderr}\nterminated by ${signal}` : stderr);
          reject(failure);
          return;
        }
        resolve({ exitCode, stdout, stderr, durationMs: Date.now() - startTime });
      });
    });
  }
}

function redact(text: string, secrets: readonly string[] = []): string {
  let result = redactUrlCredentials(text);
  for (const secret of secrets) {
    if (secret.length > 0) {
      result = result.split(secret).join('***');
    }
  }
  return result;
}

/**
 * Printable form of a command line with credentials masked.
 */
export function describeCommand(command: string, args: readonly string[], secrets?: readonly string[]): string {
  return redact([command, ...args].join(' '), secrets);
}
