import kill from 'tree-kill';
import crossSpawn from 'cross-spawn';
import { logger } from './Logger';

export interface ProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdio?: 'inherit' | 'pipe' | 'ignore';
  /** Aborting kills the whole child process tree */
  signal?: AbortSignal;
}

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export class ProcessAbortedError extends Error {
  constructor(command: string) {
    super(`Process '${command}' was cancelled`);
    this.name = 'ProcessAbortedError';
  }
}

export class ProcessUtils {
  /**
   * Runs a command to completion and collects its output. A non-zero exit is
   * reported through `exitCode`, not by rejecting.
   */
  static async execute(
    command: string,
    args: string[] = [],
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    if (options.signal?.aborted) {
      throw new ProcessAbortedError(command);
    }

    return new Promise((resolve, reject) => {
      const child = crossSpawn(command, args, {
        cwd: options.cwd || process.cwd(),
        env: { ...process.env, ...options.env },
        stdio: options.stdio || 'pipe',
      });

      let stdout = '';
      let stderr = '';
      let aborted = false;

      const onAbort = (): void => {
        aborted = true;
        if (child.pid !== undefined) {
          logger.debug(`Cancelling ${command} (pid ${child.pid})`);
          ProcessUtils.killProcess(child.pid, 'SIGTERM').catch(error =>
            logger.debug(`Failed to kill ${command}`, error)
          );
        }
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      if (child.stdout) {
        child.stdout.on('data', (data: Buffer) => {
          stdout += data.toString();
        });
      }

      if (child.stderr) {
        child.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });
      }

      child.on('close', (code: number | null) => {
        options.signal?.removeEventListener('abort', onAbort);
        if (aborted) {
          reject(new ProcessAbortedError(command));
          return;
        }
        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode: code ?? 1,
        });
      });

      child.on('error', (error: Error) => {
        options.signal?.removeEventListener('abort', onAbort);
        reject(new Error(`Process execution failed: ${error.message}`));
      });
    });
  }

  static async killProcess(pid: number, signal: string = 'SIGTERM'): Promise<void> {
    return new Promise((resolve, reject) => {
      kill(pid, signal, (error?: Error) => {
        if (error) {
          reject(new Error(`Failed to kill process ${pid}: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }
}
