/**
 * Subprocess execution for the external PostgreSQL utilities
 */

import { spawn } from 'child_process';

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  success: boolean;
}

export interface ProcessOptions {
  /** Added to a copy of the parent environment for this child only */
  env?: Record<string, string>;
}

/**
 * Runs a command to completion and collects its output. Resolves for any
 * exit status; rejects only when the process cannot be started. No timeout
 * is applied.
 */
export function runProcess(
  command: string,
  args: string[],
  options: ProcessOptions = {}
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null) => {
      resolve({
        exitCode: code,
        stdout,
        stderr,
        success: code === 0
      });
    });

    child.on('error', (error: Error) => {
      reject(error);
    });
  });
}
