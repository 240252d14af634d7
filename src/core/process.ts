/**
 * Run an external tool and wait for it to exit
 */

import { spawn } from 'child_process';

export interface RunOptions {
  /** Written to the tool's standard input */
  input?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Receives whatever the tool writes to stderr */
  onStderr?: (text: string) => void;
  /** Kill the tool after this many milliseconds. Default: 60000 */
  timeout?: number;
}

/**
 * Spawn a command and collect its standard output
 *
 * Rejects if the command cannot be started, times out or exits non-zero.
 */
export function runTool(
  command: string,
  args: string[],
  options: RunOptions = {},
): Promise<Buffer> {
  const { input, cwd, env, onStderr, timeout = 60000 } = options;

  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    const errorChunks: Buffer[] = [];

    const proc = spawn(command, args, {
      cwd,
      env,
      stdio: [input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
    });

    const timer = setTimeout(() => {
      proc.kill();
      reject(new Error(`${command} timed out after ${timeout} ms`));
    }, timeout);

    proc.stdout?.on('data', (chunk: Buffer) => chunks.push(chunk));
    proc.stderr?.on('data', (chunk: Buffer) => errorChunks.push(chunk));

    proc.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });

    proc.on('close', (code) => {
      clearTimeout(timer);
      const stderr = Buffer.concat(errorChunks).toString().trim();
      if (stderr) onStderr?.(stderr);

      if (code !== 0) {
        reject(new Error(stderr || `${command} exited with code ${code}`));
      } else {
        resolve(Buffer.concat(chunks));
      }
    });

    if (input !== undefined && proc.stdin) {
      // EPIPE when the tool exits early; 'close' reports the real cause
      proc.stdin.on('error', (err) => reject(err));
      proc.stdin.write(input);
      proc.stdin.end();
    }
  });
}
