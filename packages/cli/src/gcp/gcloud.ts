/**
 * Thin wrapper around the gcloud CLI
 *
 * Arguments are passed as argv (no shell), so user-typed project IDs never
 * reach a shell parser.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { logCommand, logOutput } from '../logger';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs?: number;
  /** Keep stdout out of the debug log (access tokens) */
  sensitive?: boolean;
}

/**
 * Run a command and capture its output. Rejects on non-zero exit.
 */
export async function runCommand(
  file: string,
  args: string[],
  options: RunOptions = {}
): Promise<CommandOutput> {
  logCommand(`${file} ${args.join(' ')}`);
  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      encoding: 'utf8',
      timeout: options.timeoutMs,
      maxBuffer: 10 * 1024 * 1024,
    });
    logOutput('stdout', stdout, { sensitive: options.sensitive });
    logOutput('stderr', stderr);
    return { stdout, stderr };
  } catch (error) {
    const output = commandErrorOutput(error);
    logOutput('stdout', output.stdout, { sensitive: options.sensitive });
    logOutput('stderr', output.stderr);
    throw error;
  }
}

export function runGcloud(args: string[], options?: RunOptions): Promise<CommandOutput> {
  return runCommand('gcloud', args, options);
}

/**
 * stdout/stderr attached to a failed execFile call
 */
export function commandErrorOutput(error: unknown): CommandOutput {
  const output: CommandOutput = { stdout: '', stderr: '' };
  if (error && typeof error === 'object') {
    if ('stdout' in error && error.stdout) {
      output.stdout = String(error.stdout);
    }
    if ('stderr' in error && error.stderr) {
      output.stderr = String(error.stderr);
    }
  }
  return output;
}

/**
 * Most useful text from a failed command: stderr, then stdout, then the error itself
 */
export function commandErrorMessage(error: unknown): string {
  const { stdout, stderr } = commandErrorOutput(error);
  return stderr.trim() || stdout.trim() || String(error);
}
