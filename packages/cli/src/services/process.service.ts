/**
 * Run a child process attached to the user's terminal
 */

import { spawn } from 'child_process';
import { logCommand, logError } from '../logger';

export interface InteractiveRunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface InteractiveResult {
  /** null when the process could not be started or was killed by a signal */
  exitCode: number | null;
  error?: string;
}

export function runInteractive(
  argv: string[],
  options: InteractiveRunOptions = {}
): Promise<InteractiveResult> {
  const [file, ...args] = argv;
  if (!file) {
    return Promise.resolve({ exitCode: null, error: 'No command given' });
  }

  logCommand(argv.join(' '), options.cwd ? { cwd: options.cwd } : undefined);

  return new Promise((resolve) => {
    const child = spawn(file, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: 'inherit',
    });

    child.on('error', (err) => {
      logError(`Failed to start ${file}`, err);
      resolve({ exitCode: null, error: err.message });
    });

    child.on('exit', (code, signal) => {
      resolve(signal ? { exitCode: null, error: `Terminated by ${signal}` } : { exitCode: code });
    });
  });
}
