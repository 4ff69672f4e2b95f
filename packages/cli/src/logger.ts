/**
 * Debug log for the labkit CLI
 *
 * Entries go to .labkit/debug.log: the working directory's .labkit when one
 * exists, otherwise the home directory's. LABKIT_LOG_DIR overrides both.
 * Console output stays human-facing; this file is for troubleshooting a
 * workshop machine after the fact, so credentials never reach it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'CMD' | 'STDOUT' | 'STDERR';

const LABKIT_DIR = '.labkit';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024;

export const REDACTED = '[REDACTED]';

// OAuth access tokens, bearer headers, refresh tokens in JSON
const SECRET_PATTERNS: RegExp[] = [
  /\bya29\.[\w.-]+/g,
  /\b(Bearer\s+)[\w.~+/-]+=*/gi,
  /("(?:access_token|refresh_token|id_token|client_secret)"\s*:\s*")[^"]*(")/g,
];

let logFilePath: string | null = null;
let sessionStarted = false;

export function getLogPath(): string {
  if (logFilePath) {
    return logFilePath;
  }

  const override = process.env.LABKIT_LOG_DIR;
  const localDir = path.join(process.cwd(), LABKIT_DIR);
  const dir = override || (fs.existsSync(localDir) ? localDir : path.join(homedir(), LABKIT_DIR));

  fs.mkdirSync(dir, { recursive: true });
  logFilePath = path.join(dir, DEBUG_LOG_FILE);
  return logFilePath;
}

/**
 * Forget the resolved path and session (tests point LABKIT_LOG_DIR elsewhere)
 */
export function resetLogger(): void {
  logFilePath = null;
  sessionStarted = false;
}

/**
 * Mask credentials that gcloud or the billing client may echo
 */
export function redactSecrets(text: string): string {
  return SECRET_PATTERNS.reduce(
    (current, pattern) =>
      current.replace(pattern, (_match: string, ...groups: unknown[]) => {
        const [before, after] = groups;
        return typeof before === 'string'
          ? `${before}${REDACTED}${typeof after === 'string' ? after : ''}`
          : REDACTED;
      }),
    text
  );
}

function rotate(logPath: string): void {
  if (!fs.existsSync(logPath) || fs.statSync(logPath).size <= MAX_LOG_SIZE) {
    return;
  }
  const backupPath = `${logPath}.old`;
  fs.rmSync(backupPath, { force: true });
  fs.renameSync(logPath, backupPath);
}

function sessionHeader(): string {
  const rule = '='.repeat(80);
  const args = process.argv.slice(2).join(' ') || 'no arguments';
  return `\n${rule}\n[${new Date().toISOString()}] labkit session started (${args})\n${rule}\n`;
}

function describeData(data: unknown): string {
  if (data instanceof Error) {
    return data.stack ? `\n  Error: ${data.message}\n  Stack: ${data.stack}` : `\n  Error: ${data.message}`;
  }
  if (typeof data === 'object' && data !== null) {
    try {
      return `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
    } catch {
      return '\n  Data: [Could not serialize]';
    }
  }
  return `\n  Data: ${String(data)}`;
}

function writeLog(level: LogLevel, message: string, data?: unknown): void {
  try {
    const logPath = getLogPath();
    let text = '';
    if (!sessionStarted) {
      sessionStarted = true;
      rotate(logPath);
      text += sessionHeader();
    }
    const body = data === undefined ? message : message + describeData(data);
    text += `[${new Date().toISOString()}] [${level}] ${redactSecrets(body)}\n`;
    fs.appendFileSync(logPath, text);
  } catch {
    // Logging must never interrupt the CLI
  }
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

export function logCommand(command: string, data?: Record<string, unknown>): void {
  writeLog('CMD', `Executing: ${command}`, data);
}

/**
 * Record captured command output. Sensitive output (tokens) is replaced by
 * its size so the log still shows that the command printed something.
 */
export function logOutput(
  stream: 'stdout' | 'stderr',
  output: string,
  options: { sensitive?: boolean } = {}
): void {
  const trimmed = output.trim();
  if (!trimmed) {
    return;
  }
  const level = stream === 'stdout' ? 'STDOUT' : 'STDERR';
  writeLog(level, options.sensitive ? `${REDACTED} (${trimmed.length} chars)` : trimmed);
}

export function logFullError(
  context: string,
  error: unknown,
  additionalData?: Record<string, unknown>
): void {
  const details: Record<string, unknown> =
    error instanceof Error
      ? { errorName: error.name, errorMessage: error.message, errorStack: error.stack }
      : { rawError: String(error) };

  writeLog('ERROR', `Error in ${context}`, { context, ...additionalData, ...details });
}

export interface CommandLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
}

/**
 * Logger that tags every entry with the step or command name
 */
export function createCommandLogger(name: string): CommandLogger {
  const tag = (message: string) => `[${name}] ${message}`;
  return {
    info: (message, data) => logInfo(tag(message), data),
    warn: (message, data) => logWarn(tag(message), data),
    error: (message, data) => logError(tag(message), data),
    debug: (message, data) => logDebug(tag(message), data),
  };
}
