import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { vi } from 'vitest';
import type { Prompter } from '../services/prompt.service';

export async function createTempDir(): Promise<string> {
  const tempDir = path.join(tmpdir(), `labkit-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(tempDir, { recursive: true });
  return tempDir;
}

export async function cleanupTempDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(() => true).catch(() => false);
}

/**
 * Prompter that answers from queues; an exhausted queue falls back to the
 * prompt's default, the way pressing Enter would
 */
export function createFakePrompter(answers: { confirm?: boolean[]; input?: string[] } = {}) {
  const confirmAnswers = [...(answers.confirm ?? [])];
  const inputAnswers = [...(answers.input ?? [])];

  const prompter = {
    confirm: vi.fn(async (_message: string, defaultValue: boolean) => confirmAnswers.shift() ?? defaultValue),
    input: vi.fn(async (_message: string, defaultValue?: string) => inputAnswers.shift() ?? defaultValue ?? ''),
  } satisfies Prompter;

  return prompter;
}

/**
 * Error shaped like a gRPC ServiceError from the Cloud client libraries
 */
export function grpcError(code: number, details: string): Error {
  return Object.assign(new Error(`${code} ${details}`), { code, details });
}
