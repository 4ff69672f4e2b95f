import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { InvalidArgumentError } from 'commander';

const { gateway } = vi.hoisted(() => ({
  gateway: {
    getProjectBillingInfo: vi.fn(async (_projectId: string) => ({
      billingAccountName: 'billingAccounts/000000-AAAAAA-000001',
      billingEnabled: true,
    })),
    listBillingAccounts: vi.fn(async () => []),
    countLinkedProjects: vi.fn(async (_accountName: string) => 0),
    updateProjectBillingInfo: vi.fn(async (_projectId: string, _accountName: string) => undefined),
    renameBillingAccount: vi.fn(async (_accountName: string, _displayName: string) => undefined),
  },
}));

vi.mock('../billing/gateway', () => ({ createBillingGateway: () => gateway }));

import { SetupError } from '../errors';
import { reportFailure } from '../commands/failure';
import { parsePositiveInt } from '../commands/init';
import { projectIdCommand } from '../commands/project-id';
import { enableBillingCommand } from '../commands/enable-billing';
import { PROJECT_FILE_ENV } from '../services/billing-helper.service';
import { createTempDir, cleanupTempDir } from './helpers';

describe('parsePositiveInt', () => {
  it('should accept positive integers', () => {
    expect(parsePositiveInt('1')).toBe(1);
    expect(parsePositiveInt('25')).toBe(25);
  });

  it.each(['0', '-3', '2.5', 'ten', ''])('should reject %j', (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe('reportFailure', () => {
  let output: string[];

  beforeEach(() => {
    output = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the exit code carried by a setup error', () => {
    const code = reportFailure(new SetupError('Failed to set active project.', { exitCode: 3 }), 'init');

    expect(code).toBe(3);
    expect(output.some((line) => line.includes('Error: Failed to set active project.'))).toBe(true);
  });

  it('should print the hint under the message', () => {
    reportFailure(
      new SetupError('Not authenticated with Google Cloud.', { hint: 'Please run: gcloud auth login' }),
      'init'
    );

    expect(output).toContain('Please run: gcloud auth login');
  });

  it('should map unexpected errors to exit code 1', () => {
    expect(reportFailure(new TypeError('boom'), 'init')).toBe(1);
    expect(output.some((line) => line.includes('Unexpected error: boom'))).toBe(true);
  });
});

describe('project-id command', () => {
  let tempDir: string;
  let printed: string[];

  beforeEach(async () => {
    tempDir = await createTempDir();
    printed = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      printed.push(args.map(String).join(' '));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await cleanupTempDir(tempDir);
  });

  it('should print the stored project ID', async () => {
    const file = path.join(tempDir, 'project_id.txt');
    await fs.writeFile(file, 'production-ready-ai-x1y2z3\n');

    await projectIdCommand.parseAsync(['--project-file', file], { from: 'user' });

    expect(printed).toEqual(['production-ready-ai-x1y2z3']);
    expect(process.exitCode).toBeUndefined();
  });

  it('should fail with exit code 1 when the file is missing', async () => {
    await projectIdCommand.parseAsync(['--project-file', path.join(tempDir, 'missing.txt')], { from: 'user' });

    expect(process.exitCode).toBe(1);
  });
});

describe('enable-billing command', () => {
  let tempDir: string;
  let previousFile: string | undefined;

  beforeEach(async () => {
    tempDir = await createTempDir();
    previousFile = process.env[PROJECT_FILE_ENV];
    gateway.getProjectBillingInfo.mockClear();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (previousFile === undefined) {
      delete process.env[PROJECT_FILE_ENV];
    } else {
      process.env[PROJECT_FILE_ENV] = previousFile;
    }
    process.exitCode = undefined;
    await cleanupTempDir(tempDir);
  });

  // Commander keeps option values between parses, so the flag case runs last
  it('should read the project file named by the environment', async () => {
    const file = path.join(tempDir, 'env_project_id.txt');
    await fs.writeFile(file, 'waybackhome-fromenv0000000001\n');
    process.env[PROJECT_FILE_ENV] = file;

    await enableBillingCommand.parseAsync([], { from: 'user' });

    expect(gateway.getProjectBillingInfo).toHaveBeenCalledWith('waybackhome-fromenv0000000001');
    expect(process.exitCode).toBe(0);
  });

  it('should fail when the environment names a missing file', async () => {
    process.env[PROJECT_FILE_ENV] = path.join(tempDir, 'missing.txt');

    await enableBillingCommand.parseAsync([], { from: 'user' });

    expect(gateway.getProjectBillingInfo).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it('should prefer --project-file over the environment', async () => {
    const flagFile = path.join(tempDir, 'flag_project_id.txt');
    await fs.writeFile(flagFile, 'waybackhome-fromflag000000001\n');
    process.env[PROJECT_FILE_ENV] = path.join(tempDir, 'missing.txt');

    await enableBillingCommand.parseAsync(['--project-file', flagFile], { from: 'user' });

    expect(gateway.getProjectBillingInfo).toHaveBeenCalledWith('waybackhome-fromflag000000001');
    expect(process.exitCode).toBe(0);
  });
});
