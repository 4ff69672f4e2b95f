import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs/promises';

const { execFileMock } = vi.hoisted(() => ({ execFileMock: vi.fn() }));

vi.mock('child_process', () => ({ execFile: execFileMock }));

import {
  checkGcloudAuth,
  createProject,
  describeCreateError,
  describeProject,
  findProjectByPrefix,
  formatLabels,
  setActiveProject,
} from '../gcp/projects';
import { enableApi, getApiLibraryUrl } from '../gcp/apis';
import { getLogPath } from '../logger';

type Reply = { stdout?: string } | { fail: { stderr?: string; code?: string } };
type Callback = (error: Error | null, result?: { stdout: string; stderr: string }) => void;

/**
 * Answer execFile calls; the handler sees the argv after the binary
 */
function mockCommands(handler: (file: string, args: string[]) => Reply) {
  execFileMock.mockImplementation((file: string, args: string[], _options: unknown, callback: Callback) => {
    const reply = handler(file, args);
    if ('fail' in reply) {
      const error = Object.assign(new Error(`Command failed: ${file} ${args.join(' ')}`), {
        stdout: '',
        stderr: reply.fail.stderr ?? '',
        code: reply.fail.code ?? 1,
      });
      callback(error);
    } else {
      callback(null, { stdout: reply.stdout ?? '', stderr: '' });
    }
  });
}

function calledArgs(): string[][] {
  return execFileMock.mock.calls.map((call) => [call[0], ...call[1]]);
}

beforeEach(() => {
  execFileMock.mockReset();
});

describe('checkGcloudAuth', () => {
  it('should return the active account when a token can be printed', async () => {
    mockCommands((_file, args) =>
      args[0] === 'auth' ? { stdout: 'ya29.placeholder\n' } : { stdout: 'learner@example.com\n' }
    );

    await expect(checkGcloudAuth()).resolves.toEqual({ account: 'learner@example.com' });
    expect(calledArgs()).toEqual([
      ['gcloud', 'auth', 'print-access-token'],
      ['gcloud', 'config', 'get-value', 'account'],
    ]);
  });

  it('should keep the access token out of the debug log', async () => {
    mockCommands((_file, args) =>
      args[0] === 'auth' ? { stdout: 'ya29.test-token-for-log-check\n' } : { stdout: 'learner@example.com\n' }
    );

    await checkGcloudAuth();

    const log = await fs.readFile(getLogPath(), 'utf-8');
    expect(log).toContain('Executing: gcloud auth print-access-token');
    expect(log).not.toContain('test-token-for-log-check');
  });

  it('should return null when no token is available', async () => {
    mockCommands(() => ({ fail: { stderr: 'ERROR: (gcloud.auth.print-access-token) no credentials' } }));

    await expect(checkGcloudAuth()).resolves.toBeNull();
    expect(execFileMock).toHaveBeenCalledTimes(1);
  });

  it('should treat an unset account as unknown', async () => {
    mockCommands((_file, args) => (args[0] === 'auth' ? { stdout: 'token' } : { stdout: '(unset)\n' }));

    await expect(checkGcloudAuth()).resolves.toEqual({ account: '' });
  });
});

describe('findProjectByPrefix', () => {
  it('should return the first matching project', async () => {
    mockCommands(() => ({ stdout: 'waybackhome-abc123def456ghi789\n' }));

    await expect(findProjectByPrefix('waybackhome')).resolves.toBe('waybackhome-abc123def456ghi789');
    expect(calledArgs()[0]).toEqual([
      'gcloud',
      'projects',
      'list',
      '--filter=projectId:waybackhome*',
      '--format=value(projectId)',
      '--limit=1',
    ]);
  });

  it('should return null when nothing matches', async () => {
    mockCommands(() => ({ stdout: '\n' }));

    await expect(findProjectByPrefix('waybackhome')).resolves.toBeNull();
  });

  it('should return null when listing fails', async () => {
    mockCommands(() => ({ fail: { stderr: 'ERROR: permission denied' } }));

    await expect(findProjectByPrefix('waybackhome')).resolves.toBeNull();
  });
});

describe('createProject', () => {
  it('should pass labels and --quiet', async () => {
    mockCommands(() => ({ stdout: '' }));

    await expect(createProject('waybackhome-abc', { environment: 'development' })).resolves.toEqual({
      success: true,
    });
    expect(calledArgs()[0]).toEqual([
      'gcloud',
      'projects',
      'create',
      'waybackhome-abc',
      '--labels=environment=development',
      '--quiet',
    ]);
  });

  it('should omit --labels when there are none', async () => {
    mockCommands(() => ({ stdout: '' }));

    await createProject('production-ready-ai-abc');
    expect(calledArgs()[0]).toEqual(['gcloud', 'projects', 'create', 'production-ready-ai-abc', '--quiet']);
  });

  it('should explain a taken project ID', async () => {
    mockCommands(() => ({
      fail: { stderr: 'ERROR: (gcloud.projects.create) Project creation failed. The project ID you specified is already in use by another project.\nALREADY_EXISTS' },
    }));

    await expect(createProject('taken-project')).resolves.toEqual({
      success: false,
      error: 'Project ID already exists. Choose a different ID.',
    });
  });
});

describe('describeCreateError', () => {
  it('should map permission errors', () => {
    expect(describeCreateError('PERMISSION_DENIED: caller lacks resourcemanager.projects.create')).toBe(
      'Permission denied. You may need to be in an organization with project creation rights.'
    );
  });

  it('should extract details from invalid argument errors', () => {
    expect(
      describeCreateError('Request contains an invalid argument. details: "field projectId is too long"')
    ).toBe('field projectId is too long');
  });

  it('should fall back to the first line without the ERROR marker', () => {
    expect(describeCreateError('ERROR: quota exceeded for projects\nmore detail')).toBe(
      'quota exceeded for projects'
    );
  });

  it('should have a default message for empty output', () => {
    expect(describeCreateError('')).toBe('Failed to create project. Check gcloud configuration.');
  });
});

describe('describeProject and setActiveProject', () => {
  it('should report whether the project can be described', async () => {
    mockCommands((_file, args) => (args[2] === 'known-project' ? { stdout: 'projectId: known-project' } : { fail: {} }));

    await expect(describeProject('known-project')).resolves.toBe(true);
    await expect(describeProject('other-project')).resolves.toBe(false);
  });

  it('should set the project quietly', async () => {
    mockCommands(() => ({ stdout: '' }));

    await expect(setActiveProject('my-project-1')).resolves.toBe(true);
    expect(calledArgs()[0]).toEqual(['gcloud', 'config', 'set', 'project', 'my-project-1', '--quiet']);
  });

  it('should return false when gcloud refuses', async () => {
    mockCommands(() => ({ fail: { stderr: 'ERROR: project not found' } }));

    await expect(setActiveProject('my-project-1')).resolves.toBe(false);
  });
});

describe('enableApi', () => {
  it('should enable the API for the project', async () => {
    mockCommands(() => ({ stdout: '' }));

    await expect(enableApi('my-project-1', 'cloudbilling.googleapis.com')).resolves.toEqual({ success: true });
    expect(calledArgs()[0]).toEqual([
      'gcloud',
      'services',
      'enable',
      'cloudbilling.googleapis.com',
      '--project',
      'my-project-1',
      '--quiet',
    ]);
    expect(execFileMock.mock.calls[0][2]).toMatchObject({ timeout: 60_000 });
  });

  it('should report a missing gcloud binary', async () => {
    mockCommands(() => ({ fail: { code: 'ENOENT' } }));

    await expect(enableApi('my-project-1', 'cloudbilling.googleapis.com')).resolves.toEqual({
      success: false,
      error: "'gcloud' command not found",
    });
  });

  it('should pass through gcloud errors', async () => {
    mockCommands(() => ({ fail: { stderr: 'ERROR: billing account required' } }));

    await expect(enableApi('my-project-1', 'cloudbilling.googleapis.com')).resolves.toEqual({
      success: false,
      error: 'ERROR: billing account required',
    });
  });
});

describe('helpers', () => {
  it('should format labels for gcloud', () => {
    expect(formatLabels({ environment: 'development', team: 'devrel' })).toBe('environment=development,team=devrel');
    expect(formatLabels({})).toBe('');
  });

  it('should build the API library URL', () => {
    expect(getApiLibraryUrl('my-project-1', 'cloudbilling.googleapis.com')).toBe(
      'https://console.cloud.google.com/apis/library/cloudbilling.googleapis.com?project=my-project-1'
    );
  });
});
