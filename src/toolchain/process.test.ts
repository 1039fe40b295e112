/**
 * Tests for the execa-backed command runner.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

import { execa } from 'execa';
import { ExecaCommandRunner, formatCommand } from './process.js';

const mockExeca = vi.mocked(execa);

function createMockExecaResult(options: {
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
}): Awaited<ReturnType<typeof execa>> {
  return {
    exitCode: options.exitCode,
    stdout: options.stdout,
    stderr: options.stderr,
    failed: options.exitCode !== 0,
    timedOut: false,
    killed: false,
    command: 'protoc',
    escapedCommand: 'protoc',
    all: undefined,
    stdio: [null, options.stdout, options.stderr],
    ipcOutput: [],
    pipedFrom: [],
  } as unknown as Awaited<ReturnType<typeof execa>>;
}

function createSpawnError(code: string, message: string): Awaited<ReturnType<typeof execa>> {
  const error = Object.assign(new Error(message), {
    code,
    exitCode: undefined,
    stdout: '',
    stderr: '',
    failed: true,
  });
  return error as unknown as Awaited<ReturnType<typeof execa>>;
}

describe('formatCommand', () => {
  it('should join the executable and arguments with spaces', () => {
    expect(formatCommand('git', ['pull', 'origin', 'master'])).toBe('git pull origin master');
  });

  it('should return the bare executable when there are no arguments', () => {
    expect(formatCommand('protoc', [])).toBe('protoc');
  });
});

describe('ExecaCommandRunner', () => {
  const runner = new ExecaCommandRunner();

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should pass cwd and disable rejection', async () => {
    mockExeca.mockResolvedValueOnce(createMockExecaResult({ exitCode: 0, stdout: '', stderr: '' }));

    await runner.run('protoc', ['a.proto', '--python_out=/tmp/out'], { cwd: '/tmp/protos' });

    expect(mockExeca).toHaveBeenCalledWith('protoc', ['a.proto', '--python_out=/tmp/out'], {
      cwd: '/tmp/protos',
      reject: false,
    });
  });

  it('should return captured output of a successful process', async () => {
    mockExeca.mockResolvedValueOnce(
      createMockExecaResult({ exitCode: 0, stdout: 'Already up to date.', stderr: '' })
    );

    const output = await runner.run('git', ['pull', 'origin', 'master'], { cwd: '/repo' });

    expect(output).toEqual({
      command: 'git pull origin master',
      exitCode: 0,
      stdout: 'Already up to date.',
      stderr: '',
    });
  });

  it('should return the exit code and stderr of a failing process', async () => {
    mockExeca.mockResolvedValueOnce(
      createMockExecaResult({ exitCode: 1, stdout: '', stderr: 'a.proto:3:1: Expected ";".' })
    );

    const output = await runner.run('protoc', ['a.proto'], { cwd: '/repo' });

    expect(output.exitCode).toBe(1);
    expect(output.stderr).toBe('a.proto:3:1: Expected ";".');
  });

  it('should report a missing executable with an undefined exit code', async () => {
    mockExeca.mockResolvedValueOnce(createSpawnError('ENOENT', 'spawn protoc ENOENT'));

    const output = await runner.run('protoc', ['a.proto'], { cwd: '/repo' });

    expect(output.exitCode).toBeUndefined();
    expect(output.stderr).toBe(
      'protoc: command not found. Please ensure it is installed and on PATH.'
    );
  });

  it('should keep the message of other spawn failures', async () => {
    mockExeca.mockResolvedValueOnce(createSpawnError('EACCES', 'spawn protoc EACCES'));

    const output = await runner.run('protoc', [], { cwd: '/repo' });

    expect(output.exitCode).toBeUndefined();
    expect(output.stderr).toBe('spawn protoc EACCES');
  });

  it('should convert a rejected promise into an output without exit code', async () => {
    const error = new Error('spawn git ENOENT');
    (error as NodeJS.ErrnoException).code = 'ENOENT';
    mockExeca.mockRejectedValueOnce(error);

    const output = await runner.run('git', ['clone'], { cwd: '/repo' });

    expect(output).toEqual({
      command: 'git clone',
      exitCode: undefined,
      stdout: '',
      stderr: 'git: command not found. Please ensure it is installed and on PATH.',
    });
  });
});
