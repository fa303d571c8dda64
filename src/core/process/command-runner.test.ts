/**
 * Tests for runCommand and isToolAvailable
 */

import {
  isToolAvailable,
  runCommand,
  SPAWN_FAILURE_EXIT_CODE,
} from './command-runner';
import { createFakeRunner } from '../../../test-config/mocks/test-helpers';

describe('runCommand', () => {
  it('should resolve with the exit code of the process', async () => {
    const result = await runCommand(
      process.execPath,
      ['-e', 'process.exit(3)'],
      { stdio: 'ignore' },
    );

    expect(result).toEqual({ exitCode: 3 });
  });

  it('should resolve with zero for a successful process', async () => {
    const result = await runCommand(process.execPath, ['-e', ''], {
      stdio: 'ignore',
    });

    expect(result.exitCode).toBe(0);
  });

  it('should report a missing binary as exit code 127', async () => {
    const result = await runCommand('pbak-no-such-tool', [], { stdio: 'ignore' });

    expect(result.exitCode).toBe(SPAWN_FAILURE_EXIT_CODE);
    expect(result.error).toContain('ENOENT');
  });
});

describe('isToolAvailable', () => {
  it('should ask the runner for the version quietly', async () => {
    const { run, calls } = createFakeRunner([0]);

    await expect(isToolAvailable('rsync', ['--version'], run)).resolves.toBe(true);
    expect(calls).toEqual([{ command: 'rsync', args: ['--version'] }]);
    expect(run).toHaveBeenCalledWith('rsync', ['--version'], { stdio: 'ignore' });
  });

  it('should treat a non-zero version exit as installed', async () => {
    const { run } = createFakeRunner([1]);

    await expect(isToolAvailable('immich-go', ['version'], run)).resolves.toBe(true);
  });

  it('should report a tool that cannot be spawned', async () => {
    const { run } = createFakeRunner([SPAWN_FAILURE_EXIT_CODE]);

    await expect(isToolAvailable('immich-go', ['version'], run)).resolves.toBe(false);
  });
});
