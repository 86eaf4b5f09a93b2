/**
 * tools/xrandr_runner.ts
 *
 * The real ProcessRunner: runs a program to completion without a shell
 * and captures its output. Tests swap this for a fake that returns
 * canned listings.
 */

import { spawnSync } from 'child_process';
import { ProcessResult, ProcessRunner } from '../core/types';
import { DependencyMissingError } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('tools/xrandr_runner');

export const spawnRunner: ProcessRunner = (command, args): ProcessResult => {
  log.debug({ command, args }, 'Spawning');

  const result = spawnSync(command, [...args], {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe']
  });

  if (result.error) {
    if ('code' in result.error && result.error.code === 'ENOENT') {
      throw new DependencyMissingError(command);
    }
    throw result.error;
  }

  // A signal-terminated child has no status; report it as a failure.
  const status = result.status ?? 1;
  log.debug({ command, status, signal: result.signal }, 'Process exited');

  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    status
  };
};
