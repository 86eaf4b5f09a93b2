/**
 * tools/xrandr_client.ts
 *
 * Everything that talks to the xrandr binary goes through here:
 * the read-only query and the apply call. The ProcessRunner is
 * injected so the rest of the program never spawns anything itself.
 */

import { Output, ProcessResult, ProcessRunner } from '../core/types';
import { DelegatedError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { connectedOnly, parseQuery } from './query_parser';
import { spawnRunner } from './xrandr_runner';

const log = scopedLogger('tools/xrandr_client');

export const QUERY_ARGS = ['--query'] as const;

/** Render an argument list the way a user would type it. */
export function formatCommandLine(binary: string, args: readonly string[]): string {
  return [binary, ...args].join(' ');
}

export class XrandrClient {
  constructor(
    readonly binary = 'xrandr',
    private readonly runner: ProcessRunner = spawnRunner
  ) {}

  /**
   * Raw `xrandr --query` stdout.
   * @throws DependencyMissingError when the binary cannot be found
   * @throws DelegatedError when it exits non-zero
   */
  query(): string {
    const result = this.runner(this.binary, QUERY_ARGS);
    if (result.status !== 0) {
      const commandLine = formatCommandLine(this.binary, QUERY_ARGS);
      log.debug({ status: result.status }, 'Query failed');
      throw new DelegatedError(commandLine, result.status, result.stderr);
    }
    return result.stdout;
  }

  /** Every listed output, connected or not. */
  outputs(): Output[] {
    return parseQuery(this.query());
  }

  connectedOutputs(): Output[] {
    const connected = connectedOnly(this.outputs());
    log.info({ outputs: connected.map(o => o.name) }, 'Connected outputs');
    return connected;
  }

  /** Run an apply command. The result is returned untouched, failures included. */
  apply(args: readonly string[]): ProcessResult {
    log.info({ args }, 'Applying layout');
    const result = this.runner(this.binary, args);
    if (result.status !== 0) {
      log.debug({ status: result.status }, 'xrandr reported failure');
    }
    return result;
  }
}
