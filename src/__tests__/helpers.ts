import * as fs from 'fs';
import * as path from 'path';
import { ProcessResult, ProcessRunner, Terminal } from '../core/types';

export function fixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

export interface FakeRunner extends ProcessRunner {
  calls: Array<{ command: string; args: string[] }>;
}

/**
 * Answers `--query` with the given listing and every other call with
 * `applyResult`, recording what it was asked to run.
 */
export function fakeRunner(listing: string, applyResult: ProcessResult = { stdout: '', stderr: '', status: 0 }): FakeRunner {
  const calls: FakeRunner['calls'] = [];
  const runner = (command: string, args: readonly string[]): ProcessResult => {
    calls.push({ command, args: [...args] });
    if (args.length === 1 && args[0] === '--query') {
      return { stdout: listing, stderr: '', status: 0 };
    }
    return applyResult;
  };
  return Object.assign(runner, { calls });
}

export interface CapturedTerminal extends Terminal {
  stdout: string[];
  stderr: string[];
}

export function captureTerminal(columns = 80): CapturedTerminal {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    columns,
    out: text => { stdout.push(text); },
    err: text => { stderr.push(text); }
  };
}
