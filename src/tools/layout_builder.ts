/**
 * tools/layout_builder.ts
 *
 * Pure translation from a LayoutDirective plus the parsed outputs to the
 * argument list of an xrandr apply command. Nothing here runs a process.
 *
 * Only connected outputs take part. The first one in listing order is
 * the main output, the second one the secondary output.
 */

import { LayoutDirective, Mode, Output, Side } from '../core/types';
import { MissingOutputError, NoCommonModeError, UnknownOutputError, UsageError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { connectedOnly } from './query_parser';

const log = scopedLogger('tools/layout_builder');

const SIDE_FLAGS: Record<Side, string> = {
  left:  '--left-of',
  right: '--right-of',
  above: '--above',
  below: '--below'
};

/** The subcommand word a directive is invoked with, used in messages. */
export function directiveName(directive: LayoutDirective): string {
  switch (directive.kind) {
    case 'clone':          return 'clone';
    case 'side':           return directive.side;
    case 'main-only':      return 'off';
    case 'secondary-only': return 'only';
    case 'row':            return 'row';
  }
}

function requireOutputs(directive: string, outputs: Output[], count: number): void {
  if (outputs.length < count) {
    throw new MissingOutputError(directive, count, outputs.length);
  }
}

function resolution(mode: Pick<Mode, 'width' | 'height'>): string {
  return `${mode.width}x${mode.height}`;
}

function offArgs(outputs: Output[]): string[] {
  return outputs.flatMap(o => ['--output', o.name, '--off']);
}

// ---------------------------------------------------------------------------
// clone
// ---------------------------------------------------------------------------

/**
 * The main output's preferred mode when every other output can show it,
 * otherwise the largest resolution they all share.
 */
export function pickCloneResolution(main: Output, others: Output[]): string {
  const supports = (output: Output, res: string): boolean =>
    output.modes.some(m => resolution(m) === res);

  const own = main.modes.find(m => m.preferred) ?? main.modes[0];
  if (own && others.every(o => supports(o, resolution(own)))) {
    return resolution(own);
  }

  const common = main.modes
    .filter(m => others.every(o => supports(o, resolution(m))))
    .sort((a, b) => b.width - a.width || b.height - a.height);

  if (common.length === 0) {
    throw new NoCommonModeError([main, ...others].map(o => o.name));
  }
  return resolution(common[0]);
}

function cloneArgs(outputs: Output[]): string[] {
  requireOutputs('clone', outputs, 2);
  const [main, ...others] = outputs;
  const mode = pickCloneResolution(main, others);
  log.info({ mode, outputs: outputs.length }, 'Cloning');

  return [
    '--output', main.name, '--mode', mode,
    ...others.flatMap(o => ['--output', o.name, '--mode', mode, '--same-as', main.name])
  ];
}

// ---------------------------------------------------------------------------
// left / right / above / below
// ---------------------------------------------------------------------------

function sideArgs(side: Side, outputs: Output[]): string[] {
  requireOutputs(side, outputs, 2);
  const [main, secondary, ...rest] = outputs;
  if (rest.length > 0) {
    log.debug({ ignored: rest.map(o => o.name) }, 'More than two outputs connected; leaving the rest as they are');
  }

  return [
    '--output', main.name, '--auto',
    '--output', secondary.name, '--auto', SIDE_FLAGS[side], main.name
  ];
}

// ---------------------------------------------------------------------------
// off / only
// ---------------------------------------------------------------------------

function singleOutputArgs(directive: string, outputs: Output[], index: number): string[] {
  requireOutputs(directive, outputs, index + 1);
  const keep = outputs[index];
  return [
    '--output', keep.name, '--auto',
    ...offArgs(outputs.filter(o => o !== keep))
  ];
}

// ---------------------------------------------------------------------------
// row
// ---------------------------------------------------------------------------

interface RowEntry {
  output: Output;
  primary: boolean;
}

function resolveRowEntry(entry: string, outputs: Output[]): RowEntry {
  const primary = entry.endsWith('!');
  const key = primary ? entry.slice(0, -1) : entry;

  let output: Output | undefined;
  if (/^\d+$/.test(key)) {
    const index = parseInt(key, 10) - 1;
    output = index >= 0 ? outputs[index] : undefined;
  } else {
    output = outputs.find(o => o.name === key);
  }

  if (!output) throw new UnknownOutputError(key);
  return { output, primary };
}

/**
 * Left-to-right row. Entries are 1-based indices into the connected
 * outputs or output names, optionally suffixed with `!` for primary.
 * Connected outputs not in the row are switched off.
 */
function rowArgs(entries: string[], outputs: Output[]): string[] {
  if (entries.length === 0) {
    throw new UsageError('No outputs specified for row');
  }

  // Duplicates are passed through so xrandr can report them.
  const row = entries.map(e => resolveRowEntry(e, outputs));
  const primaryFlag = (e: RowEntry): string[] => (e.primary ? ['--primary'] : []);

  const [first, ...following] = row;
  const args = ['--output', first.output.name, '--auto', ...primaryFlag(first)];

  following.forEach((entry, i) => {
    const left = row[i];
    args.push('--output', entry.output.name, '--auto', '--right-of', left.output.name, ...primaryFlag(entry));
  });

  const used = new Set(row.map(e => e.output.name));
  args.push(...offArgs(outputs.filter(o => !used.has(o.name))));
  return args;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build the xrandr arguments (without the binary) for a directive.
 * Disconnected outputs in `outputs` are ignored.
 */
export function buildLayoutArgs(directive: LayoutDirective, outputs: Output[]): string[] {
  const connected = connectedOnly(outputs);

  switch (directive.kind) {
    case 'clone':          return cloneArgs(connected);
    case 'side':           return sideArgs(directive.side, connected);
    case 'main-only':      return singleOutputArgs('off', connected, 0);
    case 'secondary-only': return singleOutputArgs('only', connected, 1);
    case 'row':            return rowArgs(directive.entries, connected);
  }
}
