/**
 * tools/info_formatter.ts
 *
 * Human-readable listing for the `info` subcommand.
 */

import type { Chalk } from 'chalk';
import { Output } from '../core/types';

export interface ColumnOptions {
  width: number;
  sep?: string;
  indent?: string;
}

/**
 * Lay strings out in right-aligned columns filling the terminal width,
 * top-to-bottom then left-to-right like `ls`.
 */
export function listToColumns(strings: string[], { width, sep = ' ', indent = '' }: ColumnOptions): string {
  if (strings.length === 0) return '';

  const maxLen = Math.max(...strings.map(s => s.length));
  const columns = Math.max(1, Math.floor((width - indent.length) / (maxLen + sep.length)));
  const lineCount = Math.ceil(strings.length / columns);

  const lines: string[] = [];
  for (let lineNo = 0; lineNo < lineCount; lineNo++) {
    const cells = strings
      .filter((_, i) => i % lineCount === lineNo)
      .map(s => s.padStart(maxLen));
    lines.push(indent + cells.join(sep));
  }
  return lines.join('\n');
}

/** One numbered heading per output, then its modes with the active one starred. */
export function formatInfo(outputs: Output[], style: Chalk, width: number): string {
  const blocks = outputs.map((output, i) => {
    const heading = style.bold.green(`${i + 1}: ${output.name}`);
    const modes = output.modes.map(m => `${m.active ? '*' : ''}${m.name}`);
    return modes.length > 0
      ? `${heading}\n${listToColumns(modes, { width, indent: '  ' })}`
      : heading;
  });
  return blocks.join('\n');
}
