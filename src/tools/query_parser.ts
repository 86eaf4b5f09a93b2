/**
 * tools/query_parser.ts
 *
 * Turns the line-oriented listing printed by `xrandr --query` into
 * Output entities. The listing looks like:
 *
 *   Screen 0: minimum 320 x 200, current 3840 x 1080, maximum 16384 x 16384
 *   eDP-1 connected primary 1920x1080+0+0 (normal left inverted right x axis y axis) 344mm x 194mm
 *      1920x1080     60.02*+  59.93
 *      1280x720      60.00
 *   HDMI-1 disconnected (normal left inverted right x axis y axis)
 *
 * Listing order is preserved: callers rely on it to pick the main output.
 */

import { ConnectionState, Mode, Output, RefreshRate } from '../core/types';
import { QueryParseError } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('tools/query_parser');

// ---------------------------------------------------------------------------
// Line shapes
// ---------------------------------------------------------------------------

const SCREEN_RE = /^Screen \d+:/;

const OUTPUT_RE = new RegExp(
  '^(?<name>\\S+)' +
  ' (?<connection>connected|disconnected|unknown connection)' +
  '(?<primary> primary)?' +
  '(?: (?<width>\\d+)x(?<height>\\d+)(?<x>[+-]\\d+)(?<y>[+-]\\d+))?' +
  '(?: (?<rotation>normal|left|inverted|right))?' +
  '(?: (?:X axis|Y axis|X and Y axis))?' +
  ' ?(?:\\((?<info>[^)]*)\\))?' +
  '(?: (?<physicalSize>.*?))?\\s*$'
);

const MODE_RE = /^\s+(?<name>(?<width>\d+)x(?<height>\d+)\S*)(?<rates>.*)$/;

// A rate is printed as "%6.2f" followed by '*' (current) and '+' (preferred),
// each replaced by a space when absent.
const RATE_RE = /(\d+(?:\.\d+)?)(\*)? ?(\+)?/g;

const CONNECTION: Record<string, ConnectionState> = {
  'connected': 'connected',
  'disconnected': 'disconnected',
  'unknown connection': 'unknown'
};

// ---------------------------------------------------------------------------
// Line parsers
// ---------------------------------------------------------------------------

function parseOutputHeader(line: string): Output | null {
  const groups = OUTPUT_RE.exec(line)?.groups;
  if (!groups) return null;

  const connection = CONNECTION[groups.connection];
  const output: Output = {
    name: groups.name,
    connection,
    connected: connection === 'connected',
    primary: groups.primary !== undefined,
    modes: []
  };

  if (groups.width !== undefined) {
    output.geometry = {
      width: parseInt(groups.width, 10),
      height: parseInt(groups.height, 10),
      x: parseInt(groups.x, 10),
      y: parseInt(groups.y, 10)
    };
  }
  if (groups.rotation !== undefined) output.rotation = groups.rotation;
  if (groups.info !== undefined) output.info = groups.info;
  if (groups.physicalSize) output.physicalSize = groups.physicalSize;

  return output;
}

function parseRates(text: string): RefreshRate[] | null {
  const rates: RefreshRate[] = [];
  for (const match of text.matchAll(RATE_RE)) {
    rates.push({
      frequency: parseFloat(match[1]),
      active: match[2] !== undefined,
      preferred: match[3] !== undefined
    });
  }

  // Anything besides rates and padding means this is not a mode line.
  if (text.replace(RATE_RE, '').trim() !== '') return null;
  return rates;
}

function parseModeLine(line: string): Mode | null {
  const groups = MODE_RE.exec(line)?.groups;
  if (!groups) return null;

  const refreshRates = parseRates(groups.rates);
  if (!refreshRates) return null;

  return {
    name: groups.name,
    width: parseInt(groups.width, 10),
    height: parseInt(groups.height, 10),
    refreshRates,
    frequency: refreshRates[0]?.frequency,
    active: refreshRates.some(r => r.active),
    preferred: refreshRates.some(r => r.preferred)
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parse a complete `xrandr --query` listing. Every output header yields
 * one Output, connected or not, in listing order.
 *
 * @throws QueryParseError on any line that is not a screen header, an
 *   output header, a mode line belonging to an output, or blank.
 */
export function parseQuery(text: string): Output[] {
  const outputs: Output[] = [];
  let current: Output | null = null;

  const lines = text.split(/\r?\n/);
  for (const [index, line] of lines.entries()) {
    const lineNumber = index + 1;
    if (line.trim() === '') continue;

    if (/^\s/.test(line)) {
      const mode = parseModeLine(line);
      if (!mode) {
        throw new QueryParseError(lineNumber, line, 'not a mode line');
      }
      if (!current) {
        throw new QueryParseError(lineNumber, line, 'mode listed before any output');
      }
      current.modes.push(mode);
      continue;
    }

    if (SCREEN_RE.test(line)) continue;

    const output = parseOutputHeader(line);
    if (!output) {
      throw new QueryParseError(lineNumber, line, 'not an output header');
    }
    outputs.push(output);
    current = output;
  }

  log.debug({ outputs: outputs.map(o => o.name) }, 'Parsed xrandr query');
  return outputs;
}

/** Connected outputs only, still in listing order. */
export function connectedOnly(outputs: Output[]): Output[] {
  return outputs.filter(o => o.connected);
}
