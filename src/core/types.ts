/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * All modules import from here. Nothing defines its own DTOs.
 */

import type { Chalk } from 'chalk';
import type { XrandrClient } from '../tools/xrandr_client';

// ---------------------------------------------------------------------------
// Display model (what `xrandr --query` describes)
// ---------------------------------------------------------------------------

export interface RefreshRate {
  frequency: number;
  active: boolean;                         // marked `*` in the listing
  preferred: boolean;                      // marked `+` in the listing
}

export interface Mode {
  name: string;                            // token as listed, e.g. "1920x1080" or "1920x1080i"
  width: number;
  height: number;
  refreshRates: RefreshRate[];
  frequency?: number;                      // first listed rate
  active: boolean;
  preferred: boolean;
}

export type ConnectionState = 'connected' | 'disconnected' | 'unknown';

export interface Geometry {
  width: number;
  height: number;
  x: number;
  y: number;
}

export interface Output {
  name: string;
  connection: ConnectionState;
  connected: boolean;
  primary: boolean;
  geometry?: Geometry;                     // only present while the output is enabled
  rotation?: string;
  info?: string;                           // the parenthesised capability list
  physicalSize?: string;                   // e.g. "344mm x 194mm"
  modes: Mode[];
}

// ---------------------------------------------------------------------------
// Layout directives
// ---------------------------------------------------------------------------

export type Side = 'left' | 'right' | 'above' | 'below';

export type LayoutDirective =
  | { kind: 'clone' }
  | { kind: 'side'; side: Side }
  | { kind: 'main-only' }
  | { kind: 'secondary-only' }
  | { kind: 'row'; entries: string[] };

// ---------------------------------------------------------------------------
// Process collaborator
// ---------------------------------------------------------------------------

export interface ProcessResult {
  stdout: string;
  stderr: string;
  status: number;
}

/** Runs an external command to completion and captures what it printed. */
export type ProcessRunner = (command: string, args: readonly string[]) => ProcessResult;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface BeamerConfig {
  binary: string;                          // xrandr executable name or path
  logLevel: LogLevel;
  color: boolean;
  dryRun: boolean;                         // print apply commands instead of running them
}

// ---------------------------------------------------------------------------
// Subcommand contract — every subcommand implements this
// ---------------------------------------------------------------------------

/** Where user-facing text goes. Logs go through pino instead. */
export interface Terminal {
  out(text: string): void;
  err(text: string): void;
  columns: number;
}

export interface SubcommandContext {
  config: BeamerConfig;
  xrandr: XrandrClient;
  terminal: Terminal;
  style: Chalk;
}

export interface SubcommandModule {
  /** Registry key, also the word typed on the command line. */
  name: string;

  description: string;

  /** Variadic operand for commander, e.g. "<outputs...>". */
  operands?: string;

  /** Returns the process exit code. */
  run(ctx: SubcommandContext, operands: string[]): number;
}
