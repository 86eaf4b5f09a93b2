/**
 * cli.ts
 *
 * Command-line surface. One commander subcommand per registered
 * SubcommandModule; global options are accepted before or after the
 * subcommand. `run` returns the exit code instead of exiting so the
 * whole flow can be driven with a fake ProcessRunner.
 */

import { Command, CommanderError } from 'commander';
import chalk, { Chalk } from 'chalk';
import { ProcessRunner, SubcommandModule, Terminal } from './core/types';
import { BeamerBaseError, DelegatedError } from './core/errors';
import { CliOverrides, loadConfig } from './core/config';
import { initLogger, scopedLogger } from './core/logger';
import { registry } from './core/registry';
import { XrandrClient } from './tools/xrandr_client';
import { spawnRunner } from './tools/xrandr_runner';
import './commands';

const log = scopedLogger('cli');

export const VERSION = '0.2.0';

export interface CliDeps {
  runner?: ProcessRunner;
  terminal?: Terminal;
  env?: NodeJS.ProcessEnv;
  isTty?: boolean;
}

type GlobalOptions = {
  dryRun?: boolean;
  color?: boolean;
  logLevel?: string;
  config?: string;
  xrandr?: string;
};

export const processTerminal: Terminal = {
  out: text => { process.stdout.write(text); },
  err: text => { process.stderr.write(text); },
  get columns() { return process.stdout.columns ?? 80; }
};

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

function reportError(e: unknown, terminal: Terminal, style: Chalk): number {
  if (e instanceof BeamerBaseError) {
    log.debug({ code: e.code, details: e.details }, 'Command failed');
    terminal.err(style.bold.red(e.message) + '\n');
    if (e instanceof DelegatedError && e.stderr) {
      terminal.err(e.stderr);
    }
    return e.exitCode;
  }

  log.fatal({ err: e }, 'Unexpected error');
  const message = e instanceof Error ? e.message : String(e);
  terminal.err(style.bold.red(`Unexpected error: ${message}`) + '\n');
  return 1;
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

function execute(
  mod: SubcommandModule,
  operands: string[],
  options: GlobalOptions,
  deps: CliDeps,
  terminal: Terminal
): number {
  let style: Chalk = new chalk.Instance({ level: 0 });
  try {
    const overrides: CliOverrides = {
      config: options.config,
      xrandr: options.xrandr,
      logLevel: options.logLevel,
      color: options.color,
      dryRun: options.dryRun
    };
    const config = loadConfig(overrides, deps.env ?? process.env, deps.isTty ?? Boolean(process.stdout.isTTY));
    initLogger(config);
    style = new chalk.Instance({ level: config.color ? 1 : 0 });

    log.debug({ subcommand: mod.name, operands, config }, 'Running subcommand');
    const xrandr = new XrandrClient(config.binary, deps.runner ?? spawnRunner);
    return mod.run({ config, xrandr, terminal, style }, operands);
  } catch (e) {
    return reportError(e, terminal, style);
  }
}

export function createProgram(deps: CliDeps, terminal: Terminal, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('beamer')
    .description('Toggle and position a second monitor or projector through xrandr')
    .version(VERSION)
    .option('--dry-run', 'print the xrandr command instead of running it')
    .option('--color', 'force colored output')
    .option('--no-color', 'disable colored output')
    .option('--log-level <level>', 'diagnostic log level (trace, debug, info, warn, error, fatal, silent)')
    .option('-c, --config <path>', 'read settings from this JSON file')
    .option('--xrandr <path>', 'xrandr executable to run')
    .helpCommand(false)
    .exitOverride()
    .showHelpAfterError()
    .configureOutput({
      writeOut: text => terminal.out(text),
      writeErr: text => terminal.err(text)
    });

  for (const mod of registry.list()) {
    const sub = program
      .command(mod.name)
      .description(mod.description)
      .allowExcessArguments(false);
    if (mod.operands) sub.argument(mod.operands);

    sub.action(() => {
      onExit(execute(mod, sub.args, program.opts<GlobalOptions>(), deps, terminal));
    });
  }

  return program;
}

/** Parse `argv` (without node and script path), run the subcommand, return the exit code. */
export function run(argv: string[], deps: CliDeps = {}): number {
  const terminal = deps.terminal ?? processTerminal;
  let exitCode = 0;
  const program = createProgram(deps, terminal, code => { exitCode = code; });

  try {
    program.parse(argv, { from: 'user' });
  } catch (e) {
    if (e instanceof CommanderError) {
      // --help and --version exit 0; everything else is a usage error
      return e.exitCode === 0 ? 0 : 2;
    }
    return reportError(e, terminal, new chalk.Instance({ level: 0 }));
  }
  return exitCode;
}
