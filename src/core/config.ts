/**
 * core/config.ts
 *
 * Builds the BeamerConfig for one invocation. Later sources win:
 *   1. built-in defaults
 *   2. JSON config file (--config, else $XDG_CONFIG_HOME/beamer/config.json)
 *   3. environment (BEAMER_XRANDR, BEAMER_LOG_LEVEL, NO_COLOR), .env included
 *   4. command-line options
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Ajv from 'ajv';
import { BeamerConfig, LOG_LEVELS, LogLevel } from './types';
import { ConfigError, UsageError } from './errors';

export interface CliOverrides {
  config?: string;
  xrandr?: string;
  logLevel?: string;
  color?: boolean;
  dryRun?: boolean;
}

type FileConfig = Partial<BeamerConfig>;

const ajv = new Ajv({ allErrors: true });

const validateFileConfig = ajv.compile<FileConfig>({
  type: 'object',
  properties: {
    binary:   { type: 'string', minLength: 1 },
    logLevel: { type: 'string', enum: [...LOG_LEVELS] },
    color:    { type: 'boolean' },
    dryRun:   { type: 'boolean' }
  },
  additionalProperties: false
});

export function parseLogLevel(value: string, source: string): LogLevel {
  const level = LOG_LEVELS.find(l => l === value);
  if (!level) {
    throw new UsageError(`Invalid log level "${value}" from ${source}; expected one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

export function defaultConfigPath(env: NodeJS.ProcessEnv): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'beamer', 'config.json');
}

function readConfigFile(filePath: string, required: boolean): FileConfig {
  if (!fs.existsSync(filePath)) {
    if (required) throw new ConfigError(filePath, 'file not found');
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(filePath, `malformed JSON (${e instanceof Error ? e.message : String(e)})`);
  }

  if (!validateFileConfig(parsed)) {
    throw new ConfigError(filePath, ajv.errorsText(validateFileConfig.errors), validateFileConfig.errors ?? []);
  }
  return parsed;
}

export function loadConfig(
  cli: CliOverrides,
  env: NodeJS.ProcessEnv = process.env,
  isTty: boolean = Boolean(process.stdout.isTTY)
): BeamerConfig {
  const file = readConfigFile(cli.config ?? defaultConfigPath(env), cli.config !== undefined);

  let logLevel = file.logLevel ?? 'warn';
  if (env.BEAMER_LOG_LEVEL) logLevel = parseLogLevel(env.BEAMER_LOG_LEVEL, 'BEAMER_LOG_LEVEL');
  if (cli.logLevel !== undefined) logLevel = parseLogLevel(cli.logLevel, '--log-level');

  let color = file.color ?? isTty;
  if (env.NO_COLOR) color = false;
  if (cli.color !== undefined) color = cli.color;

  return {
    binary: cli.xrandr ?? (env.BEAMER_XRANDR || file.binary || 'xrandr'),
    logLevel,
    color,
    dryRun: cli.dryRun ?? file.dryRun ?? false
  };
}
