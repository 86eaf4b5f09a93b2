/**
 * index.ts
 *
 * Library surface for driving beamer from other code.
 */

export * from './core/types';
export * from './core/errors';
export { loadConfig } from './core/config';
export { parseQuery, connectedOnly } from './tools/query_parser';
export { buildLayoutArgs, directiveName, pickCloneResolution } from './tools/layout_builder';
export { formatInfo, listToColumns } from './tools/info_formatter';
export { XrandrClient, formatCommandLine } from './tools/xrandr_client';
export { spawnRunner } from './tools/xrandr_runner';
export { run, createProgram, VERSION } from './cli';
