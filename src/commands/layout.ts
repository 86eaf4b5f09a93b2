/**
 * commands/layout.ts
 *
 * The fixed layout subcommands: clone, left, right, above, below, off
 * and only. Each one queries xrandr, builds the apply command for its
 * directive and runs it, handing xrandr's output and exit status back
 * unchanged.
 */

import { LayoutDirective, SubcommandContext, SubcommandModule } from '../core/types';
import { registry } from '../core/registry';
import { scopedLogger } from '../core/logger';
import { buildLayoutArgs, directiveName } from '../tools/layout_builder';
import { formatCommandLine } from '../tools/xrandr_client';

const log = scopedLogger('commands/layout');

/** Shared by every subcommand that changes the layout. */
export function applyLayout(ctx: SubcommandContext, directive: LayoutDirective): number {
  const { xrandr, terminal, style } = ctx;

  const args = buildLayoutArgs(directive, xrandr.outputs());
  const commandLine = formatCommandLine(xrandr.binary, args);
  terminal.out(style.bold.green(commandLine) + '\n');

  if (ctx.config.dryRun) {
    log.info({ directive: directiveName(directive) }, 'Dry run, not applying');
    return 0;
  }

  const result = xrandr.apply(args);
  if (result.stdout) terminal.out(result.stdout);
  if (result.stderr) terminal.err(result.stderr);

  if (result.status !== 0) {
    terminal.err(style.bold.red(`"${commandLine}" failed with exit status ${result.status}`) + '\n');
  }
  return result.status;
}

const LAYOUTS: Array<{ name: string; description: string; directive: LayoutDirective }> = [
  { name: 'clone', description: 'Mirror the main output on all other outputs', directive: { kind: 'clone' } },
  { name: 'left',  description: 'Place the secondary output left of the main one', directive: { kind: 'side', side: 'left' } },
  { name: 'right', description: 'Place the secondary output right of the main one', directive: { kind: 'side', side: 'right' } },
  { name: 'above', description: 'Place the secondary output above the main one', directive: { kind: 'side', side: 'above' } },
  { name: 'below', description: 'Place the secondary output below the main one', directive: { kind: 'side', side: 'below' } },
  { name: 'off',   description: 'Only activate the main output', directive: { kind: 'main-only' } },
  { name: 'only',  description: 'Only activate the secondary output', directive: { kind: 'secondary-only' } }
];

export const layoutModules: SubcommandModule[] = LAYOUTS.map(({ name, description, directive }) => ({
  name,
  description,
  run: ctx => applyLayout(ctx, directive)
}));

// Self-register
layoutModules.forEach(mod => registry.register(mod));
