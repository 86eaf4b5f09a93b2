/**
 * commands/info.ts
 *
 * `beamer info`: numbered list of connected outputs and their modes.
 */

import { SubcommandContext, SubcommandModule } from '../core/types';
import { registry } from '../core/registry';
import { formatInfo } from '../tools/info_formatter';

function runInfo(ctx: SubcommandContext): number {
  const outputs = ctx.xrandr.connectedOutputs();
  if (outputs.length === 0) {
    ctx.terminal.out('No connected outputs.\n');
    return 0;
  }
  ctx.terminal.out(formatInfo(outputs, ctx.style, ctx.terminal.columns) + '\n');
  return 0;
}

const info: SubcommandModule = {
  name: 'info',
  description: 'Print connected outputs and their modes',
  run: runInfo
};

// Self-register
registry.register(info);

export default info;
