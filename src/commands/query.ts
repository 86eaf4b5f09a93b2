/**
 * commands/query.ts
 *
 * `beamer query`: the raw `xrandr --query` listing, byte for byte.
 */

import { SubcommandModule } from '../core/types';
import { registry } from '../core/registry';

const query: SubcommandModule = {
  name: 'query',
  description: 'Print the raw xrandr query output',
  run(ctx) {
    ctx.terminal.out(ctx.xrandr.query());
    return 0;
  }
};

// Self-register
registry.register(query);

export default query;
