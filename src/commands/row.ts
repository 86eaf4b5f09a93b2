/**
 * commands/row.ts
 *
 * `beamer row <outputs...>`: arrange outputs left to right. Mostly
 * useful with more than two monitors. Entries are 1-based indices as
 * shown by `info` or output names; a trailing `!` makes that output
 * primary, e.g. `beamer row 2 1!`.
 */

import { SubcommandModule } from '../core/types';
import { registry } from '../core/registry';
import { applyLayout } from './layout';

const row: SubcommandModule = {
  name: 'row',
  description: 'Arrange the given outputs in a row, left to right',
  operands: '<outputs...>',
  run: (ctx, operands) => applyLayout(ctx, { kind: 'row', entries: operands })
};

// Self-register
registry.register(row);

export default row;
