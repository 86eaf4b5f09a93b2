/**
 * commands/index.ts
 *
 * Import every subcommand module here. The act of importing triggers
 * each module's self-registration call (registry.register(...)). Import
 * order is the order shown in --help.
 */
import './info';
import './query';
import './layout';
import './row';
