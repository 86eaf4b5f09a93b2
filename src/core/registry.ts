/**
 * core/registry.ts
 *
 * Central singleton holding every SubcommandModule. Subcommand files
 * register themselves on import; the CLI builds one commander
 * subcommand per registered module, in registration order.
 */

import { SubcommandModule } from './types';
import { UsageError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/registry');

export class SubcommandRegistry {
  /** The one and only instance. */
  private static instance: SubcommandRegistry | null = null;

  /** subcommand name → module */
  private readonly modules = new Map<string, SubcommandModule>();

  private constructor() {}

  static getInstance(): SubcommandRegistry {
    if (!SubcommandRegistry.instance) {
      SubcommandRegistry.instance = new SubcommandRegistry();
    }
    return SubcommandRegistry.instance;
  }

  register(mod: SubcommandModule): void {
    if (this.modules.has(mod.name)) {
      log.warn({ subcommand: mod.name }, 'Subcommand already registered — overwriting');
    }
    this.modules.set(mod.name, mod);
    log.debug({ subcommand: mod.name }, 'Subcommand registered');
  }

  list(): SubcommandModule[] {
    return Array.from(this.modules.values());
  }

  listNames(): string[] {
    return Array.from(this.modules.keys());
  }

  /** Throws UsageError if the name is not registered. */
  resolve(name: string): SubcommandModule {
    const mod = this.modules.get(name);
    if (!mod) {
      throw new UsageError(`Unknown subcommand "${name}"`, { known: this.listNames() });
    }
    return mod;
  }
}

// Convenience export so subcommand modules can do:
//     import { registry } from '../core/registry';
//     registry.register(myModule);
export const registry = SubcommandRegistry.getInstance();
