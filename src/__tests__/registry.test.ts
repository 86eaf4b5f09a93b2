import { registry } from '../core/registry';
import { UsageError } from '../core/errors';
import '../commands';

describe('SubcommandRegistry', () => {
  it('should register every subcommand in help order', () => {
    expect(registry.listNames()).toEqual([
      'info', 'query', 'clone', 'left', 'right', 'above', 'below', 'off', 'only', 'row'
    ]);
  });

  it('should resolve a known subcommand', () => {
    expect(registry.resolve('row').operands).toBe('<outputs...>');
  });

  it('should reject an unknown subcommand with a usage error', () => {
    expect(() => registry.resolve('mirror')).toThrow(UsageError);
    expect(() => registry.resolve('mirror')).toThrow('Unknown subcommand "mirror"');
  });
});
