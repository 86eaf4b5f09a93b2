import { XrandrClient, formatCommandLine } from '../tools/xrandr_client';
import { DelegatedError, DependencyMissingError } from '../core/errors';
import { initLogger } from '../core/logger';
import { ProcessRunner } from '../core/types';
import { fakeRunner, fixture } from './helpers';

describe('XrandrClient', () => {
  beforeAll(() => {
    initLogger({ logLevel: 'silent' });
  });

  it('should run the query through the configured binary', () => {
    const runner = fakeRunner(fixture('laptop_and_hdmi.txt'));
    const client = new XrandrClient('/opt/xrandr', runner);

    expect(client.query()).toBe(fixture('laptop_and_hdmi.txt'));
    expect(runner.calls).toEqual([{ command: '/opt/xrandr', args: ['--query'] }]);
  });

  it('should list all outputs or only connected ones', () => {
    const client = new XrandrClient('xrandr', fakeRunner(fixture('laptop_and_hdmi.txt')));

    expect(client.outputs()).toHaveLength(3);
    expect(client.connectedOutputs().map(o => o.name)).toEqual(['eDP-1', 'HDMI-1']);
  });

  it('should raise a DelegatedError when the query fails', () => {
    const runner: ProcessRunner = () => ({ stdout: '', stderr: "Can't open display \n", status: 1 });
    const client = new XrandrClient('xrandr', runner);

    expect(() => client.query()).toThrow(DelegatedError);
    try {
      client.query();
    } catch (e) {
      expect(e).toBeInstanceOf(DelegatedError);
      if (e instanceof DelegatedError) {
        expect(e.message).toBe('"xrandr --query" failed with exit status 1');
        expect(e.stderr).toBe("Can't open display \n");
        expect(e.exitCode).toBe(1);
      }
    }
  });

  it('should let a missing binary surface as DependencyMissingError', () => {
    const runner: ProcessRunner = command => { throw new DependencyMissingError(command); };
    const client = new XrandrClient('xrandr', runner);

    expect(() => client.outputs()).toThrow('Required program "xrandr" was not found');
  });

  it('should return the apply result untouched', () => {
    const failure = { stdout: '', stderr: 'xrandr: cannot find crtc for output HDMI-1\n', status: 1 };
    const runner = fakeRunner('', failure);
    const client = new XrandrClient('xrandr', runner);

    expect(client.apply(['--output', 'HDMI-1', '--auto'])).toBe(failure);
    expect(runner.calls).toEqual([{ command: 'xrandr', args: ['--output', 'HDMI-1', '--auto'] }]);
  });
});

describe('formatCommandLine', () => {
  it('should join binary and arguments with spaces', () => {
    expect(formatCommandLine('xrandr', ['--output', 'eDP-1', '--off'])).toBe('xrandr --output eDP-1 --off');
  });
});
