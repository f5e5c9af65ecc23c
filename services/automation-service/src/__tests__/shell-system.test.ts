import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import {
  resolveApplication,
  screenshotFileName,
  ShellSystemDriver,
  type CommandRunner,
  type SupportedPlatform,
} from '../drivers/shell-system';
import { DisabledSystemDriver } from '../drivers/disabled-system';
import { DriverError } from '../errors';

interface Invocation {
  mode: 'run' | 'launch';
  file: string;
  args: string[];
}

class RecordingRunner implements CommandRunner {
  readonly invocations: Invocation[] = [];
  failure?: Error;

  async run(file: string, args: string[]): Promise<void> {
    this.record('run', file, args);
  }

  async launch(file: string, args: string[]): Promise<void> {
    this.record('launch', file, args);
  }

  private record(mode: Invocation['mode'], file: string, args: string[]): void {
    this.invocations.push({ mode, file, args });
    if (this.failure) {
      throw this.failure;
    }
  }
}

function driverFor(platform: SupportedPlatform, screenshotDir = '/tmp/unused') {
  const runner = new RecordingRunner();
  return { runner, driver: new ShellSystemDriver({ platform, runner, screenshotDir }) };
}

describe('resolveApplication', () => {
  it('should map common names per platform', () => {
    expect(resolveApplication('Notepad', 'linux')).toBe('gedit');
    expect(resolveApplication('notepad', 'darwin')).toBe('TextEdit');
    expect(resolveApplication(' calculator ', 'win32')).toBe('calc');
  });

  it('should pass other names through', () => {
    expect(resolveApplication(' firefox ', 'linux')).toBe('firefox');
  });
});

describe('screenshotFileName', () => {
  it('should keep only the base name and add the extension', () => {
    expect(screenshotFileName('../../etc/report')).toBe('report.png');
    expect(screenshotFileName('shot.PNG')).toBe('shot.PNG');
  });

  it('should derive a name from the time when none is given', () => {
    expect(screenshotFileName(undefined, new Date('2026-01-01T00:00:00.000Z'))).toBe(
      'screenshot-2026-01-01T00-00-00-000Z.png'
    );
  });
});

describe('ShellSystemDriver', () => {
  describe('on linux', () => {
    it('should launch applications detached', async () => {
      const { runner, driver } = driverFor('linux');

      await driver.launchApplication('notepad');

      expect(runner.invocations).toEqual([{ mode: 'launch', file: 'gedit', args: [] }]);
    });

    it('should send keys and hotkeys through xdotool', async () => {
      const { runner, driver } = driverFor('linux');

      await driver.pressKey('enter');
      await driver.hotkey(['ctrl', 's']);

      expect(runner.invocations).toEqual([
        { mode: 'run', file: 'xdotool', args: ['key', 'Return'] },
        { mode: 'run', file: 'xdotool', args: ['key', 'ctrl+s'] },
      ]);
    });

    it('should type text literally', async () => {
      const { runner, driver } = driverFor('linux');

      await driver.typeText('-- hello');

      expect(runner.invocations[0].args).toEqual(['type', '--delay', '20', '--', '-- hello']);
    });

    it('should reject a hotkey whose leading keys are not modifiers', async () => {
      const { runner, driver } = driverFor('linux');

      await expect(driver.hotkey(['ctrl', 'q', 'x'])).rejects.toThrow('Unknown modifier key: q');
      expect(runner.invocations).toEqual([]);
    });

    it('should wrap command failures in DriverError', async () => {
      const { runner, driver } = driverFor('linux');
      runner.failure = new Error('xdotool: command not found');

      const error = await driver.pressKey('enter').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DriverError);
      expect(error).toMatchObject({
        message: 'Could not press enter: xdotool: command not found',
        details: { command: 'xdotool' },
      });
    });

    describe('screenshot', () => {
      let dir: string;

      beforeAll(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'shots-'));
      });

      afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it('should capture the screen into the screenshot directory', async () => {
        const { runner, driver } = driverFor('linux', path.join(dir, 'nested'));

        const saved = await driver.screenshot('desk');

        expect(saved).toBe(path.join(dir, 'nested', 'desk.png'));
        expect(runner.invocations).toEqual([{ mode: 'run', file: 'import', args: ['-window', 'root', saved] }]);
      });
    });
  });

  describe('on macOS', () => {
    it('should open applications by name', async () => {
      const { runner, driver } = driverFor('darwin');

      await driver.launchApplication('calculator');

      expect(runner.invocations).toEqual([{ mode: 'run', file: 'open', args: ['-a', 'Calculator'] }]);
    });

    it('should send hotkeys through System Events', async () => {
      const { runner, driver } = driverFor('darwin');

      await driver.hotkey(['cmd', 's']);
      await driver.pressKey('enter');

      expect(runner.invocations.map(i => i.args[1])).toEqual([
        'tell application "System Events" to keystroke "s" using {command down}',
        'tell application "System Events" to key code 36',
      ]);
    });
  });

  describe('on Windows', () => {
    it('should translate hotkeys to SendKeys', async () => {
      const { runner, driver } = driverFor('win32');

      await driver.hotkey(['ctrl', 'shift', 'esc']);

      expect(runner.invocations).toEqual([
        {
          mode: 'run',
          file: 'powershell',
          args: ['-NoProfile', '-Command', "(New-Object -ComObject WScript.Shell).SendKeys('^+{ESC}')"],
        },
      ]);
    });

    it('should refuse the Windows key', async () => {
      const { driver } = driverFor('win32');

      await expect(driver.hotkey(['win', 'd'])).rejects.toThrow('The Windows key cannot be sent on this platform');
    });
  });
});

describe('DisabledSystemDriver', () => {
  it('should fail desktop actions', async () => {
    const driver = new DisabledSystemDriver();

    await expect(driver.launchApplication('notepad')).rejects.toThrow('System control is disabled (open notepad)');
    await expect(driver.hotkey(['ctrl', 's'])).rejects.toBeInstanceOf(DriverError);
  });

  it('should still wait', async () => {
    await expect(new DisabledSystemDriver().wait(0)).resolves.toBeUndefined();
  });
});
