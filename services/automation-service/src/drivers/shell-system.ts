/**
 * Desktop control through the platform's own command-line tools.
 *
 * Linux: xdotool for input, ImageMagick `import` for screenshots.
 * macOS: `open`, `osascript` (System Events) and `screencapture`.
 * Windows: PowerShell with WScript.Shell and System.Drawing.
 */

import { execFile, spawn } from 'node:child_process';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import { delay, errorMessage, logger as rootLogger } from '@autopilot/shared-utils';
import { DriverError } from '../errors';
import type { SystemDriver } from './types';

const logger = rootLogger.child('system');
const execFileAsync = promisify(execFile);

export type SupportedPlatform = 'linux' | 'darwin' | 'win32';

/** Runs external programs; replaced by a recorder in tests. */
export interface CommandRunner {
  /** Runs to completion */
  run(file: string, args: string[]): Promise<void>;
  /** Starts a long-lived program and returns once it has spawned */
  launch(file: string, args: string[]): Promise<void>;
}

export const processRunner: CommandRunner = {
  async run(file, args) {
    await execFileAsync(file, args, { timeout: 60_000 });
  },
  launch(file, args) {
    return new Promise((resolve, reject) => {
      const child = spawn(file, args, { detached: true, stdio: 'ignore' });
      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  },
};

const APP_ALIASES: Record<string, Record<SupportedPlatform, string>> = {
  notepad: { linux: 'gedit', darwin: 'TextEdit', win32: 'notepad' },
  'text editor': { linux: 'gedit', darwin: 'TextEdit', win32: 'notepad' },
  calculator: { linux: 'gnome-calculator', darwin: 'Calculator', win32: 'calc' },
  terminal: { linux: 'x-terminal-emulator', darwin: 'Terminal', win32: 'cmd' },
  'file explorer': { linux: 'nautilus', darwin: 'Finder', win32: 'explorer' },
  files: { linux: 'nautilus', darwin: 'Finder', win32: 'explorer' },
  browser: { linux: 'x-www-browser', darwin: 'Safari', win32: 'msedge' },
};

const MODIFIERS: Record<string, 'ctrl' | 'alt' | 'shift' | 'super'> = {
  ctrl: 'ctrl',
  control: 'ctrl',
  alt: 'alt',
  option: 'alt',
  shift: 'shift',
  cmd: 'super',
  command: 'super',
  win: 'super',
  super: 'super',
  meta: 'super',
};

const XDOTOOL_KEYS: Record<string, string> = {
  enter: 'Return',
  return: 'Return',
  esc: 'Escape',
  escape: 'Escape',
  tab: 'Tab',
  space: 'space',
  backspace: 'BackSpace',
  delete: 'Delete',
  up: 'Up',
  down: 'Down',
  left: 'Left',
  right: 'Right',
  home: 'Home',
  end: 'End',
  pageup: 'Prior',
  pagedown: 'Next',
};

const MAC_KEY_CODES: Record<string, number> = {
  enter: 36,
  return: 36,
  tab: 48,
  space: 49,
  backspace: 51,
  delete: 117,
  esc: 53,
  escape: 53,
  left: 123,
  right: 124,
  down: 125,
  up: 126,
};

const MAC_MODIFIERS: Record<string, string> = { ctrl: 'control', alt: 'option', shift: 'shift', super: 'command' };

const SENDKEYS_KEYS: Record<string, string> = {
  enter: '{ENTER}',
  return: '{ENTER}',
  esc: '{ESC}',
  escape: '{ESC}',
  tab: '{TAB}',
  space: ' ',
  backspace: '{BACKSPACE}',
  delete: '{DELETE}',
  up: '{UP}',
  down: '{DOWN}',
  left: '{LEFT}',
  right: '{RIGHT}',
  home: '{HOME}',
  end: '{END}',
  pageup: '{PGUP}',
  pagedown: '{PGDN}',
};

const SENDKEYS_MODIFIERS: Record<string, string> = { ctrl: '^', alt: '%', shift: '+' };

export function resolveApplication(name: string, platform: SupportedPlatform): string {
  const key = name.trim().toLowerCase();
  return APP_ALIASES[key]?.[platform] ?? name.trim();
}

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function powershellString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function sendKeysEscape(value: string): string {
  return value.replace(/[+^%~(){}[\]]/g, ch => `{${ch}}`);
}

function xdotoolKey(key: string): string {
  const lower = key.toLowerCase();
  return MODIFIERS[lower] ?? XDOTOOL_KEYS[lower] ?? key;
}

function macKeystroke(key: string, modifiers: string[]): string {
  const using = modifiers.length
    ? ` using {${modifiers.map(m => `${MAC_MODIFIERS[m] ?? m} down`).join(', ')}}`
    : '';
  const code = MAC_KEY_CODES[key.toLowerCase()];
  const stroke = code === undefined ? `keystroke ${appleScriptString(key)}` : `key code ${code}`;
  return `tell application "System Events" to ${stroke}${using}`;
}

function sendKeysSequence(key: string, modifiers: string[]): string {
  const prefix = modifiers.map(m => SENDKEYS_MODIFIERS[m] ?? '').join('');
  const lower = key.toLowerCase();
  const body = SENDKEYS_KEYS[lower] ?? (/^f\d{1,2}$/.test(lower) ? `{${lower.toUpperCase()}}` : sendKeysEscape(key));
  return `${prefix}${body}`;
}

function sendKeysScript(sequence: string): string {
  return `(New-Object -ComObject WScript.Shell).SendKeys(${powershellString(sequence)})`;
}

/** Screenshot file name confined to the screenshot directory. */
export function screenshotFileName(filename: string | undefined, now: Date = new Date()): string {
  const base = filename ? path.basename(filename.trim()) : '';
  const name = base || `screenshot-${now.toISOString().replace(/[:.]/g, '-')}`;
  return /\.png$/i.test(name) ? name : `${name}.png`;
}

export interface ShellSystemDriverOptions {
  screenshotDir: string;
  platform?: SupportedPlatform;
  runner?: CommandRunner;
}

export class ShellSystemDriver implements SystemDriver {
  private platform: SupportedPlatform;
  private runner: CommandRunner;
  private screenshotDir: string;

  constructor(options: ShellSystemDriverOptions) {
    this.screenshotDir = options.screenshotDir;
    this.runner = options.runner ?? processRunner;
    const platform = options.platform ?? process.platform;
    if (platform !== 'linux' && platform !== 'darwin' && platform !== 'win32') {
      throw new DriverError('system', `Unsupported platform for system control: ${platform}`);
    }
    this.platform = platform;
  }

  async launchApplication(name: string): Promise<void> {
    const app = resolveApplication(name, this.platform);
    switch (this.platform) {
      case 'linux':
        await this.launch(`launch ${app}`, app, []);
        break;
      case 'darwin':
        await this.exec(`launch ${app}`, 'open', ['-a', app]);
        break;
      case 'win32':
        await this.exec(`launch ${app}`, 'powershell', ['-NoProfile', '-Command', `Start-Process ${powershellString(app)}`]);
        break;
    }
    logger.info(`Launched application ${app}`);
  }

  async pressKey(key: string): Promise<void> {
    await this.sendKeys(key.trim(), []);
  }

  async hotkey(keys: string[]): Promise<void> {
    const parts = keys.map(k => k.trim()).filter(Boolean);
    const main = parts.at(-1);
    if (!main) {
      throw new DriverError('system', 'Hotkey needs at least one key');
    }
    const modifiers = parts.slice(0, -1).map(k => {
      const modifier = MODIFIERS[k.toLowerCase()];
      if (!modifier) {
        throw new DriverError('system', `Unknown modifier key: ${k}`);
      }
      return modifier;
    });
    await this.sendKeys(main, modifiers);
  }

  async typeText(text: string): Promise<void> {
    switch (this.platform) {
      case 'linux':
        await this.exec('type text', 'xdotool', ['type', '--delay', '20', '--', text]);
        break;
      case 'darwin':
        await this.exec('type text', 'osascript', ['-e', `tell application "System Events" to keystroke ${appleScriptString(text)}`]);
        break;
      case 'win32':
        await this.exec('type text', 'powershell', ['-NoProfile', '-Command', sendKeysScript(sendKeysEscape(text))]);
        break;
    }
  }

  async screenshot(filename?: string): Promise<string> {
    const target = path.join(this.screenshotDir, screenshotFileName(filename));
    try {
      await mkdir(this.screenshotDir, { recursive: true });
    } catch (error) {
      throw new DriverError('system', `Screenshot directory unavailable: ${errorMessage(error)}`);
    }

    switch (this.platform) {
      case 'linux':
        await this.exec('screenshot', 'import', ['-window', 'root', target]);
        break;
      case 'darwin':
        await this.exec('screenshot', 'screencapture', ['-x', target]);
        break;
      case 'win32':
        await this.exec('screenshot', 'powershell', [
          '-NoProfile',
          '-Command',
          [
            'Add-Type -AssemblyName System.Windows.Forms,System.Drawing',
            '$b = [System.Windows.Forms.Screen]::PrimaryScreen.Bounds',
            '$bmp = New-Object System.Drawing.Bitmap $b.Width, $b.Height',
            '$g = [System.Drawing.Graphics]::FromImage($bmp)',
            '$g.CopyFromScreen($b.Location, [System.Drawing.Point]::Empty, $b.Size)',
            `$bmp.Save(${powershellString(target)}, [System.Drawing.Imaging.ImageFormat]::Png)`,
          ].join('; '),
        ]);
        break;
    }
    logger.info(`Screenshot saved to ${target}`);
    return target;
  }

  async wait(durationMs: number): Promise<void> {
    await delay(durationMs);
  }

  private async sendKeys(key: string, modifiers: string[]): Promise<void> {
    if (!key) {
      throw new DriverError('system', 'Key must not be empty');
    }
    switch (this.platform) {
      case 'linux':
        await this.exec(`press ${key}`, 'xdotool', ['key', [...modifiers, key].map(xdotoolKey).join('+')]);
        break;
      case 'darwin':
        await this.exec(`press ${key}`, 'osascript', ['-e', macKeystroke(key, modifiers)]);
        break;
      case 'win32':
        if (modifiers.includes('super')) {
          throw new DriverError('system', 'The Windows key cannot be sent on this platform');
        }
        await this.exec(`press ${key}`, 'powershell', ['-NoProfile', '-Command', sendKeysScript(sendKeysSequence(key, modifiers))]);
        break;
    }
  }

  private async exec(operation: string, file: string, args: string[]): Promise<void> {
    try {
      await this.runner.run(file, args);
    } catch (error) {
      throw new DriverError('system', `Could not ${operation}: ${errorMessage(error)}`, { command: file });
    }
  }

  private async launch(operation: string, file: string, args: string[]): Promise<void> {
    try {
      await this.runner.launch(file, args);
    } catch (error) {
      throw new DriverError('system', `Could not ${operation}: ${errorMessage(error)}`, { command: file });
    }
  }
}
