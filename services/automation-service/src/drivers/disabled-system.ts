import { delay } from '@autopilot/shared-utils';
import { DriverError } from '../errors';
import type { SystemDriver } from './types';

/**
 * Stand-in used when ENABLE_SYSTEM_CONTROL is off. Every desktop action
 * fails; `wait` is not desktop control and still works.
 */
export class DisabledSystemDriver implements SystemDriver {
  private fail(operation: string): never {
    throw new DriverError('system', `System control is disabled (${operation})`);
  }

  async launchApplication(name: string): Promise<void> {
    return this.fail(`open ${name}`);
  }

  async pressKey(key: string): Promise<void> {
    return this.fail(`press ${key}`);
  }

  async hotkey(keys: string[]): Promise<void> {
    return this.fail(`hotkey ${keys.join('+')}`);
  }

  async screenshot(): Promise<string> {
    return this.fail('screenshot');
  }

  async typeText(): Promise<void> {
    return this.fail('type text');
  }

  async wait(durationMs: number): Promise<void> {
    await delay(durationMs);
  }
}
