/**
 * Capability providers the engine dispatches to. Every method resolves on
 * success and rejects with a DriverError carrying a readable cause.
 */

export interface BrowserDriver {
  open(): Promise<void>;
  navigate(url: string): Promise<void>;
  search(site: string, query: string): Promise<void>;
  click(selector: string): Promise<void>;
  type(selector: string, text: string): Promise<void>;
  close(): Promise<void>;
  isOpen(): boolean;
}

export interface SystemDriver {
  launchApplication(name: string): Promise<void>;
  pressKey(key: string): Promise<void>;
  hotkey(keys: string[]): Promise<void>;
  /** Resolves with the path of the written image */
  screenshot(filename?: string): Promise<string>;
  typeText(text: string): Promise<void>;
  wait(durationMs: number): Promise<void>;
}

export interface Drivers {
  browser: BrowserDriver;
  system: SystemDriver;
}
