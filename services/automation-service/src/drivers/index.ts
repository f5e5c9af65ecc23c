export type { BrowserDriver, SystemDriver, Drivers } from './types';
export { PlaywrightBrowserDriver, normalizeUrl, buildSearchUrl, resolveSelector } from './playwright-browser';
export { ShellSystemDriver, processRunner, resolveApplication, screenshotFileName } from './shell-system';
export type { CommandRunner, SupportedPlatform } from './shell-system';
export { DisabledSystemDriver } from './disabled-system';
