import { EventBus, logger } from '@autopilot/shared-utils';
import type { AppConfig } from './config/schema';
import type { AutomationEvent } from './types/events';
import {
  DisabledSystemDriver,
  PlaywrightBrowserDriver,
  ShellSystemDriver,
  type BrowserDriver,
  type SystemDriver,
} from './drivers';
import { createBackends, type BackendSelection } from './llm';
import { AutomationEngine, CommandInterpreter, ConfirmationGate, TaskManager, TaskStore } from './components';

export interface AutomationService {
  config: AppConfig;
  events: EventBus<AutomationEvent>;
  gate: ConfirmationGate;
  interpreter: CommandInterpreter;
  engine: AutomationEngine;
  tasks: TaskManager;
  start(): void;
  stop(): Promise<void>;
}

/** Replacements for the real drivers and AI backends, used by tests. */
export interface ServiceOverrides {
  browser?: BrowserDriver;
  system?: SystemDriver;
  backends?: BackendSelection;
}

function createSystemDriver(config: AppConfig): SystemDriver {
  if (!config.execution.enableSystemControl) {
    logger.warn('System control disabled, desktop actions will fail');
    return new DisabledSystemDriver();
  }
  return new ShellSystemDriver({ screenshotDir: config.execution.screenshotDir });
}

/**
 * Wire the pipeline: one interpreter, one engine (one browser and one
 * desktop) behind one task manager, all publishing on one event bus.
 */
export function createAutomationService(config: AppConfig, overrides: ServiceOverrides = {}): AutomationService {
  logger.setLevel(config.logLevel);

  const events = new EventBus<AutomationEvent>({
    maxListeners: 200,
    onHandlerError: (error, event) => logger.error(`Event handler failed for ${event.type}`, error),
  });
  const gate = new ConfirmationGate(events);

  const { backend, fallback } = overrides.backends ?? createBackends(config.ai);
  const interpreter = new CommandInterpreter({
    backend,
    fallback,
    timeoutMs: config.ai.timeoutMs,
    temperature: config.ai.temperature,
    maxTokens: config.ai.maxTokens,
  });

  const engine = new AutomationEngine({
    drivers: {
      browser:
        overrides.browser ??
        new PlaywrightBrowserDriver({
          headless: config.execution.headlessBrowser,
          channel: config.execution.browserChannel,
          timeoutMs: config.execution.actionTimeoutMs,
        }),
      system: overrides.system ?? createSystemDriver(config),
    },
    actionTimeoutMs: config.execution.actionTimeoutMs,
    gate,
    confirmationTimeoutMs: config.execution.confirmationTimeoutMs,
  });

  const tasks = new TaskManager({
    interpreter,
    engine,
    events,
    gate,
    store: new TaskStore({ capacity: config.tasks.historyLimit, maxAgeMs: config.tasks.maxAgeMs }),
    requireConfirmation: config.execution.requireConfirmation,
    historyContextSize: config.tasks.historyContextSize,
  });

  logger.info('Automation service initialized', {
    backend: backend.name,
    fallback: fallback?.name,
    systemControl: config.execution.enableSystemControl,
  });

  return {
    config,
    events,
    gate,
    interpreter,
    engine,
    tasks,
    start: () => tasks.start(),
    stop: async () => {
      await tasks.stop();
      events.removeAllListeners();
    },
  };
}
