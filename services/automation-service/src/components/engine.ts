import { logger as rootLogger, TimeoutError, ValidationError, withTimeout } from '@autopilot/shared-utils';
import type { Action, ActionError, ActionKind, ActionResult, ParameterValue, Plan } from '../types/action';
import type { Drivers } from '../drivers/types';
import { isBlocking, isSensitive } from './action-schema';
import type { ConfirmationGate } from './confirmation-gate';
import { BlockedActionError, CancellationError, ConfirmationDeniedError, toTaskError } from '../errors';

const logger = rootLogger.child('engine');

type ActionOutput = Record<string, ParameterValue>;
type Parameters = Action['parameters'];
type ActionHandler = (parameters: Parameters) => Promise<ActionOutput | void>;

export interface AutomationEngineOptions {
  drivers: Drivers;
  actionTimeoutMs: number;
  gate?: ConfirmationGate;
  confirmationTimeoutMs?: number;
}

export interface ExecuteOptions {
  /** Reported to the confirmation gate; defaults to "adhoc" */
  taskId?: string;
  signal?: AbortSignal;
  requireConfirmation?: boolean;
  onActionStart?: (index: number, action: Action) => void;
  onActionResult?: (result: ActionResult) => void;
}

// a wait action may legitimately outlast the per-action timeout
const WAIT_GRACE_MS = 1000;

function stringParam(parameters: Parameters, name: string): string {
  const value = parameters[name];
  if (typeof value !== 'string') {
    throw new ValidationError(`Parameter ${name} must be a string`, 'engine', { parameter: name });
  }
  return value;
}

function optionalStringParam(parameters: Parameters, name: string): string | undefined {
  return parameters[name] === undefined ? undefined : stringParam(parameters, name);
}

function numberParam(parameters: Parameters, name: string): number {
  const value = parameters[name];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`Parameter ${name} must be a number`, 'engine', { parameter: name });
  }
  return value;
}

function toActionError(error: unknown): ActionError {
  const { kind, code, message } = toTaskError(error);
  return { kind, code, message };
}

/**
 * Runs a plan action by action against the browser and system drivers.
 *
 * Never throws for an action failure: every action ends up in the returned
 * results, in plan order, as succeeded, failed or skipped.
 */
export class AutomationEngine {
  private handlers: Record<ActionKind, ActionHandler>;
  private drivers: Drivers;
  private actionTimeoutMs: number;
  private gate?: ConfirmationGate;
  private confirmationTimeoutMs: number;
  // driver calls that timed out but have not settled yet
  private abandoned = new Set<Promise<void>>();

  constructor(options: AutomationEngineOptions) {
    this.drivers = options.drivers;
    this.actionTimeoutMs = options.actionTimeoutMs;
    this.gate = options.gate;
    this.confirmationTimeoutMs = options.confirmationTimeoutMs ?? 60_000;
    this.handlers = this.buildHandlers(options.drivers);
  }

  async execute(plan: Plan, options: ExecuteOptions = {}): Promise<ActionResult[]> {
    const taskId = options.taskId ?? 'adhoc';
    const results: ActionResult[] = [];
    let blockedBy: ActionResult | undefined;

    logger.info(`Executing ${plan.length} action(s)`, { taskId });

    for (const [index, action] of plan.entries()) {
      let result: ActionResult;
      await this.idle();

      if (blockedBy) {
        result = this.skipped(index, action, new BlockedActionError(blockedBy.index, blockedBy.kind));
      } else if (options.signal?.aborted) {
        result = this.skipped(index, action, new CancellationError(taskId));
      } else if (!(await this.approved(taskId, index, action, options))) {
        result = options.signal?.aborted
          ? this.skipped(index, action, new CancellationError(taskId))
          : this.skipped(index, action, new ConfirmationDeniedError(index, action.kind));
      } else {
        options.onActionStart?.(index, action);
        result = await this.dispatch(index, action);
        if (result.status === 'failed' && isBlocking(action.kind)) {
          logger.error(`Blocking action ${index} (${action.kind}) failed, skipping the rest of the plan`, {
            taskId,
            error: result.error?.message,
          });
          blockedBy = result;
        }
      }

      results.push(result);
      options.onActionResult?.(result);
    }

    const failed = results.filter(r => r.status === 'failed').length;
    const skipped = results.filter(r => r.status === 'skipped').length;
    logger.info(`Execution finished`, { taskId, actions: results.length, failed, skipped });
    return results;
  }

  /**
   * Resolves once every driver call abandoned after a timeout has settled.
   * A plan must not start on the drivers before then.
   */
  async idle(): Promise<void> {
    while (this.abandoned.size > 0) {
      logger.warn(`Waiting for ${this.abandoned.size} timed-out driver call(s) to settle`);
      await Promise.all([...this.abandoned]);
    }
  }

  /** Releases driver resources. */
  async cleanup(): Promise<void> {
    if (this.drivers.browser.isOpen()) {
      await this.drivers.browser.close();
    }
  }

  private async approved(taskId: string, index: number, action: Action, options: ExecuteOptions): Promise<boolean> {
    if (!options.requireConfirmation || !isSensitive(action.kind)) {
      return true;
    }
    if (!this.gate) {
      logger.warn(`No confirmation gate configured, denying ${action.kind}`, { taskId });
      return false;
    }
    return this.gate.request(
      { taskId, actionIndex: index, action },
      { timeoutMs: this.confirmationTimeoutMs, signal: options.signal }
    );
  }

  private async dispatch(index: number, action: Action): Promise<ActionResult> {
    const startedAt = new Date();
    const handler = this.handlers[action.kind];

    let work: Promise<ActionOutput | void> | undefined;
    try {
      work = handler(action.parameters);
      const output = await withTimeout(work, this.timeoutFor(action), action.kind, 'engine');
      const completedAt = new Date();
      const result: ActionResult = {
        index,
        kind: action.kind,
        status: 'succeeded',
        started_at: startedAt.toISOString(),
        completed_at: completedAt.toISOString(),
        duration_ms: completedAt.getTime() - startedAt.getTime(),
        ...(output ? { output: Object.freeze(output) } : {}),
      };
      return Object.freeze(result);
    } catch (error) {
      if (error instanceof TimeoutError && work) {
        this.abandon(work);
      }
      const completedAt = new Date();
      logger.warn(`Action ${index} (${action.kind}) failed`, error);
      const result: ActionResult = {
        index,
        kind: action.kind,
        status: 'failed',
        started_at: startedAt.toISOString(),
        completed_at: completedAt.toISOString(),
        duration_ms: completedAt.getTime() - startedAt.getTime(),
        error: toActionError(error),
      };
      return Object.freeze(result);
    }
  }

  private abandon(work: Promise<unknown>): void {
    const settled: Promise<void> = work.then(
      () => {
        this.abandoned.delete(settled);
      },
      () => {
        this.abandoned.delete(settled);
      }
    );
    this.abandoned.add(settled);
  }

  private skipped(index: number, action: Action, reason: unknown): ActionResult {
    const result: ActionResult = {
      index,
      kind: action.kind,
      status: 'skipped',
      completed_at: new Date().toISOString(),
      duration_ms: 0,
      error: toActionError(reason),
    };
    return Object.freeze(result);
  }

  private timeoutFor(action: Action): number {
    if (action.kind === 'wait') {
      const waitMs = numberParam(action.parameters, 'seconds') * 1000;
      return Math.max(this.actionTimeoutMs, waitMs + WAIT_GRACE_MS);
    }
    return this.actionTimeoutMs;
  }

  private buildHandlers({ browser, system }: Drivers): Record<ActionKind, ActionHandler> {
    return {
      open_browser: () => browser.open(),
      navigate: p => browser.navigate(stringParam(p, 'url')),
      search_web: p => browser.search(optionalStringParam(p, 'site') ?? 'google', stringParam(p, 'query')),
      click: p => browser.click(stringParam(p, 'selector')),
      fill_field: p => browser.type(stringParam(p, 'selector'), stringParam(p, 'text')),
      close_browser: () => browser.close(),
      open_app: p => system.launchApplication(stringParam(p, 'app_name')),
      press_key: p => system.pressKey(stringParam(p, 'key')),
      hotkey: p => system.hotkey(stringParam(p, 'keys').split('+')),
      type_text: p => system.typeText(stringParam(p, 'text')),
      wait: p => system.wait(numberParam(p, 'seconds') * 1000),
      screenshot: async p => ({ path: await system.screenshot(optionalStringParam(p, 'filename')) }),
    };
  }
}
