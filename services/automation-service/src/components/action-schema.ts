import type { ActionDefinition, ActionKind, ParameterSpec } from '../types/action';
import { ACTION_KINDS } from '../types/action';

const str = (description: string, required = true): ParameterSpec => ({ type: 'string', required, description });

/**
 * The closed vocabulary of actions. Adding a kind means one entry here and one
 * handler in the engine's dispatch table.
 */
const DEFINITIONS: Record<ActionKind, ActionDefinition> = {
  open_browser: {
    kind: 'open_browser',
    affinity: 'browser',
    description: 'Open the web browser',
    parameters: {},
    blocking: true,
    sensitive: false,
  },
  navigate: {
    kind: 'navigate',
    affinity: 'browser',
    description: 'Go to a URL in the browser',
    parameters: { url: str('Address to open, scheme optional') },
    blocking: false,
    sensitive: false,
  },
  search_web: {
    kind: 'search_web',
    affinity: 'browser',
    description: 'Search on a website (google, youtube, bing, duckduckgo or any domain)',
    parameters: {
      query: str('Search terms'),
      site: str('Site to search on, defaults to google', false),
    },
    blocking: false,
    sensitive: false,
  },
  click: {
    kind: 'click',
    affinity: 'browser',
    description: 'Click a page element',
    parameters: { selector: str('CSS selector, or first_video for the first video result') },
    blocking: false,
    sensitive: false,
  },
  fill_field: {
    kind: 'fill_field',
    affinity: 'browser',
    description: 'Type text into a page form field',
    parameters: {
      selector: str('CSS selector of the field'),
      text: str('Text to enter'),
    },
    blocking: false,
    sensitive: false,
  },
  close_browser: {
    kind: 'close_browser',
    affinity: 'browser',
    description: 'Close the web browser',
    parameters: {},
    blocking: false,
    sensitive: false,
  },
  open_app: {
    kind: 'open_app',
    affinity: 'system',
    description: 'Launch a desktop application',
    parameters: { app_name: str('Application name, e.g. notepad or calculator') },
    blocking: true,
    sensitive: true,
  },
  press_key: {
    kind: 'press_key',
    affinity: 'system',
    description: 'Press a single keyboard key',
    parameters: { key: str('Key name, e.g. enter, space, tab') },
    blocking: false,
    sensitive: false,
  },
  hotkey: {
    kind: 'hotkey',
    affinity: 'system',
    description: 'Press a key combination',
    parameters: { keys: { ...str('Keys joined with +, e.g. ctrl+s'), separator: '+' } },
    blocking: false,
    sensitive: true,
  },
  type_text: {
    kind: 'type_text',
    affinity: 'system',
    description: 'Type text into the focused desktop window',
    parameters: { text: str('Text to type') },
    blocking: false,
    sensitive: true,
  },
  wait: {
    kind: 'wait',
    affinity: 'system',
    description: 'Pause for a number of seconds',
    parameters: {
      seconds: { type: 'number', required: true, description: 'Seconds to wait', min: 0, max: 300 },
    },
    blocking: false,
    sensitive: false,
  },
  screenshot: {
    kind: 'screenshot',
    affinity: 'system',
    description: 'Capture the screen to an image file',
    parameters: { filename: str('File name for the image', false) },
    blocking: false,
    sensitive: false,
  },
};

const KIND_SET: ReadonlySet<string> = new Set(ACTION_KINDS);

export function isActionKind(value: unknown): value is ActionKind {
  return typeof value === 'string' && KIND_SET.has(value);
}

export function getActionDefinition(kind: ActionKind): ActionDefinition {
  return DEFINITIONS[kind];
}

export function listActionDefinitions(): ActionDefinition[] {
  return ACTION_KINDS.map(kind => DEFINITIONS[kind]);
}

export function isBlocking(kind: ActionKind): boolean {
  return DEFINITIONS[kind].blocking;
}

export function isSensitive(kind: ActionKind): boolean {
  return DEFINITIONS[kind].sensitive;
}

function describeParameter(name: string, spec: ParameterSpec): string {
  const optional = spec.required ? '' : '?';
  return `${name}${optional}: ${spec.type}`;
}

/**
 * One line per kind, e.g. `- navigate(url: string): Go to a URL in the browser`.
 * Used verbatim in the interpreter prompt.
 */
export function describeActionSchema(): string {
  return listActionDefinitions()
    .map(def => {
      const params = Object.entries(def.parameters)
        .map(([name, spec]) => describeParameter(name, spec))
        .join(', ');
      return `- ${def.kind}(${params}): ${def.description}`;
    })
    .join('\n');
}
