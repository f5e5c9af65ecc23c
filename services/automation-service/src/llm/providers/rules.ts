/**
 * Rule-based Provider
 *
 * Keyword parser that answers in the same JSON format as the model backends.
 * Used offline and as the fallback when the configured backend is unreachable.
 */

import type { AIBackend, CompletionRequest, LLMResponse } from '../types';
import { lastUserMessage } from '../types';

export interface RuleEntry {
  kind: string;
  parameters: Record<string, string | number>;
}

const BROWSER_WORDS = new Set(['browser', 'chrome', 'chromium', 'firefox', 'edge', 'the browser', 'web browser']);
const SEARCH_SITES = ['youtube', 'google', 'bing', 'duckduckgo'];
const CLAUSE_VERBS =
  'open|launch|start|run|go|navigate|visit|browse|search|look|google|play|type|write|press|hit|wait|take|close|click|fill';
// separators count only before a verb, so "salt and pepper" stays one query
const CLAUSE_SPLIT = new RegExp(`(?:\\s*(?:,|;|\\band\\b|\\bthen\\b))+\\s*(?=(?:${CLAUSE_VERBS})\\b)`, 'i');
const URL_PATTERN = /\b((?:https?:\/\/)?(?:[a-z0-9-]+\.)+[a-z]{2,}(?:\/\S*)?)/i;

function stripQuotes(value: string): string {
  return value.trim().replace(/^["'“‘]+|["'”’]+$/g, '').trim();
}

function parseClause(clause: string): RuleEntry[] {
  const text = clause.trim();
  const lower = text.toLowerCase();
  if (!lower) {
    return [];
  }

  if (/\bclose\b/.test(lower) && /\b(browser|chrome|chromium|firefox|edge)\b/.test(lower)) {
    return [{ kind: 'close_browser', parameters: {} }];
  }

  if (/\bscreen\s?shot\b/.test(lower)) {
    return [{ kind: 'screenshot', parameters: {} }];
  }

  const wait = /\bwait\s+(?:for\s+)?(\d+(?:\.\d+)?)/.exec(lower);
  if (wait) {
    return [{ kind: 'wait', parameters: { seconds: Number(wait[1]) } }];
  }

  const press = /\b(?:press|hit)\s+([a-z0-9]+(?:\s*\+\s*[a-z0-9]+)*)/.exec(lower);
  if (press) {
    const keys = press[1].replace(/\s+/g, '');
    return keys.includes('+')
      ? [{ kind: 'hotkey', parameters: { keys } }]
      : [{ kind: 'press_key', parameters: { key: keys } }];
  }

  const type = /\b(?:type|write)\s+(.+)$/i.exec(text);
  if (type) {
    const typed = stripQuotes(type[1]);
    return typed ? [{ kind: 'type_text', parameters: { text: typed } }] : [];
  }

  const play = /\bplay\s+(.+?)(?:\s+on\s+youtube)?$/i.exec(text);
  if (play) {
    return [
      { kind: 'search_web', parameters: { site: 'youtube', query: stripQuotes(play[1]) } },
      { kind: 'click', parameters: { selector: 'first_video' } },
    ];
  }

  const search = /\b(?:search|look up|google)\s+(?:for\s+)?(.+?)(?:\s+on\s+([a-z0-9.-]+))?$/i.exec(text);
  if (search) {
    const site = search[2]?.toLowerCase();
    const query = stripQuotes(search[1]);
    if (!query) {
      return [];
    }
    return [{ kind: 'search_web', parameters: site ? { query, site } : { query } }];
  }

  const url = URL_PATTERN.exec(text);
  if (url && /\b(go to|navigate|visit|open|browse)\b/.test(lower)) {
    return [{ kind: 'navigate', parameters: { url: url[1] } }];
  }

  const open = /\b(?:open|launch|start|run)\s+(?:up\s+)?(?:the\s+)?(.+)$/i.exec(text);
  if (open) {
    const target = open[1].trim().toLowerCase();
    if (BROWSER_WORDS.has(target)) {
      return [{ kind: 'open_browser', parameters: {} }];
    }
    if (SEARCH_SITES.includes(target)) {
      return [{ kind: 'navigate', parameters: { url: `https://www.${target}.com` } }];
    }
    return [{ kind: 'open_app', parameters: { app_name: target } }];
  }

  const site = SEARCH_SITES.find(name => lower.includes(name));
  if (site && /\b(go to|visit|navigate)\b/.test(lower)) {
    return [{ kind: 'navigate', parameters: { url: `https://www.${site}.com` } }];
  }

  return [];
}

/**
 * Split a command into clauses ("open chrome and go to google.com") and map
 * each clause to zero or more entries, in order.
 */
export function parseCommandWithRules(command: string): RuleEntry[] {
  return command
    .split(CLAUSE_SPLIT)
    .flatMap(clause => parseClause(clause));
}

export class RuleBasedProvider implements AIBackend {
  readonly name = 'rules';

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    const command = lastUserMessage(request.messages);
    const content = JSON.stringify(parseCommandWithRules(command));

    return {
      content,
      model: 'rules',
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    };
  }
}
