import { describe, it, expect } from 'vitest';
import { parseCommandWithRules, RuleBasedProvider } from '../llm/providers/rules';

describe('parseCommandWithRules', () => {
  it('should split clauses and keep their order', () => {
    expect(parseCommandWithRules('open chrome and go to google.com')).toEqual([
      { kind: 'open_browser', parameters: {} },
      { kind: 'navigate', parameters: { url: 'google.com' } },
    ]);
  });

  it('should turn "play" into a youtube search and a click', () => {
    expect(parseCommandWithRules('play lofi beats on youtube')).toEqual([
      { kind: 'search_web', parameters: { site: 'youtube', query: 'lofi beats' } },
      { kind: 'click', parameters: { selector: 'first_video' } },
    ]);
  });

  it('should recognise searches with and without a site', () => {
    expect(parseCommandWithRules('search for weather in Paris')).toEqual([
      { kind: 'search_web', parameters: { query: 'weather in Paris' } },
    ]);
    expect(parseCommandWithRules('search cats on bing')).toEqual([
      { kind: 'search_web', parameters: { query: 'cats', site: 'bing' } },
    ]);
  });

  it('should map desktop commands', () => {
    expect(parseCommandWithRules('open notepad, type "hello", press ctrl+s')).toEqual([
      { kind: 'open_app', parameters: { app_name: 'notepad' } },
      { kind: 'type_text', parameters: { text: 'hello' } },
      { kind: 'hotkey', parameters: { keys: 'ctrl+s' } },
    ]);
    expect(parseCommandWithRules('press enter')).toEqual([{ kind: 'press_key', parameters: { key: 'enter' } }]);
  });

  it('should parse waits, screenshots and closing the browser', () => {
    expect(parseCommandWithRules('wait 3 seconds then take a screenshot then close the browser')).toEqual([
      { kind: 'wait', parameters: { seconds: 3 } },
      { kind: 'screenshot', parameters: {} },
      { kind: 'close_browser', parameters: {} },
    ]);
  });

  it('should keep "and" and commas inside queries and typed text', () => {
    expect(parseCommandWithRules('search for salt and pepper')).toEqual([
      { kind: 'search_web', parameters: { query: 'salt and pepper' } },
    ]);
    expect(parseCommandWithRules('type hello, world and then press enter')).toEqual([
      { kind: 'type_text', parameters: { text: 'hello, world' } },
      { kind: 'press_key', parameters: { key: 'enter' } },
    ]);
  });

  it('should return nothing for gibberish', () => {
    expect(parseCommandWithRules('asdkjasd')).toEqual([]);
  });
});

describe('RuleBasedProvider', () => {
  it('should answer the last user message as a JSON plan', async () => {
    const provider = new RuleBasedProvider();
    const response = await provider.complete({
      messages: [
        { role: 'system', content: 'instructions' },
        { role: 'user', content: 'open youtube' },
      ],
    });

    expect(response.model).toBe('rules');
    expect(JSON.parse(response.content)).toEqual([
      { kind: 'navigate', parameters: { url: 'https://www.youtube.com' } },
    ]);
  });
});
