import { describe, test, expect } from 'vitest';
import { getEnv, getEnvBoolean, getEnvNumber, getEnvOptional } from '../src/env';
import { ConfigurationError } from '../src/errors';

describe('env helpers', () => {
  const env = { NAME: 'autopilot', EMPTY: '  ', PORT: '8080', RATIO: '0.5', BAD: 'abc', FLAG: 'YES' };

  test('getEnv returns the value or the default', () => {
    expect(getEnv('NAME', undefined, env)).toBe('autopilot');
    expect(getEnv('MISSING', 'fallback', env)).toBe('fallback');
  });

  test('getEnv treats blank values as unset', () => {
    expect(getEnv('EMPTY', 'fallback', env)).toBe('fallback');
    expect(getEnvOptional('EMPTY', env)).toBeUndefined();
  });

  test('getEnv throws ConfigurationError when required and unset', () => {
    expect(() => getEnv('MISSING', undefined, env)).toThrow(ConfigurationError);
  });

  test('getEnvNumber parses integers and decimals', () => {
    expect(getEnvNumber('PORT', undefined, env)).toBe(8080);
    expect(getEnvNumber('RATIO', undefined, env)).toBe(0.5);
    expect(getEnvNumber('MISSING', 3, env)).toBe(3);
  });

  test('getEnvNumber rejects non-numeric values', () => {
    expect(() => getEnvNumber('BAD', 1, env)).toThrow('Environment variable BAD must be a valid number');
  });

  test('getEnvBoolean accepts true, 1 and yes', () => {
    expect(getEnvBoolean('FLAG', false, env)).toBe(true);
    expect(getEnvBoolean('NAME', true, env)).toBe(false);
    expect(getEnvBoolean('MISSING', true, env)).toBe(true);
  });
});
