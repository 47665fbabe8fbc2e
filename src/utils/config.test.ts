import { describe, it, expect } from 'vitest';
import { getDefaultPageSize, getLogLevel, shouldClearScreen, shouldUsePretty } from './config';

describe('getLogLevel', () => {
  it('should accept known levels in any case', () => {
    expect(getLogLevel({ LOG_LEVEL: 'DEBUG' })).toBe('debug');
    expect(getLogLevel({ LOG_LEVEL: 'silent' })).toBe('silent');
  });

  it('should fall back to warn', () => {
    expect(getLogLevel({})).toBe('warn');
    expect(getLogLevel({ LOG_LEVEL: 'verbose' })).toBe('warn');
  });
});

describe('shouldUsePretty', () => {
  it('should be off unless requested', () => {
    expect(shouldUsePretty({})).toBe(false);
    expect(shouldUsePretty({ LOG_PRETTY: 'false' })).toBe(false);
    expect(shouldUsePretty({ LOG_PRETTY: 'true' })).toBe(true);
  });
});

describe('getDefaultPageSize', () => {
  it('should read a positive integer', () => {
    expect(getDefaultPageSize({ PROMPTS_PAGE_SIZE: '5' })).toBe(5);
  });

  it('should fall back to 3 for missing or invalid values', () => {
    expect(getDefaultPageSize({})).toBe(3);
    expect(getDefaultPageSize({ PROMPTS_PAGE_SIZE: '0' })).toBe(3);
    expect(getDefaultPageSize({ PROMPTS_PAGE_SIZE: 'abc' })).toBe(3);
    expect(getDefaultPageSize({ PROMPTS_PAGE_SIZE: '-2' })).toBe(3);
  });
});

describe('shouldClearScreen', () => {
  it('should clear unless PROMPTS_NO_CLEAR is set', () => {
    expect(shouldClearScreen({})).toBe(true);
    expect(shouldClearScreen({ PROMPTS_NO_CLEAR: '1' })).toBe(false);
    expect(shouldClearScreen({ PROMPTS_NO_CLEAR: 'no' })).toBe(true);
  });
});
