import { describe, it, expect } from '@jest/globals';
import { LogLevel, isLevelEnabled, parseLogLevel } from '../../../src/logging/LogLevel.js';

describe('parseLogLevel', () => {
  it.each([
    ['trace', LogLevel.TRACE],
    ['DEBUG', LogLevel.DEBUG],
    [' info ', LogLevel.INFO],
    ['warn', LogLevel.WARN],
    ['WARNING', LogLevel.WARN],
    ['error', LogLevel.ERROR],
  ])('parses %p', (input, expected) => {
    expect(parseLogLevel(input)).toBe(expected);
  });

  it('falls back to INFO for unknown names', () => {
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    expect(parseLogLevel('')).toBe(LogLevel.INFO);
  });
});

describe('isLevelEnabled', () => {
  it('passes messages at or above the threshold', () => {
    expect(isLevelEnabled(LogLevel.ERROR, LogLevel.INFO)).toBe(true);
    expect(isLevelEnabled(LogLevel.INFO, LogLevel.INFO)).toBe(true);
    expect(isLevelEnabled(LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
    expect(isLevelEnabled(LogLevel.TRACE, LogLevel.TRACE)).toBe(true);
  });
});
