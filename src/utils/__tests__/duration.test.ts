jest.mock('../logger', () => ({
  logger: {
    warning: jest.fn(),
  },
}));

import { formatMinutes, sanitizePlannedMinutes } from '../duration';
import { logger } from '../logger';
import { DEFAULT_CONFIG } from '../../types/config';

describe('sanitizePlannedMinutes', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should keep a sensible duration', () => {
    expect(sanitizePlannedMinutes('work', 50, DEFAULT_CONFIG)).toBe(50);
    expect(logger.warning).not.toHaveBeenCalled();
  });

  it('should fall back to the default for the session type', () => {
    expect(sanitizePlannedMinutes('work', -5, DEFAULT_CONFIG)).toBe(25);
    expect(sanitizePlannedMinutes('break', 0, DEFAULT_CONFIG)).toBe(5);
    expect(sanitizePlannedMinutes('work', Number.NaN, DEFAULT_CONFIG)).toBe(25);
    expect(logger.warning).toHaveBeenCalledTimes(3);
  });

  it('should reject a timestamp passed where minutes were expected', () => {
    expect(sanitizePlannedMinutes('work', 1705312800000, DEFAULT_CONFIG)).toBe(25);
  });

  it('should use configured defaults', () => {
    expect(sanitizePlannedMinutes('break', 1441, { defaultWorkMinutes: 50, defaultBreakMinutes: 10 })).toBe(10);
  });
});

describe('formatMinutes', () => {
  it('should format minutes only', () => {
    expect(formatMinutes(45)).toBe('45m');
  });

  it('should format whole hours', () => {
    expect(formatMinutes(120)).toBe('2h');
  });

  it('should format hours and minutes', () => {
    expect(formatMinutes(65)).toBe('1h 5m');
    expect(formatMinutes(89.6)).toBe('1h 30m');
  });
});
