import * as fs from 'fs';

// Set up test database path - use fixed path for this test file
const testDbPath = '/tmp/focus-test-report-cmd/test.db';

// Mock process.exit to prevent actual exits
const mockExit = jest.fn<never, []>();
jest.spyOn(process, 'exit').mockImplementation(mockExit);

// Mock chalk so output is plain text
jest.mock('chalk', () => {
  const mockFn = (s: unknown): string => String(s);
  const mockChalk = Object.assign(mockFn, {
    bold: mockFn,
    green: mockFn,
    gray: mockFn,
    red: mockFn,
    yellow: mockFn,
    cyan: mockFn,
  });
  return {
    __esModule: true,
    default: mockChalk,
  };
});

// Mock config to use test paths
jest.mock('../../../utils/config', () => {
  const actual = jest.requireActual<typeof import('../../../utils/config')>('../../../utils/config');
  const { DEFAULT_CONFIG } = jest.requireActual<typeof import('../../../types/config')>('../../../types/config');
  const { mkdirSync } = jest.requireActual<typeof import('fs')>('fs');

  return {
    ...actual,
    getDatabasePath: jest.fn(() => '/tmp/focus-test-report-cmd/test.db'),
    ensureDataDir: jest.fn(() => {
      mkdirSync('/tmp/focus-test-report-cmd', { recursive: true });
    }),
    loadConfig: jest.fn(() => ({ ...DEFAULT_CONFIG })),
  };
});

import { reportCommand } from '../report';
import { compareCommand } from '../compare';
import { AnalyticsDB } from '../../../db/database';
import { createAnalyticsEngine } from '../../../engine';
import { SessionType } from '../../../types/session';
import { jan } from '../../../__tests__/fixtures';

describe('report and compare commands', () => {
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  function printed(): string {
    return consoleLogSpy.mock.calls.map((call) => call.join(' ')).join('\n');
  }

  function errors(): string[] {
    return consoleErrorSpy.mock.calls.map((call) => call.join(' '));
  }

  /**
   * Record sessions back to back through a throwaway engine
   */
  function recordSessions(types: SessionType[]): void {
    const db = new AnalyticsDB(testDbPath);
    const engine = createAnalyticsEngine({ db });
    for (const type of types) {
      engine.store.startSession(type, type === 'work' ? 25 : 5);
      jest.advanceTimersByTime(2 * 60_000);
      engine.store.endSession(true);
    }
    engine.dispose();
    db.close();
  }

  beforeEach(() => {
    jest.useFakeTimers({ now: jan(15, 9) });
    fs.mkdirSync('/tmp/focus-test-report-cmd', { recursive: true });
    if (fs.existsSync(testDbPath)) {
      fs.unlinkSync(testDbPath);
    }

    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    mockExit.mockClear();
  });

  afterEach(() => {
    jest.useRealTimers();
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    if (fs.existsSync(testDbPath)) {
      fs.unlinkSync(testDbPath);
    }
  });

  describe('report', () => {
    it('should print the terminal report for the last 30 days', () => {
      recordSessions(['work', 'break', 'work']);

      reportCommand({});

      const lines = printed().split('\n');
      expect(lines).toContain('  FOCUS ANALYTICS REPORT');
      expect(lines).toContain('  Sessions: 3 (2 work, 1 break)');
      expect(lines).toContain('  Work Time: 4m');
      expect(mockExit).not.toHaveBeenCalled();
    });

    it('should print JSON when asked', () => {
      recordSessions(['work']);

      reportCommand({ format: 'json', range: 'today' });

      const report = JSON.parse(printed());
      expect(report.range).toEqual({ start: jan(15, 0).toISOString(), end: jan(16, 0).toISOString() });
      expect(report.sessions.workSessions).toBe(1);
    });

    it('should say when the range holds no sessions', () => {
      recordSessions(['work']);

      reportCommand({ from: '2023-06-01', to: '2023-06-30' });

      expect(printed()).toBe('No sessions found for the specified time range.');
    });

    it('should reject an unknown range preset', () => {
      reportCommand({ range: 'fortnight' });

      expect(errors()).toContain('Error: Unknown range "fortnight"');
      expect(mockExit).toHaveBeenCalledWith(1);
    });

    it('should reject an unknown format', () => {
      reportCommand({ format: 'xml' });

      expect(errors()).toContain('Error: Unknown format "xml". Use terminal or json');
      expect(mockExit).toHaveBeenCalledWith(1);
    });
  });

  describe('compare', () => {
    it('should compare this week with earlier weeks', () => {
      recordSessions(['work']);

      compareCommand('periods', { count: '1' });

      const lines = printed().split('\n');
      expect(lines[0]).toBe('Current period: Jan 8 - Jan 15, 2024');
      expect(lines[1]).toBe('  Verdict: stable');
      expect(lines[2].startsWith('    vs Jan 1 - Jan 8, 2024: ')).toBe(true);
    });

    it('should write the weekday comparison as JSON', () => {
      recordSessions(['work']);

      compareCommand('weekdays', { format: 'json' });

      const section = JSON.parse(printed());
      expect(section.kind).toBe('weekdays');
      expect(section.result.status).toBe('insufficient_data');
    });

    it('should reject an unknown comparison or granularity', () => {
      compareCommand('months', {});
      compareCommand('periods', { granularity: 'hourly' });

      expect(errors()).toEqual([
        'Error: Unknown comparison "months". Use periods, weekdays, time-periods',
        'Error: Unknown granularity "hourly". Use daily, weekly, monthly',
      ]);
      expect(mockExit).toHaveBeenCalledTimes(2);
    });
  });
});
