import * as fs from 'fs';

// Set up test database path - use fixed path for this test file
const testDbPath = '/tmp/focus-test-status-cmd/test.db';

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
    getDatabasePath: jest.fn(() => '/tmp/focus-test-status-cmd/test.db'),
    ensureDataDir: jest.fn(() => {
      mkdirSync('/tmp/focus-test-status-cmd', { recursive: true });
    }),
    loadConfig: jest.fn(() => ({ ...DEFAULT_CONFIG })),
  };
});

import { statusCommand } from '../status';
import { AnalyticsDB } from '../../../db/database';
import { createAnalyticsEngine } from '../../../engine';
import { jan } from '../../../__tests__/fixtures';

describe('status command', () => {
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  function output(): string[] {
    return consoleLogSpy.mock.calls.map((call) => call.join(' '));
  }

  /**
   * Record one short work session through a throwaway engine
   */
  function recordWorkSession(minutes: number): void {
    const db = new AnalyticsDB(testDbPath);
    const engine = createAnalyticsEngine({ db });
    engine.store.startSession('work', 25);
    jest.advanceTimersByTime(minutes * 60_000);
    engine.store.endSession(true);
    engine.dispose();
    db.close();
  }

  beforeEach(() => {
    jest.useFakeTimers({ now: jan(15, 9) });
    fs.mkdirSync('/tmp/focus-test-status-cmd', { recursive: true });
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

  it('should say when nothing has been recorded', () => {
    statusCommand();

    expect(output()).toEqual(['No sessions recorded yet.']);
    expect(mockExit).not.toHaveBeenCalled();
  });

  it("should show today's, this week's and all-time totals", () => {
    recordWorkSession(2);
    recordWorkSession(2);

    statusCommand();

    const lines = output();
    expect(lines).toEqual(
      expect.arrayContaining([
        "Today's Summary:",
        '  Work sessions: 2 (2 completed)',
        '  Work time: 4m',
        '  Breaks: 0 (0m)',
        '  Productivity: 70',
        'This Week (2024-W03):',
        '  Work sessions: 2, 4m',
        '  Sessions: 2, work 4m',
        '  Longest streak: 2 completed session(s)',
      ])
    );
    expect(lines.some((line) => line.startsWith('  Productivity on '))).toBe(false);
    expect(mockExit).not.toHaveBeenCalled();
  });

  it("should highlight today's productivity once five sessions are recorded", () => {
    for (let i = 0; i < 5; i++) {
      recordWorkSession(2);
    }

    statusCommand();

    const lines = output();
    expect(lines).toEqual(expect.arrayContaining(['  Work sessions: 5 (5 completed)', 'Highlights:']));
    expect(lines.filter((line) => /^  Productivity on 2024-01-15: [\d.]+ \(5 sessions\)$/.test(line))).toHaveLength(1);
    expect(mockExit).not.toHaveBeenCalled();
  });
});
