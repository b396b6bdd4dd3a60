import * as fs from 'fs';

// Set up test database path - use fixed path for this test file
const testDataDir = '/tmp/focus-test-template-cmd';
const testDbPath = `${testDataDir}/test.db`;
const testConfigFile = `${testDataDir}/focus-only.json`;

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
    getDatabasePath: jest.fn(() => '/tmp/focus-test-template-cmd/test.db'),
    ensureDataDir: jest.fn(() => {
      mkdirSync('/tmp/focus-test-template-cmd', { recursive: true });
    }),
    loadConfig: jest.fn(() => ({ ...DEFAULT_CONFIG })),
  };
});

import { collectParam, parseParamOverrides, templateCommand } from '../template';
import { buildCommand } from '../build';
import { AnalyticsDB } from '../../../db/database';
import { ParseError } from '../../../types/errors';
import { jan, makeSession, seedHistory } from '../../../__tests__/fixtures';

describe('parseParamOverrides', () => {
  it('should group overrides by section and coerce values', () => {
    expect(
      parseParamOverrides(['Week over week.kind=weekdays', 'Rows.limit=5', 'Rows.verbose=true', 'a.b.c=x'])
    ).toEqual({
      'Week over week': { kind: 'weekdays' },
      Rows: { limit: 5, verbose: true },
      'a.b': { c: 'x' },
    });
  });

  it('should reject an override without a section', () => {
    expect(() => parseParamOverrides(['limit=5'])).toThrow(ParseError);
    expect(() => parseParamOverrides(['limit=5'])).toThrow('Expected section.key=value: "limit=5"');
  });
});

describe('collectParam', () => {
  it('should accumulate repeated values', () => {
    expect(collectParam('a.b=1')).toEqual(['a.b=1']);
    expect(collectParam('c.d=2', ['a.b=1'])).toEqual(['a.b=1', 'c.d=2']);
  });
});

describe('template and build commands', () => {
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  function printed(): string[] {
    return consoleLogSpy.mock.calls.map((call) => call.join(' '));
  }

  beforeEach(() => {
    jest.useFakeTimers({ now: jan(15, 12) });
    fs.rmSync(testDataDir, { recursive: true, force: true });
    fs.mkdirSync(testDataDir, { recursive: true });

    const db = new AnalyticsDB(testDbPath);
    seedHistory(db, [makeSession({ start: jan(15, 9) }), makeSession({ start: jan(12, 9) })]);
    db.close();

    fs.writeFileSync(
      testConfigFile,
      JSON.stringify({
        name: 'Focus only',
        dateRange: 'last_7_days',
        sections: [{ name: 'Rows', type: 'raw_data', parameters: { limit: 10 } }],
      })
    );

    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    mockExit.mockClear();
  });

  afterEach(() => {
    jest.useRealTimers();
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    fs.rmSync(testDataDir, { recursive: true, force: true });
  });

  it('should list the built-in templates', () => {
    templateCommand(undefined, [], {});

    expect(printed()).toEqual([
      '\nReport Templates:\n',
      `  ${'daily-review'.padEnd(20)} Today at a glance (built-in)`,
      `  ${'weekly-review'.padEnd(20)} The last seven days against the week before (built-in)`,
      '',
    ]);
  });

  it('should save a template from a file and keep it across runs', () => {
    templateCommand('save', ['focus-only', testConfigFile], { description: 'Raw rows' });
    consoleLogSpy.mockClear();
    templateCommand('list', [], {});

    expect(printed()).toContain(`  ${'focus-only'.padEnd(20)} Raw rows`);
  });

  it('should run a template with parameter and range overrides', () => {
    templateCommand('save', ['focus-only', testConfigFile], {});
    consoleLogSpy.mockClear();

    templateCommand('run', ['focus-only'], { param: ['Rows.limit=1'], range: 'today', format: 'json' });

    const report = JSON.parse(printed()[0]);
    expect(report.name).toBe('Focus only');
    expect(report.range.start).toBe(jan(15, 0).toISOString());
    expect(report.sections[0].data).toHaveLength(1);
    expect(report.sections[0].data[0].startTime).toBe(jan(15, 9).toISOString());
  });

  it('should refuse to delete a built-in template', () => {
    templateCommand('delete', ['daily-review'], {});

    expect(consoleErrorSpy).toHaveBeenCalledWith('Error: Template "daily-review" cannot be deleted');
    expect(mockExit).toHaveBeenCalledWith(1);
  });

  it('should report unknown templates and subcommands', () => {
    templateCommand('show', ['monthly'], {});
    templateCommand('rename', [], {});
    templateCommand('run', [], {});

    expect(consoleErrorSpy.mock.calls.map((call) => call.join(' '))).toEqual([
      'Error: Unknown template: monthly',
      "Error: Unknown subcommand 'rename'. Available subcommands: list, show, save, delete, run",
      'Error: Missing template name',
    ]);
    expect(mockExit).toHaveBeenCalledTimes(3);
  });

  it('should build a report straight from a config file', () => {
    buildCommand(testConfigFile, {});

    const lines = printed()[0].split('\n');
    expect(lines).toContain('  FOCUS ONLY');
    expect(lines).toContain('  2 session(s)');
  });

  it('should fail on an unreadable config file', () => {
    buildCommand(`${testDataDir}/missing.json`, {});

    const message: string = consoleErrorSpy.mock.calls[0][0];
    expect(message.startsWith(`Error: Cannot read ${testDataDir}/missing.json: `)).toBe(true);
    expect(mockExit).toHaveBeenCalledWith(1);
  });
});
