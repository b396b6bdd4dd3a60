// Mock chalk so formatted lines are plain text
jest.mock('chalk', () => {
  const mockFn = (s: unknown): string => String(s);
  const chained = Object.assign(mockFn, {
    bold: mockFn,
    cyan: mockFn,
    yellow: mockFn,
    green: mockFn,
    red: mockFn,
    gray: mockFn,
  });
  return {
    __esModule: true,
    default: chained,
  };
});

import { escapeCSV, formatCsvSessions } from '../formatters/csv';
import { formatJsonReport } from '../formatters/json';
import {
  formatComparison,
  formatHeatmap,
  formatTerminalBuiltReport,
  formatTerminalReport,
} from '../formatters/terminal';
import { toRawSessionRow } from '../builder';
import { ComparisonAnalytics } from '../comparison';
import { createAnalyticsEngine } from '../../engine';
import { MemorySnapshots, jan, makeInterruption, makeSession, seedHistory, seededStore } from '../../__tests__/fixtures';

describe('csv formatter', () => {
  it('should quote fields with commas, quotes or newlines', () => {
    expect(escapeCSV('a,b')).toBe('"a,b"');
    expect(escapeCSV('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCSV('two\nlines')).toBe('"two\nlines"');
    expect(escapeCSV('plain')).toBe('plain');
  });

  it('should write scalars as text and undefined as empty', () => {
    expect(escapeCSV(true)).toBe('true');
    expect(escapeCSV(12.5)).toBe('12.5');
    expect(escapeCSV(undefined)).toBe('');
  });

  it('should write a header and one line per session', () => {
    const session = makeSession({ start: new Date('2024-01-15T09:00:00.000Z') });
    const csv = formatCsvSessions([toRawSessionRow(session)]);

    expect(csv.split('\n')).toEqual([
      'sessionId,type,startTime,endTime,plannedMinutes,actualMinutes,completed,focusScore,efficiencyScore,interruptions,interactions',
      `${session.sessionId},work,2024-01-15T09:00:00.000Z,2024-01-15T09:25:00.000Z,25,25,true,70,80,0,0`,
    ]);
  });

  it('should write only the header for no sessions', () => {
    expect(formatCsvSessions([]).split('\n')).toHaveLength(1);
  });
});

describe('json formatter', () => {
  it('should write dates as ISO strings and flatten maps and sets', () => {
    const json = formatJsonReport({
      generatedAt: new Date('2024-01-15T09:00:00.000Z'),
      tags: new Set(['deep', 'morning']),
      byType: new Map([['manual_pause', 2]]),
      render: () => 'skipped',
    });

    expect(JSON.parse(json)).toEqual({
      generatedAt: '2024-01-15T09:00:00.000Z',
      tags: ['deep', 'morning'],
      byType: { manual_pause: 2 },
    });
    expect(json.split('\n')[1]).toBe('  "generatedAt": "2024-01-15T09:00:00.000Z",');
  });
});

describe('terminal formatter', () => {
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  it('should lay out a built report with failures and warnings', () => {
    const output = formatTerminalBuiltReport({
      name: 'Weekly',
      generatedAt: jan(22, 12),
      range: { start: jan(15, 0), end: jan(22, 0) },
      sections: [
        { name: 'Advice', status: 'ok', type: 'recommendations', data: ['Keep going.'] },
        { name: 'Compare', type: 'comparison', status: 'failed', error: 'Parameter "count" must be a number' },
      ],
      warnings: ['Section "Compare" (comparison) failed: Parameter "count" must be a number'],
    });

    const rule = '═'.repeat(80);
    const thin = '─'.repeat(80);
    expect(output.split('\n')).toEqual([
      '',
      rule,
      '  WEEKLY',
      '  Jan 15 - Jan 21, 2024',
      rule,
      '',
      'ADVICE',
      thin,
      '  • Keep going.',
      '',
      'COMPARE',
      thin,
      '  Failed: Parameter "count" must be a number',
      '',
      '⚠️  WARNINGS',
      thin,
      '  Section "Compare" (comparison) failed: Parameter "count" must be a number',
      '',
    ]);
  });

  it('should describe period changes with direction markers', () => {
    const { store } = seededStore([
      makeSession({ start: jan(15, 9), focusScore: 80, efficiencyScore: 90 }),
      makeSession({
        start: jan(8, 9),
        focusScore: 60,
        efficiencyScore: 70,
        interruptions: [makeInterruption(jan(8, 9, 5))],
      }),
    ]);
    const result = new ComparisonAnalytics(store, () => jan(22, 12)).comparePeriods('weekly', jan(15, 0), jan(22, 0), 1);

    expect(formatComparison({ kind: 'periods', result })).toEqual([
      '  Verdict: improving',
      '    vs Jan 8 - Jan 14, 2024: focus ↑ +33.3%, efficiency ↑ +28.6%, completion 0%, interruptions ↓ -100%',
      '  • Focus improved by 33.3% compared with the previous week.',
    ]);
  });

  it('should pass an insufficient weekday comparison through', () => {
    expect(
      formatComparison({
        kind: 'weekdays',
        result: { status: 'insufficient_data', required: 1, available: 0, message: 'Not enough sessions' },
      })
    ).toEqual(['  Not enough sessions']);
  });

  it('should draw heatmap rows', () => {
    expect(formatHeatmap([])).toBe('  Not enough data for a heatmap yet');
    expect(formatHeatmap([{ weekday: 0, hour: 9, averagePerformance: 85, samples: 2 }])).toBe(
      '  Monday     09:00 █████████░ 85 (2)'
    );
  });

  it('should print the comprehensive report sections', () => {
    const snapshots = new MemorySnapshots();
    seedHistory(snapshots, [
      makeSession({ start: jan(15, 9) }),
      makeSession({ start: jan(15, 9, 30), type: 'break', minutes: 5 }),
      makeSession({ start: jan(16, 9) }),
      makeSession({ start: jan(17, 9) }),
    ]);
    const engine = createAnalyticsEngine({ db: snapshots, clock: () => jan(22, 12) });

    const lines = formatTerminalReport(
      engine.reports.generateComprehensiveReport({ start: jan(1, 0), end: jan(22, 0) })
    ).split('\n');
    engine.dispose();

    expect(lines).toContain('  Sessions: 4 (3 work, 1 break)');
    expect(lines).toContain('  Work Time: 1h 15m');
    expect(lines).toContain(`  Completion: ${'█'.repeat(20)} 100%`);
    expect(lines).toContain('  High: 0  Medium: 3  Low: 0');
    expect(lines).toContain('  Insufficient data: environment insights needs at least 3, found 0');
    expect(lines).toContain('  • Your sessions look healthy. Keep the current routine.');
  });
});
