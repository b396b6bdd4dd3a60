import { SessionEventStore } from '../session-store';
import { SessionPatternTracker, ProductivityTrendPoint, calculateCompositeProductivity } from '../pattern-tracker';
import { MemorySnapshots, jan, makeInterruption, makeSession, seededStore } from '../../__tests__/fixtures';

describe('SessionPatternTracker', () => {
  let consoleErrorSpy: jest.SpyInstance;
  let store: SessionEventStore;
  let tracker: SessionPatternTracker;
  const clock = (): Date => jan(20, 12);

  beforeEach(() => {
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    store = new SessionEventStore({ clock });
    tracker = new SessionPatternTracker(store, { clock });
  });

  afterEach(() => {
    tracker.detach();
    consoleErrorSpy.mockRestore();
  });

  describe('getTrendClassification', () => {
    it('should report insufficient data below five work sessions', () => {
      for (let day = 15; day <= 18; day++) {
        tracker.recordSession(makeSession({ start: jan(day) }));
      }

      expect(tracker.getTrendClassification()).toEqual({
        status: 'insufficient_data',
        required: 5,
        available: 4,
        message: 'Insufficient data: trend classification needs at least 5, found 4',
      });
      expect(tracker.getPatterns()).toEqual({
        status: 'insufficient_data',
        required: 5,
        available: 4,
        message: 'Insufficient data: session pattern mining needs at least 5, found 4',
      });
    });

    it('should call steady low focus stable', () => {
      for (let day = 14; day <= 19; day++) {
        tracker.recordSession(makeSession({ start: jan(day), focusScore: 40 }));
      }

      expect(tracker.getTrendClassification()).toEqual({
        status: 'ok',
        data: { efficiency: 'stable', focus: 'stable', recentSessions: 5, previousSessions: 1 },
      });
    });

    it('should detect improving efficiency and declining focus', () => {
      tracker.recordSession(makeSession({ start: jan(14), efficiencyScore: 40, focusScore: 90 }));
      for (let day = 15; day <= 19; day++) {
        tracker.recordSession(makeSession({ start: jan(day), efficiencyScore: 80, focusScore: 60 }));
      }

      const result = tracker.getTrendClassification();
      expect(result).toEqual({
        status: 'ok',
        data: { efficiency: 'improving', focus: 'declining', recentSessions: 5, previousSessions: 1 },
      });
    });

    it('should ignore break sessions', () => {
      for (let day = 15; day <= 19; day++) {
        tracker.recordSession(makeSession({ start: jan(day, 10), type: 'break', minutes: 5 }));
      }
      const result = tracker.getTrendClassification();
      expect(result.status === 'insufficient_data' && result.available).toBe(0);
    });
  });

  describe('patterns', () => {
    it('should find a productive hour in the trailing window', () => {
      tracker.recordSession(makeSession({ start: jan(2) }));
      for (let day = 15; day <= 19; day++) {
        tracker.recordSession(makeSession({ start: jan(day, 9), efficiencyScore: 80 }));
      }

      expect(tracker.getPatterns()).toEqual({
        status: 'ok',
        data: [
          {
            kind: 'optimal_hour',
            hour: 9,
            averageEfficiency: 80,
            sessions: 5,
            message: 'Sessions starting around 09:00 average 80 efficiency',
          },
        ],
      });
    });

    it('should flag sessions that are interrupted often', () => {
      const emitted = jest.fn();
      tracker.on('patternDetected', emitted);

      for (let day = 15; day <= 19; day++) {
        const start = jan(day, day - 5);
        tracker.recordSession(
          makeSession({
            start,
            efficiencyScore: 60,
            interruptions: [1, 2, 3, 4].map(() => makeInterruption(start)),
          })
        );
      }

      const result = tracker.getPatterns();
      if (result.status !== 'ok') throw new Error(result.message);
      expect(result.data).toEqual([
        {
          kind: 'interruption_frequency',
          averagePerSession: 4,
          shareAboveThreshold: 100,
          message: '100% of recent sessions had more than 3 interruptions',
        },
      ]);
      expect(emitted).toHaveBeenCalledTimes(1);
    });
  });

  describe('productivity trend', () => {
    it('should keep one point per day, replacing it on recomputation', () => {
      const updates: ProductivityTrendPoint[] = [];
      tracker.on('trendUpdated', (point) => updates.push(point));

      for (let day = 14; day <= 19; day++) {
        tracker.recordSession(makeSession({ start: jan(day), efficiencyScore: 80, focusScore: 70 }));
      }

      expect(updates).toHaveLength(2);
      expect(tracker.getProductivityTrend()).toEqual([{ date: '2024-01-20', score: 83, sessionsCount: 6 }]);
    });

    it('should restore trend points from its snapshot', () => {
      const snapshots = new MemorySnapshots();
      tracker.detach();
      tracker = new SessionPatternTracker(store, { clock, snapshots });
      for (let day = 15; day <= 19; day++) {
        tracker.recordSession(makeSession({ start: jan(day) }));
      }

      const restored = new SessionPatternTracker(new SessionEventStore({ clock }), { clock, snapshots });
      expect(restored.getProductivityTrend()).toEqual(tracker.getProductivityTrend());
      expect(restored.getProductivityTrend()).toHaveLength(1);
      restored.detach();
    });
  });

  describe('history', () => {
    it('should start from the store history and follow new sessions', () => {
      tracker.detach();
      const seeded = seededStore([makeSession({ start: jan(18) }), makeSession({ start: jan(19) })], { clock });
      tracker = new SessionPatternTracker(seeded.store, { clock });

      seeded.store.startSession('work', 25);
      seeded.store.endSession(true);

      expect(tracker.getSessionsForDate('2024-01-18')).toHaveLength(1);
      expect(tracker.getSessionsForDate('2024-01-19')).toHaveLength(1);
      expect(tracker.getSessionsForDate('2024-01-20')).toHaveLength(1);
      seeded.store.dispose();
    });

    it('should drop evicted sessions from the date index', () => {
      tracker.detach();
      tracker = new SessionPatternTracker(store, { clock, config: { maxSessionHistory: 2 } });

      tracker.recordSession(makeSession({ start: jan(15) }));
      tracker.recordSession(makeSession({ start: jan(16) }));
      tracker.recordSession(makeSession({ start: jan(17) }));

      expect(tracker.getSessionsForDate('2024-01-15')).toEqual([]);
      expect(tracker.getSessionsForDate('2024-01-16')).toHaveLength(1);
      expect(tracker.getSessionsForDate('2024-01-17')).toHaveLength(1);
    });
  });
});

describe('calculateCompositeProductivity', () => {
  it('should combine completion, efficiency and focus', () => {
    const sessions = [
      makeSession({ start: jan(15), efficiencyScore: 80, focusScore: 70 }),
      makeSession({ start: jan(15, 10), efficiencyScore: 60, focusScore: 50, completed: false }),
    ];
    expect(calculateCompositeProductivity(sessions)).toBe(61);
  });

  it('should be zero for an empty day', () => {
    expect(calculateCompositeProductivity([])).toBe(0);
  });
});
