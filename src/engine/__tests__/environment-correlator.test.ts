import { SessionEventStore } from '../session-store';
import { EnvironmentCorrelator, OptimalTime } from '../environment-correlator';
import { MemorySnapshots, SessionSpec, jan, makeSession } from '../../__tests__/fixtures';

describe('EnvironmentCorrelator', () => {
  let consoleErrorSpy: jest.SpyInstance;
  let store: SessionEventStore;
  let correlator: EnvironmentCorrelator;
  const clock = (): Date => jan(20, 12);

  beforeEach(() => {
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    store = new SessionEventStore({ clock });
    correlator = new EnvironmentCorrelator(store, { clock });
  });

  afterEach(() => {
    correlator.detach();
    store.dispose();
    consoleErrorSpy.mockRestore();
  });

  function record(spec: SessionSpec & { performance?: number }): void {
    const score = spec.performance;
    correlator.recordSession(
      makeSession({ ...spec, focusScore: score ?? spec.focusScore, efficiencyScore: score ?? spec.efficiencyScore })
    );
  }

  describe('recording', () => {
    it('should record work sessions with their mean performance', () => {
      const entry = correlator.recordSession(makeSession({ start: jan(15, 9), focusScore: 70, efficiencyScore: 80 }));

      expect(entry).toMatchObject({ type: 'work', focusScore: 70, efficiencyScore: 80, performance: 75 });
      expect(correlator.getBuckets('hour')).toEqual({ '9': [75] });
      expect(correlator.getBuckets('weekday')).toEqual({ '0': [75] });
      expect(correlator.getBuckets('month')).toEqual({ '1': [75] });
    });

    it('should ignore break sessions', () => {
      expect(correlator.recordSession(makeSession({ start: jan(15, 9), type: 'break', minutes: 5 }))).toBeNull();
      expect(correlator.getRecords()).toEqual([]);
    });

    it('should pick up sessions finalized by the store', () => {
      store.startSession('work', 25);
      store.endSession(true);
      store.startSession('break', 5);
      store.endSession(true);

      const records = correlator.getRecords();
      expect(records).toHaveLength(1);
      expect(records[0].environment.hour).toBe(12);
    });

    it('should cap records and buckets', () => {
      correlator.detach();
      correlator = new EnvironmentCorrelator(store, { clock, config: { environmentRecordCap: 2, bucketCap: 2 } });

      record({ start: jan(15, 9), performance: 60 });
      record({ start: jan(16, 9), performance: 70 });
      record({ start: jan(17, 9), performance: 80 });

      expect(correlator.getRecords().map((entry) => entry.performance)).toEqual([70, 80]);
      expect(correlator.getBuckets('hour')).toEqual({ '9': [70, 80] });
    });
  });

  describe('detectOptimalTime', () => {
    it('should need three samples above 70 for an hour', () => {
      record({ start: jan(15, 9), performance: 90 });
      record({ start: jan(16, 9), performance: 90 });
      expect(correlator.detectOptimalTime().hour).toBeNull();

      record({ start: jan(17, 9), performance: 90 });
      expect(correlator.detectOptimalTime().hour).toEqual({
        dimension: 'hour',
        value: 9,
        label: '09:00',
        averagePerformance: 90,
        samples: 3,
      });
    });

    it('should not accept an hour averaging exactly 70', () => {
      record({ start: jan(15, 14), performance: 70 });
      record({ start: jan(16, 14), performance: 70 });
      record({ start: jan(17, 14), performance: 70 });
      expect(correlator.detectOptimalTime().hour).toBeNull();
    });

    it('should need two samples above 65 for a weekday', () => {
      record({ start: jan(16, 14), performance: 90 });
      expect(correlator.detectOptimalTime().weekday).toBeNull();

      record({ start: jan(16, 15), performance: 80 });
      expect(correlator.detectOptimalTime().weekday).toEqual({
        dimension: 'weekday',
        value: 1,
        label: 'Tuesday',
        averagePerformance: 85,
        samples: 2,
      });
    });

    it('should announce a new optimum once', () => {
      const found: OptimalTime[] = [];
      correlator.on('optimalTimeDetected', (optimal) => found.push(optimal));

      record({ start: jan(15, 9), performance: 90 });
      record({ start: jan(16, 9), performance: 90 });
      record({ start: jan(17, 9), performance: 90 });
      record({ start: jan(18, 9), performance: 90 });

      expect(found.map((optimal) => [optimal.dimension, optimal.value])).toEqual([['hour', 9]]);
    });
  });

  describe('getInsights', () => {
    it('should report insufficient data below three recent sessions', () => {
      record({ start: jan(1, 9), performance: 90 });
      record({ start: jan(15, 9), performance: 90 });
      record({ start: jan(16, 9), performance: 90 });

      expect(correlator.getInsights(7)).toEqual({
        status: 'insufficient_data',
        required: 3,
        available: 2,
        message: 'Insufficient data: environment insights needs at least 3, found 2',
      });
    });

    it('should compare time periods and weekday against weekend', () => {
      record({ start: jan(15, 9), performance: 90 });
      record({ start: jan(16, 10), performance: 90 });
      record({ start: jan(16, 19), performance: 60 });
      record({ start: jan(13, 10), performance: 50 });

      const result = correlator.getInsights();
      expect(result.status).toBe('ok');
      if (result.status !== 'ok') return;

      expect(result.data.sessions).toBe(4);
      expect(result.data.timePeriods).toEqual([
        { key: 'morning', averagePerformance: 76.7, samples: 3 },
        { key: 'evening', averagePerformance: 60, samples: 1 },
      ]);
      expect(result.data.bestTimePeriod?.key).toBe('morning');
      expect(result.data.weekdayAverage).toBe(80);
      expect(result.data.weekendAverage).toBe(50);
      expect(result.data.recommendations).toEqual([
        'Your best results come in the morning (average 76.7). Schedule demanding work then.',
        'You perform 30 points better on weekdays.',
      ]);
    });

    it('should call similar weekday and weekend performance out', () => {
      record({ start: jan(15, 9), performance: 80 });
      record({ start: jan(16, 9), performance: 80 });
      record({ start: jan(13, 9), performance: 75 });

      const result = correlator.getInsights();
      if (result.status !== 'ok') throw new Error(result.message);
      expect(result.data.recommendations[1]).toBe('Weekday and weekend performance are similar.');
    });
  });

  describe('heatmap and seasons', () => {
    it('should average weekday-hour cells with at least two samples', () => {
      record({ start: jan(15, 9), performance: 90 });
      record({ start: jan(8, 9), performance: 80 });
      record({ start: jan(16, 10), performance: 70 });
      record({ start: jan(14, 20), performance: 60 });
      record({ start: jan(7, 20), performance: 50 });

      expect(correlator.getHeatmap()).toEqual([
        { weekday: 0, hour: 9, averagePerformance: 85, samples: 2 },
        { weekday: 6, hour: 20, averagePerformance: 55, samples: 2 },
      ]);
    });

    it('should group performance by season', () => {
      record({ start: jan(15, 9), performance: 90 });
      record({ start: jan(16, 9), performance: 70 });

      expect(correlator.getSeasonalPerformance()).toEqual([{ key: 'winter', averagePerformance: 80, samples: 2 }]);
    });
  });

  describe('persistence', () => {
    it('should restore records and buckets from its snapshot', () => {
      const snapshots = new MemorySnapshots();
      correlator.detach();
      correlator = new EnvironmentCorrelator(store, { clock, snapshots });
      record({ start: jan(15, 9), performance: 90 });
      record({ start: jan(16, 9), performance: 90 });
      record({ start: jan(17, 9), performance: 90 });

      const restored = new EnvironmentCorrelator(new SessionEventStore({ clock }), { clock, snapshots });
      const found = jest.fn();
      restored.on('optimalTimeDetected', found);

      expect(restored.getRecords()).toHaveLength(3);
      expect(restored.getRecords()[0].timestamp).toEqual(jan(15, 9));
      expect(restored.getBuckets('hour')).toEqual({ '9': [90, 90, 90] });
      expect(restored.detectOptimalTime().hour?.value).toBe(9);

      restored.recordSession(makeSession({ start: jan(18, 9), focusScore: 90, efficiencyScore: 90 }));
      expect(found).not.toHaveBeenCalled();
      restored.detach();
    });
  });
});
