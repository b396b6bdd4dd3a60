import { calculateSessionMetrics, workSessions } from '../calculators/metrics';
import { jan, makeInterruption, makeSession } from '../../__tests__/fixtures';

describe('calculateSessionMetrics', () => {
  it('should average scores and count interruptions', () => {
    const metrics = calculateSessionMetrics([
      makeSession({
        start: jan(15, 9),
        focusScore: 70,
        efficiencyScore: 80,
        interruptions: [makeInterruption(jan(15, 9, 5)), makeInterruption(jan(15, 9, 10))],
      }),
      makeSession({ start: jan(15, 10), minutes: 35, focusScore: 50, efficiencyScore: 60, completed: false }),
    ]);

    expect(metrics).toEqual({
      count: 2,
      averageFocusScore: 60,
      averageEfficiencyScore: 70,
      completionRate: 50,
      averageDurationMinutes: 30,
      totalInterruptions: 2,
      interruptionsPerSession: 1,
    });
  });

  it('should return zeros for no sessions', () => {
    expect(calculateSessionMetrics([])).toEqual({
      count: 0,
      averageFocusScore: 0,
      averageEfficiencyScore: 0,
      completionRate: 0,
      averageDurationMinutes: 0,
      totalInterruptions: 0,
      interruptionsPerSession: 0,
    });
  });
});

describe('workSessions', () => {
  it('should drop breaks', () => {
    const work = makeSession({ start: jan(15, 9) });
    const rest = makeSession({ start: jan(15, 9, 25), type: 'break', minutes: 5 });
    expect(workSessions([work, rest])).toEqual([work]);
  });
});
