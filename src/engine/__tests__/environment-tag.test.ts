import { buildEnvironmentTag, formatHour, seasonForMonth, timePeriodForHour } from '../environment-tag';
import { jan } from '../../__tests__/fixtures';

describe('timePeriodForHour', () => {
  it('should split the day at 5, 12, 17 and 22', () => {
    expect(timePeriodForHour(4)).toBe('night');
    expect(timePeriodForHour(5)).toBe('morning');
    expect(timePeriodForHour(11)).toBe('morning');
    expect(timePeriodForHour(12)).toBe('afternoon');
    expect(timePeriodForHour(17)).toBe('evening');
    expect(timePeriodForHour(22)).toBe('night');
  });
});

describe('seasonForMonth', () => {
  it('should map months to meteorological seasons', () => {
    expect(seasonForMonth(1)).toBe('winter');
    expect(seasonForMonth(4)).toBe('spring');
    expect(seasonForMonth(7)).toBe('summer');
    expect(seasonForMonth(10)).toBe('autumn');
    expect(seasonForMonth(12)).toBe('winter');
  });
});

describe('buildEnvironmentTag', () => {
  it('should tag a Monday morning', () => {
    expect(buildEnvironmentTag(jan(15, 9))).toEqual({
      hour: 9,
      weekday: 0,
      month: 1,
      season: 'winter',
      timePeriod: 'morning',
      isWeekend: false,
    });
  });

  it('should flag Saturday and Sunday as weekend', () => {
    expect(buildEnvironmentTag(jan(13, 20))).toMatchObject({ weekday: 5, isWeekend: true, timePeriod: 'evening' });
    expect(buildEnvironmentTag(jan(14, 23))).toMatchObject({ weekday: 6, isWeekend: true, timePeriod: 'night' });
  });

  it('should return a frozen tag', () => {
    expect(Object.isFrozen(buildEnvironmentTag(jan(15)))).toBe(true);
  });
});

describe('formatHour', () => {
  it('should zero-pad the hour', () => {
    expect(formatHour(9)).toBe('09:00');
    expect(formatHour(14)).toBe('14:00');
  });
});
