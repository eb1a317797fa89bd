import { describe, it, expect } from 'vitest';
import { planVacationWeeks, vacationCandidates } from './vacation-weeks';
import { addDays, daysBetween, iso, parseDay, weekdayIndex } from '../date-utils';
import { weekTouchesHolidayPeriod } from '../calendar';
import { createRandomSource, createSeededRandom } from '../random';
import { scriptedRandom } from '../../test/scriptedRandom';

const range = (start: string, end: string) => ({ start: parseDay(start), end: parseDay(end) });

describe('vacation weeks', () => {
  it('plans nothing for a range shorter than a full week', () => {
    const random = scriptedRandom();
    expect(planVacationWeeks(range('2024-01-01', '2024-01-07'), 0, random).size).toBe(0);
    expect(planVacationWeeks(range('2024-03-04', '2024-03-09'), 10, random).size).toBe(0);
    expect(random.int).not.toHaveBeenCalled();
  });

  it('lists Mondays from the week containing the start, skipping the holiday season', () => {
    const candidates = vacationCandidates(range('2024-12-04', '2025-01-20'));
    // Dec 16, Dec 23, Dec 30 and Jan 6 touch Dec 20 - Jan 7
    expect(candidates.map(iso)).toEqual(['2024-12-02', '2024-12-09', '2025-01-13', '2025-01-20']);
  });

  it('spaces picks evenly and applies the one-week wobble', () => {
    // 83 days => floor(0.227 * 10) = 2 weeks, over 12 candidate Mondays
    const random = scriptedRandom({ ints: [-1, 1] });

    const weeks = planVacationWeeks(range('2024-03-04', '2024-05-26'), 10, random);

    expect(random.int).toHaveBeenCalledWith(-1, 1);
    // index 0 - 1 clamps to 0; index 6 + 1 = 7
    expect([...weeks]).toEqual(['2024-03-04', '2024-04-22']);
  });

  it('plans at least one week once the range spans a week', () => {
    const random = scriptedRandom({ ints: [0] });
    const weeks = planVacationWeeks(range('2024-03-04', '2024-04-28'), 1, random);
    expect([...weeks]).toEqual(['2024-03-04']);
  });

  it('takes every candidate when there are no more than needed', () => {
    const random = scriptedRandom();
    // 27 days => one week wanted; Dec 16, 23 and 30 touch the holiday season
    expect([...planVacationWeeks(range('2024-12-09', '2025-01-05'), 10, random)]).toEqual(['2024-12-09']);
    // Every week here touches it
    expect(planVacationWeeks(range('2024-12-16', '2025-01-12'), 10, random).size).toBe(0);
    expect(random.int).not.toHaveBeenCalled();
  });

  it('never exceeds the number of weeks nor touches the holiday season', () => {
    const random = createRandomSource(createSeededRandom(2024));
    const r = range('2022-02-14', '2024-11-30');
    const totalWeeks = Math.floor(daysBetween(r.start, r.end) / 7);

    for (let run = 0; run < 20; run++) {
      const weeks = planVacationWeeks(r, 10, random);
      expect(weeks.size).toBeGreaterThan(0);
      expect(weeks.size).toBeLessThanOrEqual(totalWeeks);
      for (const week of weeks) {
        const monday = parseDay(week);
        expect(weekdayIndex(monday)).toBe(0);
        expect(weekTouchesHolidayPeriod(monday)).toBe(false);
        expect(addDays(monday, 7).getTime()).toBeGreaterThan(r.start.getTime());
      }
    }
  });
});
