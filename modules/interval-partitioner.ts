import { InvalidDateRangeError } from './errors';
import { parseCalendarDate } from './time-normalizer';
import type { CalendarDate, DateRange, Interval } from '../types';

export const MAX_SPAN_DAYS = 3;

const dayMillisec = 1000 * 60 * 60 * 24;

const toEpochDay = (date: CalendarDate): number => {
    const { year, month, day } = parseCalendarDate(date);
    return Date.UTC(year, month - 1, day) / dayMillisec;
}

const fromEpochDay = (epochDay: number): CalendarDate => new Date(epochDay * dayMillisec).toISOString().slice(0, 10);

const LAST_CALENDAR_DATE = '9999-12-31';
const lastEpochDay = toEpochDay(LAST_CALENDAR_DATE);

export const addDays = (date: CalendarDate, days: number): CalendarDate => fromEpochDay(toEpochDay(date) + days);

// inclusive: 2024-06-01..2024-06-01 is 1 day
export const daysBetween = (range: DateRange): number => toEpochDay(range.end) - toEpochDay(range.start) + 1;

export const assertDateRange = (range: DateRange): void => {
    if (toEpochDay(range.start) > toEpochDay(range.end)) {
        throw new InvalidDateRangeError(`start date ${range.start} is after end date ${range.end}`);
    }
    // the search window ends on the day after range.end, which must still be a YYYY-MM-DD date
    if (toEpochDay(range.end) >= lastEpochDay) {
        throw new InvalidDateRangeError(`end date ${range.end} must be before ${LAST_CALENDAR_DATE}`);
    }
}

/**
 * Splits `range` into consecutive intervals of at most `maxSpanDays` days.
 *
 * Intervals are inclusive on both ends and never overlap; the last one is cut
 * at `range.end`. Validation happens eagerly, the intervals themselves are
 * produced on iteration and every iteration starts over from `range.start`.
 */
export const partition = (range: DateRange, maxSpanDays: number = MAX_SPAN_DAYS): Iterable<Interval> => {
    if (!Number.isInteger(maxSpanDays) || maxSpanDays < 1) {
        throw new RangeError(`maxSpanDays must be an integer >= 1, got ${maxSpanDays}`);
    }
    assertDateRange(range);
    const firstDay = toEpochDay(range.start);
    const lastDay = toEpochDay(range.end);

    return {
        *[Symbol.iterator]() {
            for (let cursor = firstDay; cursor <= lastDay; cursor += maxSpanDays) {
                const end = Math.min(cursor + maxSpanDays - 1, lastDay);
                yield { start: fromEpochDay(cursor), end: fromEpochDay(end) };
            }
        }
    }
}
