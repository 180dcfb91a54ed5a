import { InvalidDateError, InvalidTimezoneError } from './errors';
import type { CalendarDate, LocalInstantString, TimezoneId, UtcInstantString } from '../types';

const calendarDateRegex = /^(\d{4})-(\d{2})-(\d{2})$/;
const formatters = new Map<TimezoneId, Intl.DateTimeFormat>();

interface WallClock {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    zoneName: string;
}

const getFormatter = (timezone: TimezoneId): Intl.DateTimeFormat => {
    const cached = formatters.get(timezone);
    if (cached) return cached;
    try {
        const formatter = new Intl.DateTimeFormat('en-US', {
            timeZone: timezone,
            hourCycle: 'h23',
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            minute: '2-digit',
            second: '2-digit',
            timeZoneName: 'short',
        });
        formatters.set(timezone, formatter);
        return formatter;
    } catch (err) {
        throw new InvalidTimezoneError(`unknown timezone: ${timezone}`, { cause: err });
    }
}

const toWallClock = (epochMillis: number, timezone: TimezoneId): WallClock => {
    const parts = getFormatter(timezone).formatToParts(new Date(epochMillis));
    const pick = (type: Intl.DateTimeFormatPartTypes) => parts.find(part => part.type === type)?.value ?? '';
    return {
        year: Number(pick('year')),
        month: Number(pick('month')),
        day: Number(pick('day')),
        hour: Number(pick('hour')),
        minute: Number(pick('minute')),
        second: Number(pick('second')),
        zoneName: pick('timeZoneName'),
    };
}

// zone offset in ms at the given instant, positive east of UTC
const offsetAt = (epochMillis: number, timezone: TimezoneId): number => {
    const wall = toWallClock(epochMillis, timezone);
    const wallAsUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
    return wallAsUtc - Math.floor(epochMillis / 1000) * 1000;
}

const pad = (value: number, length: number = 2) => String(value).padStart(length, '0');

export const formatUtcInstant = (epochMillis: number): UtcInstantString => new Date(epochMillis).toISOString().split('.')[0] + 'Z';

export const parseCalendarDate = (localDate: CalendarDate): { year: number, month: number, day: number } => {
    const matched = localDate.match(calendarDateRegex);
    if (!matched) throw new InvalidDateError(`invalid date "${localDate}", expected YYYY-MM-DD`);
    const [year, month, day] = matched.slice(1, 4).map(Number);
    const probe = new Date(Date.UTC(year, month - 1, day));
    if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
        throw new InvalidDateError(`invalid date "${localDate}", no such calendar day`);
    }
    return { year, month, day };
}

export const assertTimezone = (timezone: TimezoneId): void => {
    getFormatter(timezone);
}

export const resolveLocalTimezone = (): TimezoneId => Intl.DateTimeFormat().resolvedOptions().timeZone;

export const localToUtc = (localDate: CalendarDate, timezone: TimezoneId): UtcInstantString => {
    assertTimezone(timezone);
    const { year, month, day } = parseCalendarDate(localDate);
    const midnightAsUtc = Date.UTC(year, month - 1, day);
    // second pass settles dates where the offset changes between the guess and the answer
    let utc = midnightAsUtc - offsetAt(midnightAsUtc, timezone);
    utc = midnightAsUtc - offsetAt(utc, timezone);
    // midnight skipped by a DST jump: take the first instant that exists on that day
    const wall = toWallClock(utc, timezone);
    if (wall.year !== year || wall.month !== month || wall.day !== day) {
        utc = midnightAsUtc - offsetAt(midnightAsUtc, timezone);
    }
    return formatUtcInstant(utc);
}

export const utcToLocal = (utcInstant: UtcInstantString, timezone: TimezoneId): LocalInstantString => {
    assertTimezone(timezone);
    const epochMillis = Date.parse(utcInstant);
    if (Number.isNaN(epochMillis)) throw new InvalidDateError(`invalid instant "${utcInstant}"`);
    const wall = toWallClock(epochMillis, timezone);
    return `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}T${pad(wall.hour)}:${pad(wall.minute)}:${pad(wall.second)}${wall.zoneName}`;
}
