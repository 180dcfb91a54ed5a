import { describe, expect, it } from 'vitest';
import { InvalidDateError, InvalidTimezoneError } from '../modules/errors';
import { localToUtc, utcToLocal } from '../modules/time-normalizer';

describe('localToUtc', () => {
    it('converts local midnight east of UTC to the previous UTC day', () => {
        expect(localToUtc('2024-06-01', 'Asia/Jakarta')).toBe('2024-05-31T17:00:00Z');
    });

    it('converts local midnight west of UTC', () => {
        expect(localToUtc('2024-01-15', 'America/New_York')).toBe('2024-01-15T05:00:00Z');
        expect(localToUtc('2024-07-04', 'America/New_York')).toBe('2024-07-04T04:00:00Z');
    });

    it('uses the offset in force on the day a DST change happens', () => {
        expect(localToUtc('2024-03-10', 'America/New_York')).toBe('2024-03-10T05:00:00Z');
        expect(localToUtc('2024-11-03', 'America/New_York')).toBe('2024-11-03T04:00:00Z');
    });

    it('keeps UTC dates as they are', () => {
        expect(localToUtc('1970-01-01', 'UTC')).toBe('1970-01-01T00:00:00Z');
    });

    it('rejects unknown timezones', () => {
        expect(() => localToUtc('2024-06-01', 'Mars/Olympus_Mons')).toThrow(InvalidTimezoneError);
    });

    it('rejects invalid dates', () => {
        expect(() => localToUtc('2024-13-01', 'UTC')).toThrow(InvalidDateError);
        expect(() => localToUtc('yesterday', 'UTC')).toThrow(InvalidDateError);
    });
});

describe('utcToLocal', () => {
    it('formats the local wall clock with the zone name', () => {
        expect(utcToLocal('2024-06-01T00:00:00Z', 'UTC')).toBe('2024-06-01T00:00:00UTC');
        expect(utcToLocal('2024-07-04T16:30:05Z', 'America/New_York')).toBe('2024-07-04T12:30:05EDT');
    });

    it('recovers the local calendar date produced by localToUtc', () => {
        for (const timezone of ['Asia/Jakarta', 'America/New_York', 'Europe/London', 'Pacific/Auckland', 'UTC']) {
            for (const date of ['2024-01-01', '2024-03-31', '2024-06-15', '2024-10-27', '2024-12-31']) {
                expect(utcToLocal(localToUtc(date, timezone), timezone).slice(0, 19)).toBe(`${date}T00:00:00`);
            }
        }
    });

    it('starts a day whose midnight is skipped at its first existing instant', () => {
        expect(localToUtc('2024-09-08', 'America/Santiago')).toBe('2024-09-08T04:00:00Z');
        expect(utcToLocal(localToUtc('2024-09-08', 'America/Santiago'), 'America/Santiago').slice(0, 19)).toBe('2024-09-08T01:00:00');
    });

    it('rejects instants it cannot parse', () => {
        expect(() => utcToLocal('not-a-date', 'UTC')).toThrow(InvalidDateError);
    });

    it('rejects unknown timezones', () => {
        expect(() => utcToLocal('2024-06-01T00:00:00Z', 'Nowhere/Special')).toThrow(InvalidTimezoneError);
    });
});
