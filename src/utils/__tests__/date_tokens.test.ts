import { describe, expect, it } from 'vitest';
import { formatMonthYear, monthFromName, monthsBetween, parseMonthYear } from '../date_tokens';

describe('parseMonthYear', () => {
    it('reads named months', () => {
        expect(parseMonthYear('Jun 2025')).toEqual({ month: 6, year: 2025 });
        expect(parseMonthYear('June 2025')).toEqual({ month: 6, year: 2025 });
    });

    it('reads numeric forms', () => {
        expect(parseMonthYear('06/2025')).toEqual({ month: 6, year: 2025 });
        expect(parseMonthYear('2025/06')).toEqual({ month: 6, year: 2025 });
        expect(parseMonthYear('06/15/2025')).toEqual({ month: 6, year: 2025 });
    });

    it('returns nulls for unreadable tokens', () => {
        expect(parseMonthYear('garbage')).toEqual({ month: null, year: null });
        expect(parseMonthYear('')).toEqual({ month: null, year: null });
        expect(parseMonthYear(null)).toEqual({ month: null, year: null });
    });
});

describe('month helpers', () => {
    it('resolves abbreviations with a trailing dot', () => {
        expect(monthFromName('Sept.')).toBe(9);
        expect(monthFromName('Foo')).toBeNull();
    });

    it('counts calendar months between dates', () => {
        expect(monthsBetween(1, 2020, 3, 2021)).toBe(14);
        expect(monthsBetween(null, 2020, 3, 2021)).toBeNull();
    });

    it('keeps two-digit years on the same arithmetic', () => {
        expect(monthsBetween(1, 50, 1, 2000)).toBe(23400);
        expect(monthsBetween(6, 99, 1, 100)).toBe(7);
    });

    it('formats month labels', () => {
        expect(formatMonthYear(4, 2023)).toBe('Apr 2023');
        expect(formatMonthYear(4, null)).toBe('Apr');
    });
});
