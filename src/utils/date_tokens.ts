import { format } from 'date-fns';

export interface MonthYear {
    month: number | null;
    year: number | null;
}

const MONTHS: Record<string, number> = {
    jan: 1, january: 1,
    feb: 2, february: 2,
    mar: 3, march: 3,
    apr: 4, april: 4,
    may: 5,
    jun: 6, june: 6,
    jul: 7, july: 7,
    aug: 8, august: 8,
    sep: 9, sept: 9, september: 9,
    oct: 10, october: 10,
    nov: 11, november: 11,
    dec: 12, december: 12
};

export const MONTH_NAME_SOURCE =
    'Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sept?(?:ember)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?';

/** Matches a single month name token. Global; reset lastIndex or use matchAll. */
export const MONTH_TOKEN = new RegExp(`\\b(${MONTH_NAME_SOURCE})\\.?(?![a-z])`, 'gi');

const NAMED_MONTH_YEAR = new RegExp(`\\b(${MONTH_NAME_SOURCE})\\.?,?\\s+(\\d{4})\\b`, 'i');

export function monthFromName(name: string): number | null {
    return MONTHS[name.toLowerCase().replace(/\.$/, '')] ?? null;
}

/**
 * Parses "Jun 2025", "June 2025", "06/2025", "2025/06" and "06/15/2025".
 * Returns nulls when the token holds no recognizable month and year.
 */
export function parseMonthYear(token: string | null | undefined): MonthYear {
    if (!token) return { month: null, year: null };
    const t = token.trim();

    const named = t.match(NAMED_MONTH_YEAR);
    if (named) {
        const month = monthFromName(named[1]);
        if (month) return { month, year: parseInt(named[2], 10) };
    }

    const full = t.match(/\b(\d{1,2})[-/]\d{1,2}[-/](\d{4})\b/);
    if (full) {
        const month = parseInt(full[1], 10);
        if (month >= 1 && month <= 12) return { month, year: parseInt(full[2], 10) };
    }

    const monthFirst = t.match(/\b(\d{1,2})[-/](\d{4})\b/);
    if (monthFirst) {
        const month = parseInt(monthFirst[1], 10);
        if (month >= 1 && month <= 12) return { month, year: parseInt(monthFirst[2], 10) };
    }

    const yearFirst = t.match(/\b(\d{4})[-/](\d{1,2})\b/);
    if (yearFirst) {
        const month = parseInt(yearFirst[2], 10);
        if (month >= 1 && month <= 12) return { month, year: parseInt(yearFirst[1], 10) };
    }

    return { month: null, year: null };
}

/**
 * (y2 - y1) * 12 + (m2 - m1), or null when either date is incomplete.
 */
export function monthsBetween(
    m1: number | null,
    y1: number | null,
    m2: number | null,
    y2: number | null
): number | null {
    if (m1 === null || y1 === null || m2 === null || y2 === null) return null;
    return (y2 - y1) * 12 + (m2 - m1);
}

/** "Apr 2023", or just "Apr" when the year is unknown. */
export function formatMonthYear(month: number, year: number | null): string {
    const label = format(new Date(2000, month - 1, 1), 'MMM');
    return year === null ? label : `${label} ${year}`;
}
