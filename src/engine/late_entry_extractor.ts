import { LateEntry, LateSeverity } from '../types/account_types';
import { MONTH_NAME_SOURCE, MONTH_TOKEN, monthFromName } from '../utils/date_tokens';
import { LEGEND_LINE } from './report_sections';

export interface LateEntryOptions {
    /** Lines scanned after the account header. */
    window?: number;
    /** Wider window used to find (and read) a payment-history grid. */
    gridWindow?: number;
    /** First line index belonging to the next account. */
    end?: number;
}

const PAYMENT_HISTORY_HEADER = /payment\s+(?:status\s+)?history|24[\s-]*month\s+(?:payment|history)/i;

/** Date fields hold month names and numbers that are not grid cells. */
const DATE_FIELD_LINE = /status\s+updated|date\s+reported|\bdofd\b|date\s+of\s+first\s+delinquency|(?:date\s+)?opened\b|date\s+closed|last\s+payment/i;

const SAME_LINE_PAIR = new RegExp(
    `\\b(${MONTH_NAME_SOURCE})\\.?(?:\\s+(\\d{4}))?\\s*[:-]?\\s+(30|60|90)(?![\\d,.])`,
    'gi'
);

const FALLBACK_PAIR = new RegExp(
    `\\b(${MONTH_NAME_SOURCE})\\.?(?![a-z])([\\s\\S]{0,30}?)(?<![$\\d,.])(30|60|90)(?!\\d|-\\d)(?!\\s*(?:months?|mos?\\b|yrs?))`,
    'gi'
);

/** Loan terms and open dates carry month names and 30/60/90 figures that are not lates. */
const TERM_LINE = /\bopened\b|\bterms?\b|\bmonths\b/i;

const YEAR_TOKEN = /(?<![\d$,.])((?:19|20)\d{2})(?![\d,])/;

const LOOKAHEAD_LINES = 5;
const YEAR_RADIUS = 3;

export function toSeverity(value: string): LateSeverity | null {
    switch (value.trim()) {
        case '30': return 30;
        case '60': return 60;
        case '90': return 90;
        default: return null;
    }
}

function entryKey(entry: LateEntry): string {
    return `${entry.month}-${entry.year ?? 'none'}-${entry.severity}`;
}

/** Removes repeated (month, year, severity) triples and orders chronologically. */
export function dedupeLateEntries(entries: LateEntry[]): LateEntry[] {
    const seen = new Map<string, LateEntry>();
    for (const entry of entries) {
        const key = entryKey(entry);
        if (!seen.has(key)) seen.set(key, { ...entry });
    }
    return [...seen.values()].sort((a, b) =>
        (a.year ?? 0) - (b.year ?? 0) || a.month - b.month || a.severity - b.severity
    );
}

export function mergeLateEntries(left: LateEntry[], right: LateEntry[]): LateEntry[] {
    return dedupeLateEntries([...left, ...right]);
}

function isMonthCell(cell: string): boolean {
    return monthFromName(cell.replace(/\.$/, '')) !== null;
}

function inferYear(lines: string[], index: number, low: number, high: number): number | null {
    const own = lines[index].match(YEAR_TOKEN);
    if (own) return parseInt(own[1], 10);

    for (let distance = 1; distance <= YEAR_RADIUS; distance++) {
        for (const candidate of [index - distance, index + distance]) {
            if (candidate < low || candidate >= high) continue;
            const line = lines[candidate];
            if (DATE_FIELD_LINE.test(line)) continue;
            const match = line.match(YEAR_TOKEN);
            if (match) return parseInt(match[1], 10);
        }
    }
    return null;
}

/** "Jan Feb Mar" header row, aligned by column with a value row underneath. */
function pairColumns(
    lines: string[],
    index: number,
    high: number,
    cells: string[],
    rowYear: number | null
): LateEntry[] {
    const entries: LateEntry[] = [];
    let columnYears: (number | null)[] = cells.map(() => rowYear);

    for (let j = index + 1; j <= index + LOOKAHEAD_LINES && j < high; j++) {
        const line = lines[j];
        if (DATE_FIELD_LINE.test(line)) continue;
        const values = line.trim().split(/\s+/);
        if (values.length !== cells.length) continue;

        if (values.every(value => /^\d{4}$/.test(value))) {
            columnYears = values.map(value => parseInt(value, 10));
            continue;
        }

        values.forEach((value, column) => {
            const severity = toSeverity(value);
            const month = monthFromName(cells[column].replace(/\.$/, ''));
            if (severity && month) {
                entries.push({ month, year: columnYears[column], severity });
            }
        });
        break;
    }

    return entries;
}

/** One month on the line; the severity is rendered on one of the next few lines. */
function lookAheadSeverity(lines: string[], index: number, high: number): LateSeverity | null {
    for (let j = index + 1; j <= index + LOOKAHEAD_LINES && j < high; j++) {
        const value = lines[j].trim();
        if (!value || DATE_FIELD_LINE.test(value)) continue;
        MONTH_TOKEN.lastIndex = 0;
        if (MONTH_TOKEN.test(value)) return null;
        return toSeverity(value);
    }
    return null;
}

function extractFromGrid(lines: string[], low: number, high: number): LateEntry[] {
    const entries: LateEntry[] = [];

    for (let i = low; i < high; i++) {
        const line = lines[i];
        if (DATE_FIELD_LINE.test(line)) continue;

        const tokens = [...line.matchAll(MONTH_TOKEN)];
        if (tokens.length === 0) continue;

        const sameLine = [...line.matchAll(SAME_LINE_PAIR)];
        if (sameLine.length > 0) {
            for (const pair of sameLine) {
                const month = monthFromName(pair[1]);
                const severity = toSeverity(pair[3]);
                if (!month || !severity) continue;
                const year = pair[2] ? parseInt(pair[2], 10) : inferYear(lines, i, low, high);
                entries.push({ month, year, severity });
            }
            continue;
        }

        const cells = line.trim().split(/\s+/);
        if (tokens.length > 1) {
            if (cells.every(isMonthCell)) {
                entries.push(...pairColumns(lines, i, high, cells, inferYear(lines, i, low, high)));
            }
            continue;
        }

        const month = monthFromName(tokens[0][1]);
        const severity = lookAheadSeverity(lines, i, high);
        if (month && severity) {
            entries.push({ month, year: inferYear(lines, i, low, high), severity });
        }
    }

    return entries;
}

function extractFromText(lines: string[], low: number, high: number): LateEntry[] {
    const text = lines
        .slice(low, high)
        .filter(line => !DATE_FIELD_LINE.test(line) && !TERM_LINE.test(line) && !LEGEND_LINE.test(line))
        .join('\n');

    const entries: LateEntry[] = [];
    for (const match of text.matchAll(FALLBACK_PAIR)) {
        const month = monthFromName(match[1]);
        const severity = toSeverity(match[3]);
        if (!month || !severity) continue;
        const year = match[2].match(YEAR_TOKEN);
        entries.push({ month, year: year ? parseInt(year[1], 10) : null, severity });
    }
    return entries;
}

/**
 * Late-payment history for the account whose header sits at `start`.
 * The payment-history grid is read first; free-text pairing is only used
 * when the grid yields nothing.
 */
export function extractLateEntries(lines: string[], start: number, options: LateEntryOptions = {}): LateEntry[] {
    const window = options.window ?? 80;
    const gridWindow = options.gridWindow ?? 120;
    const bound = Math.min(lines.length, options.end ?? lines.length);
    const blockEnd = Math.min(bound, start + window);

    let header = -1;
    for (let i = start; i < Math.min(bound, start + gridWindow); i++) {
        if (PAYMENT_HISTORY_HEADER.test(lines[i])) {
            header = i;
            break;
        }
    }

    if (header !== -1) {
        const structured = extractFromGrid(lines, header + 1, Math.min(bound, header + 1 + window));
        if (structured.length > 0) return dedupeLateEntries(structured);
    }

    return dedupeLateEntries(extractFromText(lines, start, blockEnd));
}

const AGGREGATE_LATE = /\b(30|60|90)(?:\s*-\s*\d{2,3}|\+)?\s*days?(?:\s+(?:late|past\s+due))?\s*[:=]\s*(\d{1,3})\b/gi;
const LATE_MENTION = /\b(30|60|90|120|150|180)\s*days?\s+(?:late|past\s+due)\b/gi;

/**
 * Late count from aggregate phrases ("30-59 days late: 2"); falls back to
 * counting explicit late mentions. Used when no grid entries were found.
 * Legend lines are not counted.
 */
export function estimateLatePaymentCount(blockText: string): number {
    const text = blockText
        .split(/\r?\n/)
        .filter(line => !LEGEND_LINE.test(line))
        .join('\n');

    let total = 0;
    let aggregates = 0;
    for (const match of text.matchAll(AGGREGATE_LATE)) {
        total += parseInt(match[2], 10);
        aggregates++;
    }
    if (aggregates > 0) return total;

    return [...text.matchAll(LATE_MENTION)].length;
}
