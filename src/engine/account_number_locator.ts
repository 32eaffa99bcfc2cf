import { normalizeAccountNumber } from '../utils/normalization';

export interface AccountNumberSearchOptions {
    /** Forward window, in lines, starting at the creditor line. */
    window?: number;
    /** First line index that belongs to the next account; the forward search stops there. */
    end?: number;
    /** Lowest line index the backward search may look at. */
    floor?: number;
}

const BACKWARD_LINES = 2;

type TokenMatcher = (line: string) => string | null;

const LABELED_NUMBER = /\b(?:account|acct)\.?\s*(?:number|num|no\.?|#)\s*[:#-]?\s*([Xx*\d][Xx*\d -]*[Xx*\d])/i;
const ACCT_HASH = /\bacct\s*#\s*([Xx*\d][Xx*\d-]*[Xx*\d])/i;
const ENDING_IN = /\bending\s+in\s*[:#]?\s*(\d{4})\b/i;
const BARE_TOKEN = /(?<![A-Za-z0-9*])([Xx*\d][Xx*\d-]{5,}[Xx*\d])(?![A-Za-z0-9*])/g;

function isMaskedToken(token: string): boolean {
    return /\d/.test(token) && (token.match(/[Xx*]/g) || []).length >= 2;
}

/** Ordered: labeled fields beat free-floating masked tokens. */
const MATCHERS: TokenMatcher[] = [
    line => {
        const match = line.match(LABELED_NUMBER);
        return match && /\d|[Xx*]{4}/.test(match[1]) ? match[1] : null;
    },
    line => {
        const match = line.match(ACCT_HASH);
        return match ? match[1] : null;
    },
    line => {
        const match = line.match(ENDING_IN);
        return match ? match[1] : null;
    },
    line => {
        for (const match of line.matchAll(BARE_TOKEN)) {
            if (isMaskedToken(match[1])) return match[1];
        }
        return null;
    }
];

/**
 * Looks for an account number around a creditor line: forward through the
 * window first, then a couple of lines back. Returns the normalized form.
 */
export function extractAccountNumberFromContext(
    lines: string[],
    start: number,
    options: AccountNumberSearchOptions = {}
): string | null {
    const window = options.window ?? 10;
    const forwardEnd = Math.min(lines.length, options.end ?? lines.length, start + window);
    const floor = Math.max(0, options.floor ?? 0, start - BACKWARD_LINES);

    const order: number[] = [];
    for (let i = start; i < forwardEnd; i++) order.push(i);
    for (let i = start - 1; i >= floor; i--) order.push(i);

    for (const matcher of MATCHERS) {
        for (const index of order) {
            const token = matcher(lines[index]);
            if (token) return normalizeAccountNumber(token);
        }
    }

    return null;
}
