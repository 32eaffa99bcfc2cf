const MASK_CHARS = /[Xx*]/;

/**
 * Canonicalizes an account number into its masked display form.
 * - tokens that already carry a mask (X, x, *) come back uppercased, unchanged otherwise
 * - exactly four digits become XXXX-XXXX-XXXX-1234
 * - 8 to 19 bare digits are masked down to the last four and grouped in fours
 * - anything else is returned stripped
 */
export function normalizeAccountNumber(raw: string): string {
    const stripped = raw.replace(/[\s-]+/g, '');

    if (MASK_CHARS.test(stripped)) {
        return stripped.toUpperCase();
    }

    if (/^\d{4}$/.test(stripped)) {
        return `XXXX-XXXX-XXXX-${stripped}`;
    }

    if (/^\d{8,19}$/.test(stripped)) {
        const masked = 'X'.repeat(stripped.length - 4) + stripped.slice(-4);
        return groupFromRight(masked, 4);
    }

    return stripped;
}

function groupFromRight(value: string, size: number): string {
    const groups: string[] = [];
    for (let end = value.length; end > 0; end -= size) {
        groups.unshift(value.slice(Math.max(0, end - size), end));
    }
    return groups.join('-');
}

/** Trailing four digits of an account number, when the report shows them. */
export function extractLast4(accountNumber: string | null | undefined): string | null {
    if (!accountNumber) return null;
    const match = accountNumber.replace(/[\s-]+/g, '').match(/(\d{4})$/);
    return match ? match[1] : null;
}

/**
 * "$4,946.00" -> 4946. Returns null when the string holds no amount.
 */
export function parseCurrency(value: string | null | undefined): number | null {
    if (!value) return null;
    const match = value.replace(/,/g, '').match(/-?\d+(?:\.\d+)?/);
    if (!match) return null;
    const amount = parseFloat(match[0]);
    return Number.isFinite(amount) ? amount : null;
}

/** Balance reduced to a comparable key: "$4,946" and "$4,946.00" both give "4946". */
export function normalizeBalanceKey(value: string | null | undefined): string {
    const amount = parseCurrency(value);
    return amount === null ? '' : String(amount);
}

export function countDigits(value: string): number {
    return (value.match(/\d/g) || []).length;
}
