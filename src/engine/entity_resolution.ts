import { AccountRecord, AccountStatus } from '../types/account_types';
import { countDigits, extractLast4, normalizeBalanceKey, parseCurrency } from '../utils/normalization';
import { mergeLateEntries } from './late_entry_extractor';
import { STATUS_RULES, isSevereDerogatory, statusSeverity } from './status_resolver';

const MULTI = 'MULTI';

const SUFFIXES = / (?:BANK|NA|N\.A\.|NATIONAL ASSOCIATION|FSB|INC|LLC|CORPORATION|CORP|CO|USA|CARD|CARDS|SERVICES)$/;

const LOOKUP: Record<string, string> = {
    'JPM CHASE': 'CHASE',
    'JPMORGAN CHASE': 'CHASE',
    'JPMCB': 'CHASE',
    'AMEX': 'AMERICAN EXPRESS',
    'CAP1': 'CAPITAL ONE',
    'CAPITALONE': 'CAPITAL ONE',
    'SYNCB': 'SYNCHRONY',
    'CITI': 'CITIBANK',
    'DISCOVERCARD': 'DISCOVER'
};

/**
 * Creditor name reduced for identity comparison: corporate suffixes dropped,
 * known aliases collapsed. Any "x/CBNA" label becomes CBNA and every Capital
 * One variant, auto included, becomes CAPITAL ONE.
 */
export function normalizeCreditorName(name: string): string {
    let clean = name.toUpperCase().replace(/\s+/g, ' ').trim();

    if (/CBNA/.test(clean)) return 'CBNA';
    if (/^(?:CAP(?:ITAL)?\s*ONE|CAPITALONE|CAP1)\b/.test(clean)) return 'CAPITAL ONE';

    let previous = '';
    while (previous !== clean) {
        previous = clean;
        clean = clean.replace(SUFFIXES, '').trim();
    }

    return LOOKUP[clean] ?? clean;
}

export type ProductGroup = 'AUTO' | 'GEN';

export function productGroup(account: AccountRecord): ProductGroup {
    if (account.accountType && /installment/i.test(account.accountType)) return 'AUTO';
    if (/auto\b/i.test(account.rawCreditor)) return 'AUTO';
    return 'GEN';
}

export function accountMergeKey(account: AccountRecord): string {
    return [
        normalizeCreditorName(account.creditor),
        productGroup(account),
        extractLast4(account.accountNumber) ?? 'UNK',
        normalizeBalanceKey(account.balance)
    ].join('|');
}

function fallbackKey(account: AccountRecord): string {
    return `${normalizeCreditorName(account.creditor)}|${normalizeBalanceKey(account.balance)}`;
}

/** Severe derogatories first, then severity, then table order. */
function statusRank(status: AccountStatus | null): [number, number, number] {
    const index = STATUS_RULES.findIndex(rule => rule.status === status);
    return [isSevereDerogatory(status) ? 1 : 0, statusSeverity(status), index === -1 ? -Infinity : -index];
}

function outranks(left: AccountStatus | null, right: AccountStatus | null): boolean {
    const a = statusRank(left);
    const b = statusRank(right);
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return a[i] > b[i];
    }
    return false;
}

function pickBalance(left: string | null, right: string | null): string | null {
    if (left === null || right === null) return left ?? right;
    if (left === right) return left;

    const digitsLeft = countDigits(left);
    const digitsRight = countDigits(right);
    if (digitsLeft !== digitsRight) return digitsLeft > digitsRight ? left : right;

    const valueLeft = parseCurrency(left) ?? 0;
    const valueRight = parseCurrency(right) ?? 0;
    if (valueLeft !== valueRight) return valueLeft > valueRight ? left : right;

    return left < right ? left : right;
}

function pickAccountNumber(left: string | null, right: string | null): string | null {
    if (left === null || right === null) return left ?? right;
    const digitsLeft = countDigits(left);
    const digitsRight = countDigits(right);
    if (digitsLeft !== digitsRight) return digitsLeft > digitsRight ? left : right;
    return left <= right ? left : right;
}

function union<T>(left: T[], right: T[]): T[] {
    return [...new Set([...left, ...right])];
}

/**
 * Copy-on-write merge of two records describing the same tradeline.
 * Neither input is modified.
 */
export function mergeRecords(left: AccountRecord, right: AccountRecord): AccountRecord {
    const statusFrom = outranks(right.status, left.status) ? right : left;
    const lateEntries = mergeLateEntries(left.lateEntries, right.lateEntries);
    const negativeItems = union(left.negativeItems, right.negativeItems)
        .sort((a, b) => statusSeverity(b) - statusSeverity(a));

    return {
        ...left,
        accountNumber: pickAccountNumber(left.accountNumber, right.accountNumber),
        accountType: left.accountType ?? right.accountType,
        balance: pickBalance(left.balance, right.balance),
        status: statusFrom.status,
        statusSource: statusFrom.statusSource,
        statusRaw: statusFrom.statusRaw ?? left.statusRaw ?? right.statusRaw,
        negativeItems,
        lateEntries,
        latePaymentCount: lateEntries.length > 0
            ? lateEntries.length
            : Math.max(left.latePaymentCount, right.latePaymentCount),
        dofd: left.dofd ?? right.dofd,
        dateReported: left.dateReported ?? right.dateReported,
        statusUpdated: left.statusUpdated ?? right.statusUpdated,
        violations: union(left.violations, right.violations),
        lineIndex: Math.min(left.lineIndex, right.lineIndex)
    };
}

function cloneRecord(account: AccountRecord): AccountRecord {
    return {
        ...account,
        negativeItems: [...account.negativeItems],
        lateEntries: account.lateEntries.map(entry => ({ ...entry })),
        violations: [...account.violations]
    };
}

/**
 * Merges records that share creditor, product group, last four digits and
 * balance. A record with no readable last four joins the single keyed record
 * that shares its creditor and balance; once two keyed records share that
 * pair it is marked MULTI and no implicit merge happens for it.
 */
export function mergeAccountsByKey(accounts: AccountRecord[]): AccountRecord[] {
    const fallback = new Map<string, string>();
    for (const account of accounts) {
        if (extractLast4(account.accountNumber) === null) continue;
        const pair = fallbackKey(account);
        const key = accountMergeKey(account);
        const known = fallback.get(pair);
        if (known === undefined) fallback.set(pair, key);
        else if (known !== key) fallback.set(pair, MULTI);
    }

    const merged = new Map<string, AccountRecord>();
    for (const account of accounts) {
        let key = accountMergeKey(account);
        if (extractLast4(account.accountNumber) === null) {
            const mapped = fallback.get(fallbackKey(account));
            if (mapped !== undefined && mapped !== MULTI) key = mapped;
        }

        const existing = merged.get(key);
        merged.set(key, existing ? mergeRecords(existing, account) : cloneRecord(account));
    }

    const result = [...merged.values()];
    if (result.length !== accounts.length) {
        console.log(`[Merger] ${accounts.length} record(s) merged into ${result.length}`);
    }
    return result;
}

/** Second-pass safety net keyed on creditor and account number (balance when the number is missing). */
export function deduplicateAccounts(accounts: AccountRecord[]): AccountRecord[] {
    const unique = new Map<string, AccountRecord>();
    for (const account of accounts) {
        const key = `${normalizeCreditorName(account.creditor)}_${account.accountNumber ?? normalizeBalanceKey(account.balance)}`;
        const existing = unique.get(key);
        unique.set(key, existing ? mergeRecords(existing, account) : account);
    }
    return [...unique.values()];
}
