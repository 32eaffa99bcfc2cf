import { env } from '../config/env';
import { AccountRecord, LateEntry, ReportDate, createAccountRecord } from '../types/account_types';
import { parseMonthYear } from '../utils/date_tokens';
import { ParseError, ParseResult, attempt } from '../utils/parse_result';
import { extractAccountNumberFromContext } from './account_number_locator';
import { CreditorMatch, detectAccountHeader } from './creditor_recognizer';
import { estimateLatePaymentCount, extractLateEntries } from './late_entry_extractor';
import { ACCOUNT_SECTION, NON_ACCOUNT_SECTION } from './report_sections';
import { StatusResolver, StatusSnapshot, confirmsChargeOff } from './status_resolver';
import { ViolationEngine } from './violation_engine';

export const BLOCK_MAX_LINES = 200;
const ACCOUNT_NUMBER_WINDOW = 10;
const DUPLICATE_HEADER_DISTANCE = 2;
const BALANCE_SCAN_LINES = 10;

const ACCOUNT_TYPE = /^\s*(?:account\s+type|type|loan\s+type|account\s+description)\s*[:-]\s*(.+)$/i;
const LABELED_BALANCE = /^\s*(?:current\s+|recent\s+)?balance(?:\s+owed)?\s*[:-]?\s*(\$\s?[\d,]+(?:\.\d{2})?)/i;
const CURRENCY = /\$\s?[\d,]+(?:\.\d{2})?/;
const NOT_A_BALANCE = /limit|high|payment|past\s+due|original\s+amount|credit\s+line|charge[\s-]?off\s+amount/i;

const DATE_FIELDS: Array<{ key: 'dofd' | 'dateReported' | 'statusUpdated'; pattern: RegExp }> = [
    { key: 'dofd', pattern: /^\s*(?:dofd|date\s+of\s+first\s+delinquency|first\s+delinquency(?:\s+date)?)\s*[:-]?\s*(.*)$/i },
    { key: 'dateReported', pattern: /^\s*(?:date\s+reported|reported\s+date|last\s+reported)\s*[:-]?\s*(.*)$/i },
    { key: 'statusUpdated', pattern: /^\s*status\s+updated\s*[:-]?\s*(.*)$/i }
];

export interface ExtractionDiagnostics {
    accounts: AccountRecord[];
    warnings: ParseError[];
}

interface AccountHeader {
    index: number;
    match: CreditorMatch;
}

interface AccountFields {
    accountType: string | null;
    balance: string | null;
}

type AccountDates = Pick<AccountRecord, 'dofd' | 'dateReported' | 'statusUpdated'>;

function cleanBalance(value: string): string {
    return value.replace(/\$\s+/, '$').trim();
}

function firstValue(raw: string): string {
    return raw.trim().split(/\s{2,}|\t/)[0].trim();
}

/** Header lines in file order, skipping non-account report sections. */
function findAccountHeaders(lines: string[]): AccountHeader[] {
    const headers: AccountHeader[] = [];
    let inAccountSection = true;

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (ACCOUNT_SECTION.test(line)) {
            inAccountSection = true;
            continue;
        }
        if (NON_ACCOUNT_SECTION.test(line)) {
            inAccountSection = false;
            continue;
        }
        if (!inAccountSection) continue;

        const match = detectAccountHeader(lines, i);
        if (!match) continue;

        const previous = headers[headers.length - 1];
        if (
            previous &&
            previous.match.canonical === match.canonical &&
            i - previous.index <= DUPLICATE_HEADER_DISTANCE &&
            extractAccountNumberFromContext(lines, previous.index, { window: i - previous.index, floor: previous.index }) === null
        ) {
            // Label repeated on consecutive lines of the same tradeline.
            continue;
        }

        headers.push({ index: i, match });
        i += match.consumedLines;
    }

    return headers;
}

/** A block also stops at an inquiries / personal information / public records heading. */
function blockEnd(lines: string[], start: number, limit: number): number {
    for (let i = start + 1; i < limit; i++) {
        if (NON_ACCOUNT_SECTION.test(lines[i])) return i;
    }
    return limit;
}

export function extractAccountFields(blockLines: string[]): AccountFields {
    let accountType: string | null = null;
    let balance: string | null = null;

    for (const line of blockLines) {
        if (accountType === null) {
            const type = line.match(ACCOUNT_TYPE);
            if (type) accountType = firstValue(type[1]) || null;
        }
        if (balance === null) {
            const labeled = line.match(LABELED_BALANCE);
            if (labeled) balance = cleanBalance(labeled[1]);
        }
    }

    if (balance === null && blockLines.length > 0) {
        const onHeader = blockLines[0].match(CURRENCY);
        if (onHeader) balance = cleanBalance(onHeader[0]);
    }

    if (balance === null) {
        for (const line of blockLines.slice(1, BALANCE_SCAN_LINES)) {
            if (NOT_A_BALANCE.test(line)) continue;
            const amount = line.match(CURRENCY);
            if (amount) {
                balance = cleanBalance(amount[0]);
                break;
            }
        }
    }

    return { accountType, balance };
}

function toReportDate(raw: string): ReportDate | null {
    const { month, year } = parseMonthYear(raw);
    if (month === null || year === null) return null;
    return { month, year, raw };
}

export function extractAccountDates(blockLines: string[]): AccountDates {
    const dates: AccountDates = { dofd: null, dateReported: null, statusUpdated: null };

    blockLines.forEach((line, index) => {
        for (const field of DATE_FIELDS) {
            if (dates[field.key] !== null) continue;
            const match = line.match(field.pattern);
            if (!match) continue;

            let value = firstValue(match[1]);
            if (!value && index + 1 < blockLines.length) value = firstValue(blockLines[index + 1]);
            dates[field.key] = toReportDate(value);
        }
    });

    return dates;
}

function resolveStatus(blockLines: string[], record: AccountRecord): StatusSnapshot {
    const resolver = new StatusResolver(`${record.accountType ?? ''} ${record.rawCreditor} ${record.creditor}`);
    resolver.observeLines(blockLines);
    if (confirmsChargeOff(blockLines)) resolver.promoteChargeOff();
    return resolver.snapshot();
}

/**
 * Runs one stage; on failure the diagnostic is kept and the caller's empty
 * value is used so the rest of the block still gets parsed.
 */
function runStage<T>(
    warnings: ParseError[],
    stage: string,
    lineIndex: number,
    empty: T,
    task: () => T
): T {
    const result: ParseResult<T> = attempt(stage, lineIndex, task);
    if (result.ok) return result.value;

    warnings.push(result.error);
    console.warn(`[Extraction] Skipped ${stage} for account at line ${lineIndex}: ${result.error.message}`);
    return empty;
}

function buildAccount(
    lines: string[],
    header: AccountHeader,
    end: number,
    floor: number,
    warnings: ParseError[]
): AccountRecord | null {
    const start = header.index;
    const record = createAccountRecord(header.match.canonical, header.match.label, start);
    const blockLines = lines.slice(start, end);

    record.accountNumber = runStage<string | null>(warnings, 'account-number', start, null, () =>
        extractAccountNumberFromContext(lines, start, { window: ACCOUNT_NUMBER_WINDOW, end, floor })
    );

    const fields = runStage<AccountFields>(warnings, 'fields', start, { accountType: null, balance: null }, () =>
        extractAccountFields(blockLines)
    );
    record.accountType = fields.accountType;
    record.balance = fields.balance;

    Object.assign(record, runStage<AccountDates>(warnings, 'dates', start, { dofd: null, dateReported: null, statusUpdated: null }, () =>
        extractAccountDates(blockLines)
    ));

    const status = runStage<StatusSnapshot>(
        warnings,
        'status',
        start,
        { status: null, statusSource: null, statusRaw: null, negativeItems: [] },
        () => resolveStatus(blockLines, record)
    );
    record.status = status.status;
    record.statusSource = status.statusSource;
    record.statusRaw = status.statusRaw;
    record.negativeItems = status.negativeItems;

    record.lateEntries = runStage<LateEntry[]>(warnings, 'late-entries', start, [], () =>
        extractLateEntries(lines, start, { end })
    );
    record.latePaymentCount = record.lateEntries.length > 0
        ? record.lateEntries.length
        : runStage(warnings, 'late-count', start, 0, () => estimateLatePaymentCount(blockLines.join('\n')));

    record.violations = runStage<string[]>(warnings, 'violations', start, [], () =>
        ViolationEngine.validate(record, blockLines)
    );

    if (record.accountNumber === null && record.status === null) return null;

    if (env.LOG_LEVEL === 'debug') {
        console.debug(`[Extraction] ${record.creditor} (${record.accountNumber ?? 'no number'}) status=${record.status ?? 'none'} late=${record.latePaymentCount}`);
    }
    return record;
}

/**
 * Single forward pass over the report text. Each creditor header opens a
 * block that runs to the next header (or BLOCK_MAX_LINES); blocks that end
 * with neither an account number nor a status are dropped.
 */
export function extractAccountDetailsWithDiagnostics(text: string): ExtractionDiagnostics {
    const warnings: ParseError[] = [];
    if (!text.trim()) return { accounts: [], warnings };

    const lines = text.split(/\r?\n/);
    const headers = findAccountHeaders(lines);
    const accounts: AccountRecord[] = [];

    headers.forEach((header, k) => {
        const next = k + 1 < headers.length ? headers[k + 1].index : lines.length;
        const end = blockEnd(lines, header.index, Math.min(next, header.index + BLOCK_MAX_LINES, lines.length));
        const floor = k > 0 ? headers[k - 1].index + 1 : 0;
        const account = buildAccount(lines, header, end, floor, warnings);
        if (account) accounts.push(account);
    });

    console.log(`[Extraction] ${accounts.length} account(s) from ${headers.length} header(s) over ${lines.length} lines`);
    return { accounts, warnings };
}

export function extractAccountDetails(text: string): AccountRecord[] {
    return extractAccountDetailsWithDiagnostics(text).accounts;
}
