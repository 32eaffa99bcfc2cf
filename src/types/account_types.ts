export type PositiveStatus =
    | 'Never late'
    | 'Exceptional payment history'
    | 'Paid as agreed'
    | 'Current'
    | 'Paid, Closed'
    | 'Paid'
    | 'Open'
    | 'Closed';

export type NegativeStatus =
    | 'Bankruptcy'
    | 'Foreclosure'
    | 'Charge off'
    | 'Repossession'
    | 'Collection'
    | 'Settled'
    | 'Late';

export type AccountStatus = PositiveStatus | NegativeStatus;

export type LateSeverity = 30 | 60 | 90;

export interface LateEntry {
    month: number; // 1-12
    year: number | null;
    severity: LateSeverity;
}

export interface ReportDate {
    month: number;
    year: number;
    raw: string;
}

/**
 * Where the current status came from. An explicit "Status:" line is authoritative,
 * anything else was inferred from nearby text.
 */
export type StatusSource = 'explicit' | 'inferred' | 'grid';

export interface AccountRecord {
    creditor: string;
    rawCreditor: string;
    displayCreditor: string;
    accountNumber: string | null;
    accountType: string | null;
    balance: string | null;
    status: AccountStatus | null;
    statusSource: StatusSource | null;
    statusRaw: string | null;
    negativeItems: NegativeStatus[];
    lateEntries: LateEntry[];
    latePaymentCount: number;
    dofd: ReportDate | null;
    dateReported: ReportDate | null;
    statusUpdated: ReportDate | null;
    violations: string[];
    /** Index of the line that opened this record in the report text. */
    lineIndex: number;
}

export type PolicyDecision = 'delete' | 'correct';

export interface ClassifiedAccount {
    account: AccountRecord;
    policy: PolicyDecision;
}

export function createAccountRecord(
    creditor: string,
    rawCreditor: string,
    lineIndex: number
): AccountRecord {
    return {
        creditor,
        rawCreditor,
        displayCreditor: rawCreditor.replace(/\s+/g, ' ').trim(),
        accountNumber: null,
        accountType: null,
        balance: null,
        status: null,
        statusSource: null,
        statusRaw: null,
        negativeItems: [],
        lateEntries: [],
        latePaymentCount: 0,
        dofd: null,
        dateReported: null,
        statusUpdated: null,
        violations: [],
        lineIndex
    };
}
