import { AccountStatus, NegativeStatus, StatusSource } from '../types/account_types';
import { MONTH_TOKEN } from '../utils/date_tokens';
import { LEGEND_LINE } from './report_sections';

interface StatusRule {
    status: AccountStatus;
    pattern: RegExp;
    severity: number;
    negative: boolean;
}

/**
 * Negative entries first, most severe first, then the positives. Positive
 * statuses outrank negatives so legend text listing every code cannot leak a
 * derogatory onto a clean account; the severe-derogatory guard covers the
 * opposite direction.
 */
export const STATUS_RULES: readonly StatusRule[] = [
    { status: 'Bankruptcy', pattern: /\bbankrupt(?:cy)?\b|\bchapter\s+(?:7|13)\b/i, severity: 10, negative: true },
    { status: 'Foreclosure', pattern: /\bforeclos(?:ure|ed|ing)\b/i, severity: 9, negative: true },
    { status: 'Charge off', pattern: /\bcharge[\s-]?off\b|\bcharged[\s-]?off\b|\bchargeoff\b/i, severity: 8, negative: true },
    { status: 'Repossession', pattern: /\brepossess(?:ion|ed)?\b|\brepo\b/i, severity: 7, negative: true },
    { status: 'Collection', pattern: /\bcollections?\b/i, severity: 6, negative: true },
    { status: 'Settled', pattern: /\bsettled\b|\bsettlement\b/i, severity: 5, negative: true },
    {
        status: 'Late',
        pattern: /\b(?:30|60|90|120|150|180)\s*days?\s+(?:late|past\s+due)\b|\blate\s+payments?\b|\bpast\s+due\b|\bdelinquent\b/i,
        severity: 4,
        negative: true
    },
    { status: 'Never late', pattern: /\bnever\s+late\b/i, severity: 15, negative: false },
    { status: 'Exceptional payment history', pattern: /\bexceptional\s+payment\s+history\b/i, severity: 15, negative: false },
    { status: 'Paid as agreed', pattern: /\b(?:paid|pays|paying)\s+(?:account\s+)?as\s+agreed\b/i, severity: 14, negative: false },
    { status: 'Current', pattern: /\bcurrent\b(?!\s*(?:balance|status|payment|value|:))/i, severity: 14, negative: false },
    { status: 'Paid, Closed', pattern: /\bpaid,?\s+closed\b|\bclosed,?\s+paid\b/i, severity: 13, negative: false },
    { status: 'Paid', pattern: /\bpaid\b(?!\s+as\s+agreed)/i, severity: 13, negative: false },
    { status: 'Open', pattern: /\bopen\b(?!\s*\/)/i, severity: 13, negative: false },
    { status: 'Closed', pattern: /\bclosed\b/i, severity: 13, negative: false }
];

const SEVERE_DEROGATORY: ReadonlySet<AccountStatus> = new Set<AccountStatus>([
    'Charge off', 'Collection', 'Repossession', 'Foreclosure', 'Bankruptcy'
]);

const STATUS_LINE = /^\s*(?:current\s+|account\s+|payment\s+|pay\s+)?status\s*[:-]\s*(.*)$/i;
const STATUS_LABEL_ONLY = /^\s*(?:current\s+|account\s+|payment\s+|pay\s+)?status\s*[:-]?\s*$/i;
const FIELD_VALUE_LINE = /^\s*(?:amount\s+past\s+due|past\s+due(?:\s+amount)?|balance|recent\s+balance|high\s+(?:balance|credit)|credit\s+limit|(?:monthly|scheduled)\s+payment|last\s+payment|actual\s+payment|date\s+[\w ]+|dofd|status\s+updated)(?:\s*[:-]|\s*\$\s?\d|\s+[\d,.]+\s*$)/i;
const REAL_ESTATE = /mortgage|\bheloc\b|home\s+equity|real\s+estate|\bfha\b|\bva\s+loan\b/i;

export function isSevereDerogatory(status: AccountStatus | null): boolean {
    return status !== null && SEVERE_DEROGATORY.has(status);
}

export function statusSeverity(status: AccountStatus | null): number {
    if (status === null) return 0;
    const rule = STATUS_RULES.find(entry => entry.status === status);
    return rule ? rule.severity : 0;
}

export function isNegativeStatus(status: AccountStatus): status is NegativeStatus {
    return STATUS_RULES.some(rule => rule.status === status && rule.negative);
}

export interface StatusSnapshot {
    status: AccountStatus | null;
    statusSource: StatusSource | null;
    statusRaw: string | null;
    negativeItems: NegativeStatus[];
}

/**
 * Accumulates status evidence for one account block.
 * Explicit "Status:" values are authoritative; everything else only
 * replaces the current status when strictly more severe.
 */
export class StatusResolver {
    private status: AccountStatus | null = null;
    private source: StatusSource | null = null;
    private raw: string | null = null;
    private readonly negatives: NegativeStatus[] = [];
    private pendingExplicit = false;

    /** Type and creditor text; Foreclosure only counts for real-estate accounts. */
    constructor(private readonly accountContext: string = '') {}

    public observeLine(line: string): void {
        const text = line.trim();
        if (!text) return;

        if (this.pendingExplicit) {
            this.pendingExplicit = false;
            this.applyExplicit(text);
            return;
        }

        if (STATUS_LABEL_ONLY.test(text)) {
            this.pendingExplicit = true;
            return;
        }

        const explicit = text.match(STATUS_LINE);
        if (explicit) {
            this.applyExplicit(explicit[1].trim());
            return;
        }

        if (LEGEND_LINE.test(text) || FIELD_VALUE_LINE.test(text)) return;

        for (const rule of this.matchingRules(text)) {
            this.applyInferred(rule);
        }
    }

    public observeLines(lines: string[]): void {
        this.pendingExplicit = false;
        for (const line of lines) this.observeLine(line);
    }

    /**
     * Block-level rescue: a charge-off split across a payment grid.
     * Never replaces a severe derogatory or an explicit status.
     */
    public promoteChargeOff(): void {
        this.recordNegative('Charge off');
        if (isSevereDerogatory(this.status) || this.source === 'explicit') return;
        this.status = 'Charge off';
        this.source = 'grid';
    }

    public snapshot(): StatusSnapshot {
        return {
            status: this.status,
            statusSource: this.source,
            statusRaw: this.raw,
            negativeItems: [...this.negatives]
        };
    }

    private matchingRules(text: string): StatusRule[] {
        return STATUS_RULES.filter(rule => {
            if (!rule.pattern.test(text)) return false;
            if (rule.status === 'Foreclosure' && !REAL_ESTATE.test(this.accountContext)) return false;
            return true;
        });
    }

    private applyExplicit(value: string): void {
        if (!value) return;
        if (this.raw === null) this.raw = value;

        const rules = this.matchingRules(value);
        rules.filter(rule => rule.negative).forEach(rule => this.recordNegative(rule.status));

        const negatives = rules.filter(rule => rule.negative);
        const chosen = negatives.length > 0
            ? negatives.reduce((best, rule) => (rule.severity > best.severity ? rule : best))
            : rules.find(rule => !rule.negative);
        if (!chosen) return;

        // An authoritative derogatory survives a later authoritative positive.
        if (this.source === 'explicit' && isSevereDerogatory(this.status) && !chosen.negative) return;

        this.status = chosen.status;
        this.source = 'explicit';
    }

    private applyInferred(rule: StatusRule): void {
        if (rule.negative) this.recordNegative(rule.status);
        if (this.source === 'explicit') return;
        if (!rule.negative && isSevereDerogatory(this.status)) return;
        if (rule.severity <= statusSeverity(this.status)) return;

        this.status = rule.status;
        this.source = 'inferred';
    }

    private recordNegative(status: AccountStatus): void {
        if (isNegativeStatus(status) && !this.negatives.includes(status)) {
            this.negatives.push(status);
        }
    }
}

const PAYMENT_CODE_CO = /payment\s+code\s*[:-]?\s*CO\b/i;
const GRID_CELL = /^(?:OK|CO|C|ND|X|-+|\*|30|60|90|120|150|180)$/;

/** More than half of the line's cells are payment-grid codes. */
function isGridRow(line: string): boolean {
    const cells = line.trim().split(/\s+/).filter(Boolean);
    return cells.length > 0 && cells.filter(cell => GRID_CELL.test(cell)).length * 2 > cells.length;
}

/**
 * True when a block confirms a charge-off through its payment grid: a
 * "payment code: CO" field, or at least two CO cells on grid rows alongside
 * at least two capitalized month headers, all outside legend text.
 */
export function confirmsChargeOff(blockLines: string[]): boolean {
    const body = blockLines.filter(line => !LEGEND_LINE.test(line));
    if (body.some(line => PAYMENT_CODE_CO.test(line))) return true;

    let coTokens = 0;
    let monthTokens = 0;
    for (const line of body) {
        if (isGridRow(line)) {
            coTokens += line.trim().split(/\s+/).filter(cell => cell === 'CO').length;
        }
        monthTokens += [...line.matchAll(MONTH_TOKEN)].filter(token => /^[A-Z]/.test(token[1])).length;
    }
    return coTokens >= 2 && monthTokens >= 2;
}
