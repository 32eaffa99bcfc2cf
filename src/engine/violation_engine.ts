import { AccountRecord, ReportDate } from '../types/account_types';
import { monthsBetween } from '../utils/date_tokens';
import { parseCurrency } from '../utils/normalization';

export const REAGING_THRESHOLDS = {
    /** Beyond the seven-year FCRA reporting window. */
    obsolete: 84,
    statusUpdated: 60,
    balanceOnOldDebt: 48
} as const;

export const MEDICAL_BALANCE_THRESHOLD = 500;

const MEDICAL_CREDITOR = /medical|hospital|health|clinic|physician|radiology|anesthesia|ambulance|emergency|pathology|surgical|\bmd\b|dental|urgent\s+care/i;
const TRANSFER_LANGUAGE = /\bsold\b|transferred|\bassigned\b|purchased\s+by/i;
const TYPE_LINE = /^\s*(?:account\s+type|type|loan\s+type|kind\s+of\s+business|account\s+description|terms)\s*[:-]\s*(.*)$/i;
const DATE_FIELD_LINE = /^\s*(?:date\s+[\w ]+|dofd|status\s+updated|last\s+payment)\s*[:-]/i;

function labeledAmount(blockLines: string[], label: RegExp): number | null {
    for (const line of blockLines) {
        const match = line.match(label);
        if (match) return parseCurrency(match[1]);
    }
    return null;
}

const MONTHLY_PAYMENT = /^\s*(?:monthly|scheduled)\s+payment(?:\s+amount)?\s*[:-]?\s*(\$?\s*[\d,]+(?:\.\d+)?)/i;
const CREDIT_LIMIT = /^\s*credit\s+limit\s*[:-]?\s*(\$?\s*[\d,]+(?:\.\d+)?)/i;
const PAST_DUE = /^\s*(?:amount\s+)?past\s+due(?:\s+amount)?\s*[:-]?\s*(\$?\s*[\d,]+(?:\.\d+)?)/i;

function sameMonth(a: ReportDate, b: ReportDate): boolean {
    return a.month === b.month && a.year === b.year;
}

/**
 * Metro 2 consistency and re-aging checks over one account block. Every rule
 * runs independently; a rule whose inputs are missing is skipped.
 */
export class ViolationEngine {
    public static validate(account: AccountRecord, blockLines: string[]): string[] {
        const violations: string[] = [];
        const status = account.status;
        const statusText = (status ?? '').toLowerCase();
        const isCollectionOrChargeOff = status === 'Collection' || status === 'Charge off';
        const isClosed = status === 'Closed' || status === 'Paid, Closed';
        const balance = parseCurrency(account.balance);

        // 1. Payments on written-off debt
        const monthlyPayment = labeledAmount(blockLines, MONTHLY_PAYMENT);
        if (isCollectionOrChargeOff && monthlyPayment !== null && monthlyPayment > 0) {
            violations.push(this.describe(
                'Monthly payment reported on a written-off account',
                `$${monthlyPayment} monthly payment reported on a ${status} account; the scheduled payment should be $0`
            ));
        }

        // 2. Closed and open at once
        if (isClosed && blockLines.some(line => !DATE_FIELD_LINE.test(line) && /\bopen\b(?!\s*\/)/i.test(line))) {
            violations.push(this.describe(
                'Conflicting open/closed status',
                'account is reported as Closed while the same tradeline also shows it as Open'
            ));
        }

        // 3. Credit limit on a closed account
        const creditLimit = labeledAmount(blockLines, CREDIT_LIMIT);
        if (isClosed && creditLimit !== null && creditLimit > 0) {
            violations.push(this.describe(
                'Open credit limit on a closed account',
                `closed account still reports a $${creditLimit} credit limit`
            ));
        }

        // 4. Past due on a paid account
        const pastDue = labeledAmount(blockLines, PAST_DUE);
        if ((statusText.includes('paid') || statusText.includes('never late')) && pastDue !== null && pastDue > 0) {
            violations.push(this.describe(
                'Past-due amount on a paid account',
                `status "${status}" conflicts with a reported past-due amount of $${pastDue}`
            ));
        }

        // 5. Balance on a charge-off that was never transferred
        const blockText = blockLines.join('\n');
        if (status === 'Charge off' && balance !== null && balance > 0 && !TRANSFER_LANGUAGE.test(blockText)) {
            violations.push(this.describe(
                'Balance reported after charge-off',
                `charged-off account reports a $${balance} balance with no sale or transfer disclosed`
            ));
        }

        // 6. Revolving vs installment
        const typeText = [account.accountType ?? '', ...blockLines.map(line => line.match(TYPE_LINE)?.[1] ?? '')].join(' ');
        if (/revolving|credit\s+card/i.test(typeText) && /installment|\bloan\b/i.test(typeText)) {
            violations.push(this.describe(
                'Account type mismatch',
                'tradeline is reported both as revolving/credit card and as an installment loan'
            ));
        }

        const { dofd, dateReported, statusUpdated } = account;

        // 7. DOFD should stay fixed once delinquency begins
        if (isCollectionOrChargeOff && dofd && dateReported && sameMonth(dofd, dateReported)) {
            violations.push(this.describe(
                'DOFD equals Date Reported',
                `date of first delinquency (${dofd.raw}) matches the date reported (${dateReported.raw}) on a ${status} account`
            ));
        }

        // 8. Re-aging
        if (dofd && dateReported) {
            const age = monthsBetween(dofd.month, dofd.year, dateReported.month, dateReported.year);
            if (age !== null) {
                if (age > REAGING_THRESHOLDS.obsolete) {
                    violations.push(this.describe(
                        'Obsolete information',
                        `reported ${age} months after the date of first delinquency, beyond the 7-year reporting period`
                    ));
                }

                if (age > REAGING_THRESHOLDS.statusUpdated && statusUpdated) {
                    const drift = monthsBetween(statusUpdated.month, statusUpdated.year, dateReported.month, dateReported.year);
                    if (drift !== null && Math.abs(drift) > REAGING_THRESHOLDS.statusUpdated) {
                        violations.push(this.describe(
                            'Re-aging concern',
                            `status updated on old DOFD account (status updated ${statusUpdated.raw}, DOFD ${dofd.raw})`
                        ));
                    }
                }

                if (age > REAGING_THRESHOLDS.balanceOnOldDebt && balance !== null && balance > 0) {
                    violations.push(this.describe(
                        'Re-aging concern',
                        `balance of $${balance} still reported ${age} months after the date of first delinquency`
                    ));
                }
            }
        }

        // 9. Medical collections under the NCRA threshold
        const creditorText = `${account.creditor} ${account.rawCreditor}`;
        const isCollection = status === 'Collection' || (account.statusRaw ?? '').toLowerCase().includes('collection');
        if (MEDICAL_CREDITOR.test(creditorText) && isCollection && balance !== null && balance < MEDICAL_BALANCE_THRESHOLD) {
            violations.push(this.describe(
                'Medical collection under $500',
                `medical collection with a balance of ${account.balance} should not be reported per NCRA policy (2023)`
            ));
        }

        return violations;
    }

    private static describe(title: string, detail: string): string {
        return `${title}: ${detail}`;
    }
}
