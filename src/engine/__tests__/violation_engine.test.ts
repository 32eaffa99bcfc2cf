import { describe, expect, it } from 'vitest';
import { AccountRecord, createAccountRecord } from '../../types/account_types';
import { ViolationEngine } from '../violation_engine';

function account(overrides: Partial<AccountRecord>): AccountRecord {
    return { ...createAccountRecord('TEST CREDITOR', 'TEST CREDITOR', 0), ...overrides };
}

describe('ViolationEngine', () => {
    it('flags small medical collections', () => {
        const record = account({
            creditor: 'MEDICAL CENTER HOSPITAL',
            rawCreditor: 'MEDICAL CENTER HOSPITAL',
            status: 'Collection',
            balance: '$300'
        });
        const lines = ['MEDICAL CENTER HOSPITAL', 'Status: Collection', 'Balance: $300'];

        expect(ViolationEngine.validate(record, lines)).toEqual([
            'Medical collection under $500: medical collection with a balance of $300 should not be reported per NCRA policy (2023)'
        ]);
    });

    it('flags a monthly payment on a charge-off and accepts sold debt balances', () => {
        const record = account({ status: 'Charge off', balance: '$1,200' });
        const lines = ['Monthly payment: $50', 'Debt sold to LVNV'];

        expect(ViolationEngine.validate(record, lines)).toEqual([
            'Monthly payment reported on a written-off account: $50 monthly payment reported on a Charge off account; the scheduled payment should be $0'
        ]);
    });

    it('flags obsolete and re-aged balances', () => {
        const record = account({
            creditor: 'PORTFOLIO RECOVERY ASSOCIATES',
            status: 'Collection',
            balance: '$500',
            dofd: { month: 1, year: 2015, raw: '01/2015' },
            dateReported: { month: 6, year: 2024, raw: '06/2024' },
            statusUpdated: { month: 6, year: 2024, raw: '06/2024' }
        });

        expect(ViolationEngine.validate(record, [])).toEqual([
            'Obsolete information: reported 113 months after the date of first delinquency, beyond the 7-year reporting period',
            'Re-aging concern: balance of $500 still reported 113 months after the date of first delinquency'
        ]);
    });

    it('flags a status update far from the reporting date on an old delinquency', () => {
        const record = account({
            status: 'Late',
            dofd: { month: 1, year: 2017, raw: '01/2017' },
            dateReported: { month: 6, year: 2023, raw: '06/2023' },
            statusUpdated: { month: 1, year: 2017, raw: '01/2017' }
        });

        expect(ViolationEngine.validate(record, [])).toEqual([
            'Re-aging concern: status updated on old DOFD account (status updated 01/2017, DOFD 01/2017)'
        ]);
    });

    it('flags a DOFD that moves with the reporting date', () => {
        const record = account({
            status: 'Charge off',
            dofd: { month: 3, year: 2024, raw: '03/2024' },
            dateReported: { month: 3, year: 2024, raw: 'Mar 2024' }
        });

        expect(ViolationEngine.validate(record, [])).toEqual([
            'DOFD equals Date Reported: date of first delinquency (03/2024) matches the date reported (Mar 2024) on a Charge off account'
        ]);
    });

    it('flags closed accounts that still look open', () => {
        const record = account({ status: 'Closed' });
        const lines = ['Open/Closed: Closed', 'Credit limit: $2,000', 'Account open since 2019'];

        expect(ViolationEngine.validate(record, lines)).toEqual([
            'Conflicting open/closed status: account is reported as Closed while the same tradeline also shows it as Open',
            'Open credit limit on a closed account: closed account still reports a $2000 credit limit'
        ]);
    });

    it('flags a past-due amount on a paid account', () => {
        const record = account({ status: 'Paid as agreed' });
        expect(ViolationEngine.validate(record, ['Amount past due: $125'])).toEqual([
            'Past-due amount on a paid account: status "Paid as agreed" conflicts with a reported past-due amount of $125'
        ]);
    });

    it('flags revolving and installment reported together', () => {
        const record = account({ accountType: 'Revolving' });
        expect(ViolationEngine.validate(record, ['Loan type: Installment'])).toEqual([
            'Account type mismatch: tradeline is reported both as revolving/credit card and as an installment loan'
        ]);
    });

    it('returns nothing for a clean account', () => {
        expect(ViolationEngine.validate(account({ status: 'Paid as agreed', balance: '$0' }), ['Balance: $0'])).toEqual([]);
    });
});
