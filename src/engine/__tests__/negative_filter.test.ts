import { describe, expect, it } from 'vitest';
import { AccountRecord, createAccountRecord } from '../../types/account_types';
import { filterNegativeAccounts, isNegativeAccount } from '../negative_filter';

function record(overrides: Partial<AccountRecord>): AccountRecord {
    return { ...createAccountRecord('CHASE', 'CHASE', 0), ...overrides };
}

describe('isNegativeAccount', () => {
    it('drops a never-late account with no derogatory evidence', () => {
        expect(isNegativeAccount(record({ status: 'Never late' }))).toBe(false);
    });

    it('keeps a strong positive label that carries grid late entries', () => {
        const account = record({
            status: 'Exceptional payment history',
            lateEntries: [{ month: 4, year: 2023, severity: 30 }],
            latePaymentCount: 1
        });
        expect(isNegativeAccount(account)).toBe(true);
    });

    it('does not keep a strong positive label on a late count alone', () => {
        expect(isNegativeAccount(record({ status: 'Never late', latePaymentCount: 2 }))).toBe(false);
    });

    it('keeps a mild positive with late history', () => {
        expect(isNegativeAccount(record({ status: 'Paid as agreed', latePaymentCount: 2 }))).toBe(true);
        expect(isNegativeAccount(record({ status: 'Paid, Closed' }))).toBe(false);
    });

    it('keeps a positive status that hides a severe derogatory', () => {
        expect(isNegativeAccount(record({ status: 'Paid', negativeItems: ['Charge off'] }))).toBe(true);
    });

    it('keeps negative statuses', () => {
        expect(isNegativeAccount(record({ status: 'Late' }))).toBe(true);
        expect(isNegativeAccount(record({ status: null, statusRaw: 'Derogatory' }))).toBe(true);
        expect(isNegativeAccount(record({ status: null }))).toBe(false);
    });
});

describe('filterNegativeAccounts', () => {
    it('filters and deduplicates', () => {
        const accounts = [
            record({ accountNumber: 'XXXX1111', status: 'Collection' }),
            record({ accountNumber: 'XXXX1111', status: 'Collection' }),
            record({ accountNumber: 'XXXX2222', status: 'Open' })
        ];
        const result = filterNegativeAccounts(accounts);

        expect(result).toHaveLength(1);
        expect(result[0].accountNumber).toBe('XXXX1111');
    });
});
