import { describe, expect, it } from 'vitest';
import { AccountRecord, createAccountRecord } from '../../types/account_types';
import { ConsumerDetails } from '../../types/report_types';
import { LetterAccount, describeLateEntries, letterEngine, maskForLetter } from '../letter_engine';

const consumer: ConsumerDetails = { fullName: 'Jane Doe', address: '1 Main St\nSpringfield, IL 62701' };
const date = new Date(2024, 0, 15);

function record(creditor: string, label: string, overrides: Partial<AccountRecord>): AccountRecord {
    return { ...createAccountRecord(creditor, label, 0), ...overrides };
}

const chargeOff: LetterAccount = {
    account: record('DISCOVER', 'DISCOVER CARD', {
        accountNumber: '601101XXXXXX',
        status: 'Charge off',
        balance: '$4,946',
        negativeItems: ['Charge off'],
        violations: ['Balance reported after charge-off: no sale disclosed']
    }),
    policy: 'delete',
    references: []
};

const late: LetterAccount = {
    account: record('CHASE', 'CHASE', {
        accountNumber: '4266841234567890',
        status: 'Late',
        statusRaw: '30 days late',
        negativeItems: ['Late'],
        lateEntries: [{ month: 4, year: 2023, severity: 30 }],
        latePaymentCount: 1
    }),
    policy: 'correct',
    references: ['FCRA guide: Late payment disputes']
};

describe('maskForLetter', () => {
    it('prints report masks verbatim and masks full numbers', () => {
        expect(maskForLetter('601101XXXXXX')).toBe('601101XXXXXX');
        expect(maskForLetter('3499929444639913')).toBe('XXXX-XXXX-XXXX-9913');
        expect(maskForLetter('12345')).toBe('XXXX-XXXX-XXXX-2345');
        expect(maskForLetter(null)).toBe('Not reported');
    });
});

describe('describeLateEntries', () => {
    it('lists months, or the count when no months were read', () => {
        expect(describeLateEntries(late.account)).toBe('Apr 2023 (30 days)');
        expect(describeLateEntries(record('CHASE', 'CHASE', { latePaymentCount: 3 }))).toBe('3 late payment(s) reported');
        expect(describeLateEntries(record('CHASE', 'CHASE', {}))).toBeNull();
    });
});

describe('letterEngine.composeBureauLetter', () => {
    const letter = letterEngine.composeBureauLetter({
        consumer,
        bureau: 'Equifax',
        roundNumber: 1,
        accounts: [late, chargeOff],
        date
    });
    const lines = letter.split('\n');

    it('opens with the consumer, the bureau address and the date', () => {
        expect(lines.slice(0, 9)).toEqual([
            'Jane Doe',
            '1 Main St',
            'Springfield, IL 62701',
            '',
            'Equifax Information Services LLC',
            'P.O. Box 740256',
            'Atlanta, GA 30374',
            '',
            'January 15, 2024'
        ]);
        expect(lines).toContain('Re: Dispute of inaccurate information (round 1)');
    });

    it('lists deletions before corrections', () => {
        const deletion = lines.indexOf('## Demand for deletion');
        const correction = lines.indexOf('## Demand for correction');
        expect(deletion).toBeGreaterThan(-1);
        expect(correction).toBeGreaterThan(deletion);
        expect(lines[deletion + 2]).toBe('### 1. DISCOVER CARD');
        expect(lines[correction + 2]).toBe('### 1. CHASE');
    });

    it('renders each account with masked numbers and its evidence', () => {
        expect(lines).toContain('- Account number: 601101XXXXXX');
        expect(lines).toContain('- Account number: XXXX-XXXX-XXXX-7890');
        expect(lines).toContain('- Reported status: 30 days late');
        expect(lines).toContain('- Reported balance: Not reported');
        expect(lines).toContain('- Late payments: Apr 2023 (30 days)');
        expect(lines).toContain('  - Balance reported after charge-off: no sale disclosed');
        expect(lines).toContain('  - FCRA guide: Late payment disputes');
        expect(lines).toContain('- Requested action: delete this account from my file.');
        expect(lines).toContain('- Requested action: remove the late payment notations and report this account as paid as agreed.');
        expect(letter).not.toContain('4266841234567890');
    });

    it('escalates the opening by round', () => {
        const second = letterEngine.composeBureauLetter({ consumer, bureau: 'Experian', roundNumber: 2, accounts: [late], date });
        const third = letterEngine.composeBureauLetter({ consumer, bureau: 'Experian', roundNumber: 3, accounts: [late], date });

        expect(second).toContain('Section 611(a)(7)');
        expect(third).toContain('Consumer Financial Protection Bureau');
    });
});

describe('letterEngine.composeFurnisherLetter', () => {
    it('adds a debt validation demand for collections', () => {
        const collection: LetterAccount = {
            ...chargeOff,
            account: { ...chargeOff.account, status: 'Collection', negativeItems: ['Collection'] }
        };

        const withCollection = letterEngine.composeFurnisherLetter({ consumer, furnisher: 'LVNV FUNDING', roundNumber: 1, accounts: [collection], date });
        const withoutCollection = letterEngine.composeFurnisherLetter({ consumer, furnisher: 'CHASE', roundNumber: 1, accounts: [late], date });

        expect(withCollection).toContain('Section 809 of the Fair Debt Collection Practices Act');
        expect(withoutCollection).not.toContain('Section 809');
        expect(withoutCollection.split('\n')[4]).toBe('CHASE');
    });
});

describe('letterEngine.composeInquiryLetter', () => {
    it('numbers each inquiry', () => {
        const letter = letterEngine.composeInquiryLetter({
            consumer,
            bureau: 'TransUnion',
            inquiries: [
                { furnisher: 'CAPITAL ONE', date: '2024-06', raw: 'CAPITAL ONE  06/15/2024' },
                { furnisher: 'ACME AUTO', date: null, raw: 'ACME AUTO' }
            ],
            date
        });
        const lines = letter.split('\n');

        expect(lines).toContain('1. CAPITAL ONE (2024-06)');
        expect(lines).toContain('2. ACME AUTO (date not reported)');
        expect(lines).toContain('Re: Unauthorized hard inquiries');
    });
});

describe('letterEngine.composeRound0Letter', () => {
    const empty = { names: [], addresses: [], employers: [], phones: [], emails: [] };

    it('lists the consumer\'s identifiers and each group to delete', () => {
        const letter = letterEngine.composeRound0Letter({
            consumer: { ...consumer, phone: '555-123-4567' },
            bureau: 'Equifax',
            toDelete: { ...empty, names: ['JANE SMITH'], employers: ['ACME CORP'] },
            date
        });

        expect(letter).toContain('Equifax Information Services LLC');
        expect(letter).toContain('Re: Round 0 personal information cleanup');
        expect(letter).toContain('- Address: 1 Main St; Springfield, IL 62701\n- Phone: 555-123-4567\n');
        expect(letter).toContain('### Names\n- JANE SMITH\n\n### Employers\n- ACME CORP\n');
        expect(letter).not.toContain('### Addresses');
        expect(letter).not.toContain('No mismatched identifiers');
    });

    it('asks for confirmation when nothing mismatches', () => {
        const letter = letterEngine.composeRound0Letter({ consumer, bureau: 'Experian', toDelete: empty, date });

        expect(letter).toContain('No mismatched identifiers appear on the copy of my report I reviewed.');
        expect(letter.split('\n').slice(-2)).toEqual(['Jane Doe', '']);
    });
});
