import { describe, expect, it } from 'vitest';
import { extractAccountNumberFromContext } from '../account_number_locator';

describe('extractAccountNumberFromContext', () => {
    it('reads a labeled number below the creditor line', () => {
        const lines = ['CHASE', 'Account number: 4266 8412 3456 7890'];
        expect(extractAccountNumberFromContext(lines, 0)).toBe('XXXX-XXXX-XXXX-7890');
    });

    it('reads "ending in" fragments', () => {
        const lines = ['AMEX', 'Card ending in 4321'];
        expect(extractAccountNumberFromContext(lines, 0)).toBe('XXXX-XXXX-XXXX-4321');
    });

    it('prefers a labeled field over a bare masked token on an earlier line', () => {
        const lines = ['CHASE 601101XXXXXX', 'Account number: XXXX-XXXX-XXXX-1234'];
        expect(extractAccountNumberFromContext(lines, 0)).toBe('XXXXXXXXXXXX1234');
    });

    it('falls back to a bare masked token', () => {
        const lines = ['DISCOVER CARD  601101XXXXXX  Charge off  $4,946'];
        expect(extractAccountNumberFromContext(lines, 0)).toBe('601101XXXXXX');
    });

    it('looks back a couple of lines when nothing follows', () => {
        const lines = ['Acct # 5555', 'CHASE', 'Status: Open'];
        expect(extractAccountNumberFromContext(lines, 1)).toBe('XXXX-XXXX-XXXX-5555');
    });

    it('does not read into the next account or below the floor', () => {
        const lines = ['Account number: 9999', 'CHASE', 'Status: Open', 'AMEX', 'Account number: 1234'];
        expect(extractAccountNumberFromContext(lines, 1, { end: 3, floor: 1 })).toBeNull();
    });
});
