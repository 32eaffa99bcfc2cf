import { describe, expect, it } from 'vitest';
import {
    captureFullLabel,
    detectAccountHeader,
    isUpperCaseDominant,
    matchExplicitCreditorField,
    recognizeCreditor
} from '../creditor_recognizer';

describe('recognizeCreditor', () => {
    it('maps an alias to its canonical name and keeps the on-report label', () => {
        const match = recognizeCreditor('DISCOVER CARD  601101XXXXXX  Charge off  $4,946');
        expect(match).toEqual({ canonical: 'DISCOVER', label: 'DISCOVER CARD', explicit: false, consumedLines: 0 });
    });

    it('never opens an account on a field-label line', () => {
        expect(recognizeCreditor('Account type: CAPITAL ONE')).toBeNull();
        expect(recognizeCreditor('Status: Collection')).toBeNull();
        expect(recognizeCreditor('Original creditor: CHASE')).toBeNull();
    });

    it('ignores prose that only mentions a creditor', () => {
        expect(recognizeCreditor('You may contact DISCOVER CARD at the address below')).toBeNull();
    });

    it('collapses credit union names', () => {
        expect(recognizeCreditor('NAVY FEDERAL CREDIT UNION  XXXX1234')?.canonical).toBe('NAVY FCU');
    });

    it('keeps the retailer in slash labels', () => {
        expect(recognizeCreditor('THD/CBNA  XXXX-5678')?.canonical).toBe('THD/CBNA');
    });

    it('recognizes compressed student-loan servicer names', () => {
        const match = recognizeCreditor('DEPTEDNELNET  XXXX1111');
        expect(match?.canonical).toBe('DEPT OF EDUCATION/NELNET');
        expect(match?.label).toBe('DEPTEDNELNET');
    });
});

describe('explicit creditor fields', () => {
    it('takes the value from the next line when the field is empty', () => {
        const lines = ['Account name:', 'Discover Card', 'Status: Open'];
        expect(matchExplicitCreditorField(lines, 0)).toEqual({
            canonical: 'DISCOVER',
            label: 'Discover Card',
            explicit: true,
            consumedLines: 1
        });
    });

    it('is preferred over the pattern table', () => {
        const match = detectAccountHeader(['Creditor name: AMEX'], 0);
        expect(match?.explicit).toBe(true);
        expect(match?.canonical).toBe('AMERICAN EXPRESS');
    });
});

describe('label helpers', () => {
    it('cuts the label at the first metadata token', () => {
        expect(captureFullLabel('CAPITAL ONE Account 1234')).toBe('CAPITAL ONE');
        expect(captureFullLabel('SYNCB/AMAZON  Jan 2024')).toBe('SYNCB/AMAZON');
    });

    it('checks uppercase dominance', () => {
        expect(isUpperCaseDominant('DISCOVER CARD')).toBe(true);
        expect(isUpperCaseDominant('Discover')).toBe(false);
    });
});
