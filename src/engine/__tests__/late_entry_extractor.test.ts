import { describe, expect, it } from 'vitest';
import {
    dedupeLateEntries,
    estimateLatePaymentCount,
    extractLateEntries,
    mergeLateEntries
} from '../late_entry_extractor';

describe('extractLateEntries', () => {
    it('pairs a month and severity on the same line', () => {
        const lines = ['CHASE', 'Payment history', 'Apr 2023 30', 'May 2023 60'];
        expect(extractLateEntries(lines, 0)).toEqual([
            { month: 4, year: 2023, severity: 30 },
            { month: 5, year: 2023, severity: 60 }
        ]);
    });

    it('aligns a month header row with the value row below it', () => {
        const lines = ['CAPITAL ONE', 'Payment history', '2023', 'Jan Feb Mar Apr', 'OK OK 30 60'];
        expect(extractLateEntries(lines, 0)).toEqual([
            { month: 3, year: 2023, severity: 30 },
            { month: 4, year: 2023, severity: 60 }
        ]);
    });

    it('looks past blank lines for a severity rendered under its month', () => {
        const lines = ['DISCOVER', 'Payment history', 'Apr 2023', '', '30'];
        expect(extractLateEntries(lines, 0)).toEqual([{ month: 4, year: 2023, severity: 30 }]);
    });

    it('does not read date fields as grid cells', () => {
        const lines = ['AMEX', 'Payment history', 'Date Reported: Jun 2025', '60'];
        expect(extractLateEntries(lines, 0)).toEqual([]);
    });

    it('falls back to free-text pairs when there is no grid', () => {
        const lines = ['BARCLAYS', 'Mar 2022: 30 days late'];
        expect(extractLateEntries(lines, 0)).toEqual([{ month: 3, year: 2022, severity: 30 }]);
    });

    it('does not read a month inside a longer word', () => {
        expect(extractLateEntries(['CHASE', 'Marketing balance 30'], 0)).toEqual([]);
    });

    it('skips open dates, loan terms and term lengths', () => {
        expect(extractLateEntries(['CHASE', 'Status: Current', 'Opened: Mar 2018', 'Terms: 60 Months'], 0)).toEqual([]);
        expect(extractLateEntries(['CHASE', 'Mar 2018 60 mos'], 0)).toEqual([]);
    });

    it('stops at the next account', () => {
        const lines = ['CHASE', 'Status: Open', 'AMEX', 'Payment history', 'Apr 2023 30'];
        expect(extractLateEntries(lines, 0, { end: 2 })).toEqual([]);
    });
});

describe('late entry sets', () => {
    it('drops repeated triples and sorts chronologically', () => {
        expect(dedupeLateEntries([
            { month: 5, year: 2023, severity: 60 },
            { month: 4, year: 2023, severity: 30 },
            { month: 5, year: 2023, severity: 60 }
        ])).toEqual([
            { month: 4, year: 2023, severity: 30 },
            { month: 5, year: 2023, severity: 60 }
        ]);
    });

    it('merges as a set union', () => {
        const merged = mergeLateEntries(
            [{ month: 4, year: 2023, severity: 30 }],
            [{ month: 4, year: 2023, severity: 30 }, { month: 5, year: 2023, severity: 60 }]
        );
        expect(merged).toHaveLength(2);
    });
});

describe('estimateLatePaymentCount', () => {
    it('sums aggregate counters', () => {
        expect(estimateLatePaymentCount('30-59 days late: 2\n60-89 days late: 1')).toBe(3);
    });

    it('counts explicit mentions otherwise', () => {
        expect(estimateLatePaymentCount('Reported 30 days late in 2021, then 60 days past due')).toBe(2);
    });

    it('ignores legend lines', () => {
        expect(estimateLatePaymentCount('Status: Paid as agreed\nLegend: 30 days late, 60 days late, 90 days late')).toBe(0);
    });

    it('returns zero for clean text', () => {
        expect(estimateLatePaymentCount('Paid as agreed')).toBe(0);
    });
});
