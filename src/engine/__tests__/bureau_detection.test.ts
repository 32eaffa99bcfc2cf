import { describe, expect, it } from 'vitest';
import { detectBureau, getBureauAddress } from '../bureau_detection';

describe('detectBureau', () => {
    it('trusts the file name first', () => {
        expect(detectBureau('Experian_report.pdf', 'Equifax Equifax Equifax')).toBe('Experian');
        expect(detectBureau('my-transunion-2024.pdf', '')).toBe('TransUnion');
    });

    it('uses the bureau named most often in the text', () => {
        expect(detectBureau('report.pdf', 'TransUnion summary\nTransUnion file\nEquifax mention')).toBe('TransUnion');
    });

    it('falls back to an unknown bureau', () => {
        expect(detectBureau('report.pdf', 'nothing here')).toBe('Unknown Bureau');
    });
});

describe('getBureauAddress', () => {
    it('returns the dispute address lines', () => {
        expect(getBureauAddress('Equifax')).toEqual(['Equifax Information Services LLC', 'P.O. Box 740256', 'Atlanta, GA 30374']);
        expect(getBureauAddress('Unknown Bureau')).toBeNull();
    });
});
