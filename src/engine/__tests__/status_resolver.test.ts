import { describe, expect, it } from 'vitest';
import { StatusResolver, confirmsChargeOff, isSevereDerogatory, statusSeverity } from '../status_resolver';

function resolve(lines: string[], context = ''): ReturnType<StatusResolver['snapshot']> {
    const resolver = new StatusResolver(context);
    resolver.observeLines(lines);
    return resolver.snapshot();
}

function permutations<T>(items: T[]): T[][] {
    if (items.length <= 1) return [items];
    return items.flatMap((item, index) =>
        permutations([...items.slice(0, index), ...items.slice(index + 1)]).map(rest => [item, ...rest])
    );
}

describe('StatusResolver', () => {
    it('lets an explicit status line win regardless of line order', () => {
        for (const lines of permutations(['Paid as agreed', 'Charge off reported', 'Status: Collection'])) {
            expect(resolve(lines).status).toBe('Collection');
        }
    });

    it('keeps inferred derogatories in negativeItems under an explicit positive', () => {
        const snapshot = resolve(['Charge off', 'Status: Paid as agreed']);
        expect(snapshot.status).toBe('Paid as agreed');
        expect(snapshot.statusSource).toBe('explicit');
        expect(snapshot.negativeItems).toEqual(['Charge off']);
    });

    it('does not clear an explicit severe derogatory', () => {
        const snapshot = resolve(['Status: Charge off', 'Status: Paid as agreed', 'Never late']);
        expect(snapshot.status).toBe('Charge off');
        expect(snapshot.statusRaw).toBe('Charge off');
        expect(snapshot.negativeItems).toEqual(['Charge off']);
    });

    it('only replaces an inferred status with a more severe one', () => {
        const snapshot = resolve(['Collection', 'Late payment']);
        expect(snapshot.status).toBe('Collection');
        expect(snapshot.negativeItems).toEqual(['Collection', 'Late']);
    });

    it('lets a positive label outrank an inferred late mark', () => {
        const snapshot = resolve(['30 days late', 'Current']);
        expect(snapshot.status).toBe('Current');
        expect(snapshot.negativeItems).toEqual(['Late']);
    });

    it('skips legend lines', () => {
        const snapshot = resolve(['Legend: CO = Charge off, 30 = 30 days late', 'Status: Open']);
        expect(snapshot.status).toBe('Open');
        expect(snapshot.negativeItems).toEqual([]);
    });

    it('treats tabular amount rows as fields', () => {
        expect(resolve(['Amount past due $0', 'Balance 450'])).toMatchObject({ status: null, negativeItems: [] });
        expect(resolve(['Past due 60 days'])).toMatchObject({ status: 'Late', negativeItems: ['Late'] });
    });

    it('reads a status value rendered under its label', () => {
        const snapshot = resolve(['Status:', '', 'Charge off']);
        expect(snapshot.status).toBe('Charge off');
        expect(snapshot.statusSource).toBe('explicit');
        expect(snapshot.statusRaw).toBe('Charge off');
    });

    it('only reports foreclosure on real-estate accounts', () => {
        expect(resolve(['Foreclosure'], 'Revolving DISCOVER').status).toBeNull();
        expect(resolve(['Foreclosure'], 'Mortgage ROCKET MORTGAGE').status).toBe('Foreclosure');
    });

    it('promotes a grid charge-off over an inferred positive only', () => {
        const inferred = new StatusResolver();
        inferred.observeLine('Paid');
        inferred.promoteChargeOff();
        expect(inferred.snapshot()).toMatchObject({ status: 'Charge off', statusSource: 'grid', negativeItems: ['Charge off'] });

        const explicit = new StatusResolver();
        explicit.observeLine('Status: Paid');
        explicit.promoteChargeOff();
        expect(explicit.snapshot()).toMatchObject({ status: 'Paid', statusSource: 'explicit', negativeItems: ['Charge off'] });
    });
});

describe('confirmsChargeOff', () => {
    it('accepts CO cells under month headers', () => {
        expect(confirmsChargeOff(['Jan Feb Mar', 'CO CO CO'])).toBe(true);
    });

    it('accepts a payment code field', () => {
        expect(confirmsChargeOff(['Payment code: CO'])).toBe(true);
    });

    it('ignores legend text', () => {
        expect(confirmsChargeOff(['Legend: CO = charge off', 'Jan Feb'])).toBe(false);
    });

    it('does not count a corporate CO suffix as a grid cell', () => {
        expect(confirmsChargeOff([
            'ENHANCED RECOVERY CO',
            'Original creditor: X CO',
            'Opened: Mar 2018',
            'Reported: May 2024'
        ])).toBe(false);
    });

    it('does not count lowercase prose as a month header', () => {
        expect(confirmsChargeOff(['Jan', 'CO CO', 'you may dispute this'])).toBe(false);
        expect(confirmsChargeOff(['Jan May', 'CO CO'])).toBe(true);
    });
});

describe('severity helpers', () => {
    it('orders statuses', () => {
        expect(statusSeverity('Bankruptcy')).toBe(10);
        expect(statusSeverity('Never late')).toBe(15);
        expect(statusSeverity(null)).toBe(0);
        expect(isSevereDerogatory('Collection')).toBe(true);
        expect(isSevereDerogatory('Late')).toBe(false);
    });
});
