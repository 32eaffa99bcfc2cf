import { describe, expect, it } from 'vitest';
import { ParseError, attempt } from '../parse_result';

describe('attempt', () => {
    it('wraps the value of a successful stage', () => {
        expect(attempt('fields', 3, () => 42)).toEqual({ ok: true, value: 42 });
    });

    it('turns a thrown error into a ParseError', () => {
        const result = attempt('dates', 7, () => {
            throw new Error('bad date');
        });

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(ParseError);
        expect(result.error.stage).toBe('dates');
        expect(result.error.lineIndex).toBe(7);
        expect(result.error.message).toBe('bad date');
    });
});
