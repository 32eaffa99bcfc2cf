export class ParseError extends Error {
    constructor(
        public readonly stage: string,
        message: string,
        public readonly lineIndex: number | null = null
    ) {
        super(message);
        this.name = 'ParseError';
    }
}

export type ParseResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: ParseError };

export function ok<T>(value: T): ParseResult<T> {
    return { ok: true, value };
}

export function fail<T>(error: ParseError): ParseResult<T> {
    return { ok: false, error };
}

/**
 * Runs one extraction stage and turns anything it throws into a ParseError.
 * Callers decide what the empty value is when the stage fails.
 */
export function attempt<T>(stage: string, lineIndex: number | null, task: () => T): ParseResult<T> {
    try {
        return ok(task());
    } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        return fail(new ParseError(stage, message, lineIndex));
    }
}
