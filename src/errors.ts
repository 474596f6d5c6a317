/**
 * The oracle could not produce an utterance: timeout, transport failure,
 * auth, rate limit or a malformed response. Callers never need the subtype.
 */
export class OracleUnavailable extends Error {
    readonly oracle?: string;

    constructor(message: string, options: { oracle?: string; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'OracleUnavailable';
        this.oracle = options.oracle;
    }

    static from(error: unknown, oracle?: string): OracleUnavailable {
        if (error instanceof OracleUnavailable) {
            return error;
        }
        const detail = error instanceof Error ? error.message : String(error);
        return new OracleUnavailable(
            oracle ? `Oracle "${oracle}" unavailable: ${detail}` : `Oracle unavailable: ${detail}`,
            { oracle, cause: error }
        );
    }
}

export function isOracleUnavailable(value: unknown): value is OracleUnavailable {
    return value instanceof OracleUnavailable;
}
