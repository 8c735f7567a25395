/**
 * Pipeline stages that talk to the upstream service.
 */
export type RetrievalStage = 'search' | 'fetch';

/**
 * Failure reaching or decoding an upstream endpoint. Fatal to the run.
 * The underlying error (usually an HttpError or SyntaxError) is kept on `cause`.
 */
export class RetrievalError extends Error {
    constructor(
        public readonly stage: RetrievalStage,
        cause: unknown
    ) {
        super(`${stage} request failed: ${describeCause(cause)}`, { cause });
        this.name = 'RetrievalError';
    }
}

/**
 * Query or contact id missing.
 */
export class InvalidInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    return String(cause);
}
