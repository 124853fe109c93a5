/**
 * Error taxonomy for a sync run.
 *
 * Slice-local errors (CapExceededError, QueryError on a fallback slice,
 * ClassificationError) are contained by the caller. Everything else
 * propagates to the CLI and aborts the run before the store is saved.
 */

/**
 * The source refused to return all matches of a query.
 */
export class CapExceededError extends Error {
    constructor(
        public readonly query: string,
        public readonly total: number,
        public readonly cap: number
    ) {
        super(`Query matches ${total} results, above the ${cap} result cap: ${query}`);
        this.name = 'CapExceededError';
    }
}

/**
 * The source rejected the query for a reason other than its size.
 */
export class QueryError extends Error {
    constructor(
        message: string,
        public readonly query: string,
        public readonly status?: number
    ) {
        super(message);
        this.name = 'QueryError';
    }
}

/**
 * Network, availability or authorization failure talking to the source.
 */
export class TransportError extends Error {
    constructor(
        message: string,
        public readonly query?: string,
        public readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'TransportError';
    }
}

export class ClassificationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ClassificationError';
    }
}

/**
 * A credential the run needs is not configured.
 */
export class MissingCredentialError extends Error {
    constructor(public readonly variable: string, purpose: string) {
        super(`Missing credential: set the ${variable} environment variable (${purpose}).`);
        this.name = 'MissingCredentialError';
    }
}

/**
 * The record store is absent or unreadable.
 */
export class StoreSchemaError extends Error {
    constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StoreSchemaError';
    }
}
