import type { FieldType } from '../types/index.js';

/**
 * A lookup source's data cannot build a usable dictionary
 * (e.g. no record carries an id). Fatal for one field type only.
 */
export class SourceFormatError extends Error {
    constructor(
        message: string,
        public readonly source: string,
        public readonly fieldType?: FieldType
    ) {
        super(message);
        this.name = 'SourceFormatError';
    }
}

/**
 * A lookup source could not be reached (network failure after retries,
 * unreadable file). Same containment as SourceFormatError.
 */
export class SourceUnavailableError extends Error {
    public readonly fieldType: FieldType | undefined;

    constructor(
        message: string,
        public readonly source: string,
        options: { cause?: unknown; fieldType?: FieldType } = {}
    ) {
        super(message, { cause: options.cause });
        this.name = 'SourceUnavailableError';
        this.fieldType = options.fieldType;
    }
}

/**
 * True for the two errors that end a field type's dictionary load.
 */
export function isSourceError(error: unknown): error is SourceFormatError | SourceUnavailableError {
    return error instanceof SourceFormatError || error instanceof SourceUnavailableError;
}
