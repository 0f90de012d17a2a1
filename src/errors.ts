export const SYMBOLIZER_ERROR_CODES = Object.freeze({
    CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
    INITIALIZATION_ERROR: 'INITIALIZATION_ERROR',
    IO_ERROR: 'IO_ERROR',
} as const);

export type SymbolizerErrorCode = (typeof SYMBOLIZER_ERROR_CODES)[keyof typeof SYMBOLIZER_ERROR_CODES];

export class SymbolizerError extends Error {
    readonly errorCode: SymbolizerErrorCode;

    constructor(
        message: string,
        input: {
            readonly errorCode: SymbolizerErrorCode;
            readonly cause?: unknown;
        }
    ) {
        super(message, 'cause' in input ? { cause: input.cause } : undefined);
        this.name = 'SymbolizerError';
        this.errorCode = input.errorCode;
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

export function configurationError(message: string): SymbolizerError {
    return new SymbolizerError(message, {
        errorCode: SYMBOLIZER_ERROR_CODES.CONFIGURATION_ERROR,
    });
}

export function initializationError(message: string, cause?: unknown): SymbolizerError {
    const detail = cause === undefined ? message : `${message}: ${describeError(cause)}`;
    return new SymbolizerError(detail, {
        errorCode: SYMBOLIZER_ERROR_CODES.INITIALIZATION_ERROR,
        cause,
    });
}

export function ioError(message: string, cause: unknown): SymbolizerError {
    return new SymbolizerError(`${message}: ${describeError(cause)}`, {
        errorCode: SYMBOLIZER_ERROR_CODES.IO_ERROR,
        cause,
    });
}

export function isIoError(error: unknown): error is SymbolizerError {
    return error instanceof SymbolizerError && error.errorCode === SYMBOLIZER_ERROR_CODES.IO_ERROR;
}
