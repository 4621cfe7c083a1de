/**
 * Error type for malformed data handed to a pipeline stage
 */

export type IdenticonErrorKind = "InvalidInput";

export class IdenticonError extends Error {
    readonly kind: IdenticonErrorKind;

    constructor(kind: IdenticonErrorKind, message: string) {
        super(`ERROR-ID-01: ${message}`);
        this.name = "IdenticonError";
        this.kind = kind;
    }
}

export function invalidInput(message: string): IdenticonError {
    return new IdenticonError("InvalidInput", message);
}

export function isInvalidInput(error: unknown): error is IdenticonError {
    return error instanceof IdenticonError && error.kind === "InvalidInput";
}
