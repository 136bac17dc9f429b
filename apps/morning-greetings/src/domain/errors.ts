/**
 * @fileoverview Greetings domain errors
 *
 * Every error raised by the greetings domain extends GreetingsError and
 * carries a stable `code` for callers that branch on the failure kind.
 *
 * @module domain/errors
 */

export type GreetingsErrorCode =
    | "INVALID_FIELD"
    | "DUPLICATE_CONTACT"
    | "CONTACT_NOT_FOUND"
    | "INVALID_IMPORT_MODE"
    | "MISSING_SOURCE"
    | "IMPORT_PARSE";

/**
 * Contact fields that can fail validation. `body` belongs to an outgoing message.
 */
export type ContactField = "name" | "email" | "preferredTime" | "body";

/**
 * Import modes as named in error messages.
 */
export type ImportModeName = "LIST" | "CSV" | "JSON" | "TEXT";

export abstract class GreetingsError extends Error {
    abstract readonly code: GreetingsErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidFieldError extends GreetingsError {
    readonly code = "INVALID_FIELD";

    constructor(readonly field: ContactField, message: string) {
        super(message);
    }
}

export class DuplicateContactError extends GreetingsError {
    readonly code = "DUPLICATE_CONTACT";

    constructor(readonly contactName: string) {
        super(`A contact named "${contactName}" already exists`);
    }
}

export class ContactNotFoundError extends GreetingsError {
    readonly code = "CONTACT_NOT_FOUND";

    constructor(readonly contactName: string) {
        super(`No contact named "${contactName}"`);
    }
}

export class InvalidImportModeError extends GreetingsError {
    readonly code = "INVALID_IMPORT_MODE";

    constructor(readonly value: number) {
        super(`Invalid import mode ${value}: expected an integer in [0, 15]`);
    }
}

export class MissingSourceError extends GreetingsError {
    readonly code = "MISSING_SOURCE";

    constructor(readonly mode: ImportModeName) {
        super(`Import mode ${mode} was selected, but no source was provided`);
    }
}

export class ImportParseError extends GreetingsError {
    readonly code = "IMPORT_PARSE";

    /**
     * @param source - File the record came from
     * @param line - 1-based line number, when the format is line oriented
     */
    constructor(readonly source: string, readonly line: number | null, reason: string) {
        super(line === null ? `${source}: ${reason}` : `${source}:${line}: ${reason}`);
    }
}

/**
 * Type guard for any greetings domain error.
 */
export function isGreetingsError(value: unknown): value is GreetingsError {
    return value instanceof GreetingsError;
}
