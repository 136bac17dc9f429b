/**
 * @fileoverview Per-record error isolation for importers
 *
 * @module domain/contacts/importers/addOrSkip
 */

import { describeError, type Logger } from "@daybreak/engine";
import { InvalidFieldError } from "../../errors.js";

/**
 * Where a record came from, for log entries.
 */
export interface RecordLocation {
    readonly source: string;
    readonly line?: number;
}

/**
 * Run one record's insertion. A record with an invalid field is logged and
 * skipped; any other error propagates and aborts the import.
 *
 * @returns true if the record was handed to the store
 */
export function addOrSkip(location: RecordLocation, logger: Logger, insert: () => void): boolean {
    try {
        insert();
        return true;
    }
    catch (error) {
        if (!(error instanceof InvalidFieldError)) {
            throw error;
        }

        logger.warn("Skipping invalid contact", {
            ...location,
            field: error.field,
            error: describeError(error),
        });
        return false;
    }
}
