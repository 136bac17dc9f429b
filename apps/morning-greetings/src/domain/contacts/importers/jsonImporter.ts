/**
 * @fileoverview JSON / JSONL importer
 *
 * - `*.jsonl` (any case): one contact object per non-blank line
 * - anything else: one contact object, or an array of them
 *
 * Contact objects use the keys `name`, `email` and `preferred_time`;
 * `preferred_time` may be omitted. Malformed JSON or an entry that is not
 * an object aborts the import; an object with a bad field is skipped.
 *
 * @module domain/contacts/importers/jsonImporter
 */

import { z } from "zod";
import { describeError, silentLogger, type Logger } from "@daybreak/engine";
import { DEFAULT_PREFERRED_TIME } from "../../entities/Contact.js";
import { ImportParseError, InvalidFieldError, type ContactField } from "../../errors.js";
import type { ContactStore } from "../ContactStore.js";
import { addOrSkip } from "./addOrSkip.js";
import { fsSourceReader, splitLines, type SourceReader } from "./sourceReader.js";

export interface JsonImportOptions {
    readonly reader?: SourceReader;
    readonly logger?: Logger;
}

const jsonContactSchema = z.object({
    name          : z.string(),
    email         : z.string(),
    preferred_time: z.string().default(DEFAULT_PREFERRED_TIME),
});

const FIELD_BY_KEY: Record<string, ContactField> = {
    name          : "name",
    email         : "email",
    preferred_time: "preferredTime",
};

/**
 * A parsed JSON value with the line it came from (null for whole-file JSON).
 */
interface JsonEntry {
    readonly value: unknown;
    readonly line: number | null;
}

export function isJsonLinesPath(path: string): boolean {
    return path.toLowerCase().endsWith(".jsonl");
}

function parseJson(path: string, text: string, line: number | null): unknown {
    try {
        return JSON.parse(text);
    }
    catch (error) {
        throw new ImportParseError(path, line, `invalid JSON: ${describeError(error)}`);
    }
}

function readEntries(path: string, text: string): JsonEntry[] {
    if (isJsonLinesPath(path)) {
        return splitLines(text).map(({ text: lineText, line }) => ({
            value: parseJson(path, lineText, line),
            line,
        }));
    }

    const parsed = parseJson(path, text, null);
    const values: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

    return values.map((value) => ({ value, line: null }));
}

/**
 * Validate the shape of one entry.
 *
 * @throws ImportParseError if the entry is not an object
 * @throws InvalidFieldError if a field is missing or not a string
 */
function toContactFields(path: string, entry: JsonEntry) {
    if (typeof entry.value !== "object" || entry.value === null || Array.isArray(entry.value)) {
        throw new ImportParseError(path, entry.line, "expected a contact object");
    }

    const result = jsonContactSchema.safeParse(entry.value);
    if (!result.success) {
        const issue = result.error.issues[0];
        const key   = String(issue.path[0]);
        throw new InvalidFieldError(FIELD_BY_KEY[key] ?? "name", `${key}: ${issue.message}`);
    }

    return result.data;
}

/**
 * @returns Number of records accepted across all files
 * @throws ImportParseError on malformed JSON or a non-object entry
 */
export function importJson(
    store: ContactStore,
    paths: readonly string[],
    options: JsonImportOptions = {}
): number {
    const reader = options.reader ?? fsSourceReader;
    const logger = options.logger ?? silentLogger;

    let accepted = 0;

    for (const path of paths) {
        for (const entry of readEntries(path, reader.readText(path))) {
            const location = entry.line === null ? { source: path } : { source: path, line: entry.line };

            const added = addOrSkip(location, logger, () => {
                const fields = toContactFields(path, entry);
                store.add(fields.name, fields.email, fields.preferred_time);
            });
            if (added) {
                accepted++;
            }
        }

        logger.debug("Imported JSON source", { source: path, jsonLines: isJsonLinesPath(path) });
    }

    return accepted;
}
