/**
 * @fileoverview Source reader capability
 *
 * Importers never touch the file system directly; they read through a
 * SourceReader so tests and other hosts can supply text from anywhere.
 *
 * @module domain/contacts/importers/sourceReader
 */

import { readFileSync } from "fs";

export interface SourceReader {
    /**
     * Read a whole source as text.
     *
     * @param path - Source identifier, a file path for the default reader
     */
    readText(path: string): string;
}

/**
 * Reads UTF-8 files synchronously.
 */
export const fsSourceReader: SourceReader = {
    readText: (path) => readFileSync(path, "utf-8"),
};

/**
 * A non-blank line of a source with its 1-based line number.
 */
export interface SourceLine {
    readonly text: string;
    readonly line: number;
}

/**
 * Split text into non-blank lines, accepting both LF and CRLF endings.
 */
export function splitLines(text: string): SourceLine[] {
    return text
        .split(/\r?\n/)
        .map((value, index) => ({ text: value, line: index + 1 }))
        .filter((entry) => entry.text.trim().length > 0);
}
