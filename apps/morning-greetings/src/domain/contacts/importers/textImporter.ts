/**
 * @fileoverview TEXT importer
 *
 * One contact per line, three tokens split on any whitespace by default
 * or on a given separator. A line without exactly three tokens aborts
 * the import.
 *
 * @module domain/contacts/importers/textImporter
 */

import { silentLogger, type Logger } from "@daybreak/engine";
import { ImportParseError } from "../../errors.js";
import type { ContactStore } from "../ContactStore.js";
import { addOrSkip } from "./addOrSkip.js";
import { fsSourceReader, splitLines, type SourceReader } from "./sourceReader.js";

export interface TextImportOptions {
    /** Token separator; any run of whitespace when omitted */
    readonly separator?: string;
    readonly reader?: SourceReader;
    readonly logger?: Logger;
}

function tokenize(text: string, separator: string | undefined): string[] {
    if (separator === undefined) {
        return text.trim().split(/\s+/);
    }
    return text.split(separator).map((token) => token.trim());
}

/**
 * @returns Number of records accepted across all files
 * @throws ImportParseError on a line with the wrong token count
 */
export function importText(
    store: ContactStore,
    paths: readonly string[],
    options: TextImportOptions = {}
): number {
    const reader = options.reader ?? fsSourceReader;
    const logger = options.logger ?? silentLogger;

    let accepted = 0;

    for (const path of paths) {
        for (const { text, line } of splitLines(reader.readText(path))) {
            const tokens = tokenize(text, options.separator);

            if (tokens.length !== 3) {
                const expected = options.separator === undefined
                    ? "separated by whitespace"
                    : `separated by "${options.separator}"`;
                throw new ImportParseError(path, line, `expected 3 fields ${expected}, found ${tokens.length}`);
            }

            const [name, email, preferredTime] = tokens;
            if (addOrSkip({ source: path, line }, logger, () => store.add(name, email, preferredTime))) {
                accepted++;
            }
        }

        logger.debug("Imported text source", { source: path });
    }

    return accepted;
}
