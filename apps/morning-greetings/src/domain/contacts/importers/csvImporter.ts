/**
 * @fileoverview CSV importer
 *
 * One contact per line, `name<sep>email<sep>time`, no header row.
 * A line without exactly three fields aborts the import.
 *
 * @module domain/contacts/importers/csvImporter
 */

import { silentLogger, type Logger } from "@daybreak/engine";
import { ImportParseError } from "../../errors.js";
import type { ContactStore } from "../ContactStore.js";
import { addOrSkip } from "./addOrSkip.js";
import { fsSourceReader, splitLines, type SourceReader } from "./sourceReader.js";

export const DEFAULT_CSV_SEPARATOR = ",";

export interface CsvImportOptions {
    readonly separator?: string;
    readonly reader?: SourceReader;
    readonly logger?: Logger;
}

/**
 * @returns Number of records accepted across all files
 * @throws ImportParseError on a line with the wrong field count
 */
export function importCsv(
    store: ContactStore,
    paths: readonly string[],
    options: CsvImportOptions = {}
): number {
    const separator = options.separator ?? DEFAULT_CSV_SEPARATOR;
    const reader    = options.reader ?? fsSourceReader;
    const logger    = options.logger ?? silentLogger;

    let accepted = 0;

    for (const path of paths) {
        for (const { text, line } of splitLines(reader.readText(path))) {
            const fields = text.split(separator).map((field) => field.trim());

            if (fields.length !== 3) {
                throw new ImportParseError(
                    path,
                    line,
                    `expected 3 fields separated by "${separator}", found ${fields.length}`
                );
            }

            const [name, email, preferredTime] = fields;
            if (addOrSkip({ source: path, line }, logger, () => store.add(name, email, preferredTime))) {
                accepted++;
            }
        }

        logger.debug("Imported CSV source", { source: path });
    }

    return accepted;
}
