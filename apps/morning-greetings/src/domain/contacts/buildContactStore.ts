/**
 * @fileoverview Contact store builder
 *
 * Builds a ContactStore from the selected import modes. Every selected
 * mode's source is checked before anything is read, so a missing source
 * never leaves a half-built store behind. Sources are then applied in the
 * fixed order LIST, CSV, JSON, TEXT.
 *
 * @module domain/contacts/buildContactStore
 */

import { silentLogger, type Logger } from "@daybreak/engine";
import type { ContactInput } from "../entities/Contact.js";
import { MissingSourceError } from "../errors.js";
import { ContactStore } from "./ContactStore.js";
import type { ImportModes } from "./importMode.js";
import {
    importCsv,
    importJson,
    importList,
    importText,
    type SourceReader,
} from "./importers/index.js";

/**
 * Sources per mode. A single path is accepted wherever a list is.
 */
export interface ContactSources {
    readonly list?: readonly ContactInput[];
    readonly csv?: string | readonly string[];
    readonly json?: string | readonly string[];
    readonly text?: string | readonly string[];
}

export interface BuildContactStoreOptions {
    /** CSV field separator (default ",") */
    readonly csvSeparator?: string;

    /** TEXT field separator (default: any whitespace) */
    readonly textSeparator?: string;

    readonly reader?: SourceReader;
    readonly logger?: Logger;
}

function toPaths(source: string | readonly string[] | undefined): readonly string[] {
    if (source === undefined) {
        return [];
    }
    return typeof source === "string" ? [source] : source;
}

/**
 * @example
 * ```typescript
 * const store = buildContactStore(
 *     importModes({ csv: true, json: true }),
 *     { csv: ["contacts.csv"], json: ["contact.json", "contacts.jsonl"] },
 *     { logger },
 * );
 * ```
 *
 * @throws MissingSourceError if a selected mode has no source
 * @throws ImportParseError if a file cannot be parsed
 */
export function buildContactStore(
    modes: ImportModes,
    sources: ContactSources = {},
    options: BuildContactStoreOptions = {}
): ContactStore {
    const logger = options.logger ?? silentLogger;

    const list = sources.list ?? [];
    const csv  = toPaths(sources.csv);
    const json = toPaths(sources.json);
    const text = toPaths(sources.text);

    if (modes.list && list.length === 0) {
        throw new MissingSourceError("LIST");
    }
    if (modes.csv && csv.length === 0) {
        throw new MissingSourceError("CSV");
    }
    if (modes.json && json.length === 0) {
        throw new MissingSourceError("JSON");
    }
    if (modes.text && text.length === 0) {
        throw new MissingSourceError("TEXT");
    }

    const store = new ContactStore({ logger });
    const readerOptions = { reader: options.reader, logger };

    if (modes.list) {
        importList(store, list, logger);
    }
    if (modes.csv) {
        importCsv(store, csv, { ...readerOptions, separator: options.csvSeparator });
    }
    if (modes.json) {
        importJson(store, json, readerOptions);
    }
    if (modes.text) {
        importText(store, text, { ...readerOptions, separator: options.textSeparator });
    }

    logger.info("Contact store built", { contacts: store.size, modes: { ...modes } });

    return store;
}
