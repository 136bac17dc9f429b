/**
 * @fileoverview LIST importer
 *
 * @module domain/contacts/importers/listImporter
 */

import { silentLogger, type Logger } from "@daybreak/engine";
import type { ContactInput } from "../../entities/Contact.js";
import type { ContactStore } from "../ContactStore.js";
import { addOrSkip } from "./addOrSkip.js";

/**
 * Add already-shaped records to a store, in order.
 *
 * @returns Number of records accepted (duplicates included, invalid ones not)
 */
export function importList(
    store: ContactStore,
    records: readonly ContactInput[],
    logger: Logger = silentLogger
): number {
    let accepted = 0;

    records.forEach((record, index) => {
        const added = addOrSkip({ source: "list", line: index + 1 }, logger, () => {
            store.add(record.name, record.email, record.preferredTime);
        });
        if (added) {
            accepted++;
        }
    });

    return accepted;
}
