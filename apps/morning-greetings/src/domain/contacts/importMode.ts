/**
 * @fileoverview Import modes
 *
 * Which sources a ContactStore is built from. Modes are named flags rather
 * than a number; the legacy bitset (LIST=1, CSV=2, JSON=4, TEXT=8) is only
 * accepted through {@link importModeFromBits}, which range-checks it.
 *
 * @module domain/contacts/importMode
 */

import { InvalidImportModeError } from "../errors.js";

export interface ImportModes {
    readonly list: boolean;
    readonly csv: boolean;
    readonly json: boolean;
    readonly text: boolean;
}

export const ImportModeBit = {
    LIST: 1,
    CSV : 2,
    JSON: 4,
    TEXT: 8,
} as const;

const MAX_BITS = ImportModeBit.LIST | ImportModeBit.CSV | ImportModeBit.JSON | ImportModeBit.TEXT;

/**
 * No sources selected; builds an empty store.
 */
export const NO_IMPORT: ImportModes = {
    list: false,
    csv : false,
    json: false,
    text: false,
};

/**
 * Build a full flag set from the flags that are on.
 *
 * @example
 * ```typescript
 * importModes({ csv: true, json: true });
 * // { list: false, csv: true, json: true, text: false }
 * ```
 */
export function importModes(selected: Partial<ImportModes>): ImportModes {
    return { ...NO_IMPORT, ...selected };
}

/**
 * Convert a legacy numeric bitset.
 *
 * @throws InvalidImportModeError unless `bits` is an integer in [0, 15]
 */
export function importModeFromBits(bits: number): ImportModes {
    if (!Number.isInteger(bits) || bits < 0 || bits > MAX_BITS) {
        throw new InvalidImportModeError(bits);
    }

    return {
        list: (bits & ImportModeBit.LIST) !== 0,
        csv : (bits & ImportModeBit.CSV) !== 0,
        json: (bits & ImportModeBit.JSON) !== 0,
        text: (bits & ImportModeBit.TEXT) !== 0,
    };
}

export function importModeToBits(modes: ImportModes): number {
    return (modes.list ? ImportModeBit.LIST : 0) |
        (modes.csv ? ImportModeBit.CSV : 0) |
        (modes.json ? ImportModeBit.JSON : 0) |
        (modes.text ? ImportModeBit.TEXT : 0);
}
