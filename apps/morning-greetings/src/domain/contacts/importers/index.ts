/**
 * @fileoverview Contact importers barrel exports
 *
 * @module domain/contacts/importers
 */

export { importList } from "./listImporter.js";
export { importCsv, DEFAULT_CSV_SEPARATOR, type CsvImportOptions } from "./csvImporter.js";
export { importJson, isJsonLinesPath, type JsonImportOptions } from "./jsonImporter.js";
export { importText, type TextImportOptions } from "./textImporter.js";
export {
    fsSourceReader,
    splitLines,
    type SourceReader,
    type SourceLine,
} from "./sourceReader.js";
