/**
 * @fileoverview Command line options
 *
 * `morning-greetings [--csv FILE]... [--json FILE]... [--txt FILE]...
 *  [--csv-sep SEP] [--txt-sep SEP] [--plugins DIR]`
 *
 * @module cli/program
 */

import { Command } from "commander";
import { importModes, type ImportModes } from "../domain/contacts/importMode.js";
import type { ContactSources } from "../domain/contacts/buildContactStore.js";

export type CliOptions = {
    readonly csv: readonly string[];
    readonly json: readonly string[];
    readonly txt: readonly string[];
    readonly csvSep?: string;
    readonly txtSep?: string;
    readonly plugins?: string;
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

/**
 * Build the commander program. Parsing errors exit the process unless
 * the caller sets `exitOverride()`.
 */
export function createProgram(): Command {
    return new Command()
        .name("morning-greetings")
        .description("Send a morning greeting to every imported contact")
        .option("--csv <file>", "Import contacts from a CSV file (repeatable)", collect, [])
        .option("--json <file>", "Import contacts from a JSON or JSONL file (repeatable)", collect, [])
        .option("--txt <file>", "Import contacts from a delimited text file (repeatable)", collect, [])
        .option("--csv-sep <sep>", "CSV field separator", ",")
        .option("--txt-sep <sep>", "Text field separator (default: whitespace)")
        .option("--plugins <dir>", "User plugin directory");
}

/**
 * Parse user arguments (without the node and script paths).
 *
 * @example
 * ```typescript
 * parseCliOptions(["--csv", "a.csv", "--csv", "b.csv"]).csv; // ["a.csv", "b.csv"]
 * ```
 */
export function parseCliOptions(args: readonly string[], program: Command = createProgram()): CliOptions {
    program.parse([...args], { from: "user" });
    return program.opts<CliOptions>();
}

/**
 * Import modes selected by the given options. No file flags means no import.
 */
export function modesFromCli(options: CliOptions): ImportModes {
    return importModes({
        csv : options.csv.length > 0,
        json: options.json.length > 0,
        text: options.txt.length > 0,
    });
}

export function sourcesFromCli(options: CliOptions): ContactSources {
    return {
        csv : options.csv,
        json: options.json,
        text: options.txt,
    };
}
