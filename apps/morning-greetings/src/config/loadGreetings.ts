/**
 * @fileoverview Greeting template loader
 *
 * Loads greeting templates from a YAML file of the form
 * `{ templates: [string, ...] }`.
 *
 * @module config/loadGreetings
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { describeError, silentLogger, type Logger } from "@daybreak/engine";
import {
    DEFAULT_GREETING_TEMPLATES,
    NAME_PLACEHOLDER,
} from "../domain/greetings/messageGenerator.js";

/**
 * Load greeting templates from a YAML file.
 *
 * @param filePath - Path to the greetings.yml file
 * @returns Templates in file order
 * @throws Error if the file doesn't exist, is malformed, or a template lacks `{name}`
 *
 * @example
 * ```typescript
 * const templates = loadGreetingTemplates("./config/greetings.yml");
 * // ["Good Morning, {name}! Have a great day.....!", ...]
 * ```
 */
export function loadGreetingTemplates(filePath: string): string[] {
    if (!existsSync(filePath)) {
        throw new Error(`Greetings file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (
        typeof parsed !== "object" ||
        parsed === null ||
        !("templates" in parsed) ||
        !Array.isArray(parsed.templates)
    ) {
        throw new Error("Invalid greetings file format: expected { templates: [...] }");
    }

    const templates: unknown[] = parsed.templates;
    if (templates.length === 0) {
        throw new Error("Invalid greetings file format: templates list is empty");
    }

    return templates.map((template, index) => {
        if (typeof template !== "string" || template.length === 0) {
            throw new Error(`Invalid template at index ${index}: expected a non-empty string`);
        }

        if (!template.includes(NAME_PLACEHOLDER)) {
            throw new Error(`Invalid template at index ${index}: missing ${NAME_PLACEHOLDER} placeholder`);
        }

        return template;
    });
}

/**
 * Load greeting templates, falling back to the built-in greetings.
 */
export function loadGreetingTemplatesWithFallback(
    filePath: string,
    logger: Logger = silentLogger
): readonly string[] {
    try {
        return loadGreetingTemplates(filePath);
    }
    catch (error) {
        logger.warn("Failed to load greeting templates, using defaults", {
            filePath,
            error: describeError(error),
        });
        return DEFAULT_GREETING_TEMPLATES;
    }
}
