/**
 * @fileoverview Plugin Loader
 *
 * Loads composer and delivery plugins from:
 * - YAML files (template composers)
 * - Code files (JS exporting ComposerPlugin/DeliveryPlugin)
 *
 * @module @daybreak/engine/plugins/PluginLoader
 */

import { readFileSync, readdirSync, existsSync, statSync } from "fs";
import { join, extname } from "path";
import { pathToFileURL } from "url";
import { parse as parseYaml } from "yaml";
import type { ComposerPlugin, ComposedMessage } from "../contracts/ComposerPlugin.js";
import type { DeliveryPlugin } from "../contracts/DeliveryPlugin.js";
import type { Recipient } from "../contracts/Recipient.js";
import { isComposerPlugin } from "../contracts/ComposerPlugin.js";
import { isDeliveryPlugin } from "../contracts/DeliveryPlugin.js";
import { describeError, type Logger } from "../contracts/Logger.js";

/**
 * YAML plugin definition for a template composer.
 *
 * @example
 * ```yaml
 * name: family
 * description: Warmer greetings for family
 * recipients: [Mom, Dad]
 * templates:
 *   - "Morning {name}, love you!"
 *   - "Rise and shine, {name}!"
 * ```
 */
export interface YamlComposerDefinition {
    /** Unique name/id for this composer */
    name: string;

    /** Human-readable description */
    description?: string;

    /** Templates with a {name} placeholder, one picked at random */
    templates: string[];

    /** Only compose for these recipient names (case-insensitive); all when omitted */
    recipients?: string[];
}

/**
 * Loaded plugins result.
 */
export interface LoadedPlugins {
    composers: ComposerPlugin[];
    deliveries: DeliveryPlugin[];
}

/**
 * Plugin loader configuration.
 */
export interface PluginLoaderConfig {
    /** Logger for plugin loading */
    logger?: Logger;

    /** Random source for YAML composers, in [0, 1) (default: Math.random) */
    random?: () => number;
}

/**
 * Default console logger.
 */
const defaultLogger: Logger = {
    debug: (msg, data) => console.debug(`[PluginLoader] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[PluginLoader] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[PluginLoader] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[PluginLoader] ${msg}`, data ?? ""),
};

const NAME_PLACEHOLDER = "{name}";

/**
 * Create a ComposerPlugin from a YAML definition.
 *
 * @param def - YAML composer definition
 * @param random - Random source in [0, 1)
 */
export function createComposerFromYaml(
    def: YamlComposerDefinition,
    random: () => number = Math.random
): ComposerPlugin {
    const allowed = def.recipients
        ? new Set(def.recipients.map((name) => name.toLowerCase()))
        : null;

    return {
        id         : `yaml:${def.name}`,
        name       : def.name,
        description: def.description,

        compose(recipient: Recipient<object>): ComposedMessage | null {
            if (allowed && !allowed.has(recipient.name.toLowerCase())) {
                return null;
            }

            if (def.templates.length === 0) {
                return null;
            }

            const index = Math.min(Math.floor(random() * def.templates.length), def.templates.length - 1);

            return {
                body      : def.templates[index].split(NAME_PLACEHOLDER).join(recipient.name),
                templateId: `yaml:${def.name}#${index}`,
            };
        },
    };
}

/**
 * Type guard for YAML composer definition.
 */
export function isYamlComposerDefinition(obj: unknown): obj is YamlComposerDefinition {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "name" in obj &&
        typeof obj.name === "string" &&
        "templates" in obj &&
        isStringArray(obj.templates) &&
        obj.templates.every((template) => template.includes(NAME_PLACEHOLDER)) &&
        (!("recipients" in obj) || obj.recipients === undefined || isStringArray(obj.recipients))
    );
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Plugin Loader
 *
 * Loads plugins from directories containing YAML and/or code files.
 *
 * @example
 * ```typescript
 * const loader = new PluginLoader({ logger });
 *
 * const plugins = await loader.loadFromDirectory("./user/plugins");
 *
 * engine.registerDomain({
 *     ...domain,
 *     composers: [...plugins.composers, defaultComposer],
 *     deliveries: [...plugins.deliveries, defaultDelivery],
 * });
 * ```
 */
export class PluginLoader {
    private readonly logger: Logger;
    private readonly random: () => number;

    constructor(config: PluginLoaderConfig = {}) {
        this.logger = config.logger ?? defaultLogger;
        this.random = config.random ?? Math.random;
    }

    /**
     * Load all plugins from a directory.
     *
     * Scans for:
     * - .yml/.yaml files → template composers
     * - .js/.mjs files → code plugins
     *
     * Files are read in name order so plugin order is stable.
     * A file that fails to load is logged and skipped.
     */
    async loadFromDirectory(dirPath: string): Promise<LoadedPlugins> {
        const result: LoadedPlugins = {
            composers : [],
            deliveries: [],
        };

        if (!existsSync(dirPath)) {
            this.logger.warn("Plugin directory does not exist", { dirPath });
            return result;
        }

        if (!statSync(dirPath).isDirectory()) {
            this.logger.warn("Plugin path is not a directory", { dirPath });
            return result;
        }

        const files = [...readdirSync(dirPath)].sort();

        for (const file of files) {
            const filePath = join(dirPath, file);
            const ext = extname(file).toLowerCase();

            try {
                if (ext === ".yml" || ext === ".yaml") {
                    const loaded = this.loadYamlFile(filePath);
                    result.composers.push(...loaded.composers);
                    result.deliveries.push(...loaded.deliveries);
                }
                else if (ext === ".js" || ext === ".mjs") {
                    const loaded = await this.loadCodeFile(filePath);
                    result.composers.push(...loaded.composers);
                    result.deliveries.push(...loaded.deliveries);
                }
            }
            catch (error) {
                this.logger.error("Failed to load plugin file", {
                    filePath,
                    error: describeError(error),
                });
            }
        }

        this.logger.info("Plugins loaded from directory", {
            dirPath,
            composers : result.composers.length,
            deliveries: result.deliveries.length,
        });

        return result;
    }

    /**
     * Load template composers from a YAML file holding one definition or a list.
     */
    loadYamlFile(filePath: string): LoadedPlugins {
        const result: LoadedPlugins = {
            composers : [],
            deliveries: [],
        };

        const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));

        if (!parsed) {
            return result;
        }

        const definitions: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

        for (const def of definitions) {
            if (isYamlComposerDefinition(def)) {
                const composer = createComposerFromYaml(def, this.random);
                result.composers.push(composer);
                this.logger.debug("Loaded YAML composer", { id: composer.id });
            }
            else {
                this.logger.warn("Skipping invalid YAML composer definition", { filePath });
            }
        }

        return result;
    }

    /**
     * Load plugins from a code file.
     *
     * Named exports and the default export (a plugin or an array of
     * plugins) are checked against the plugin type guards.
     */
    async loadCodeFile(filePath: string): Promise<LoadedPlugins> {
        const result: LoadedPlugins = {
            composers : [],
            deliveries: [],
        };

        const module: Record<string, unknown> = await import(pathToFileURL(filePath).href);

        const candidates: unknown[] = [];
        for (const [key, exported] of Object.entries(module)) {
            if (key === "default" && Array.isArray(exported)) {
                candidates.push(...exported);
            }
            else {
                candidates.push(exported);
            }
        }

        for (const candidate of candidates) {
            if (isComposerPlugin(candidate)) {
                result.composers.push(candidate);
                this.logger.debug("Loaded code composer", { id: candidate.id, filePath });
            }
            else if (isDeliveryPlugin(candidate)) {
                result.deliveries.push(candidate);
                this.logger.debug("Loaded code delivery", { id: candidate.id, filePath });
            }
        }

        return result;
    }
}
