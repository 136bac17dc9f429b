/**
 * @fileoverview Morning greetings application wiring
 *
 * Builds the contact store from the CLI sources, assembles the greetings
 * domain (provider, composers, deliveries) and runs it once on the
 * DispatchEngine.
 *
 * Composer order:
 * 1. User plugins (YAML template composers, code plugins)
 * 2. Built-in greeting composer, which always produces a message
 *
 * @module app
 */

import {
    DispatchEngine,
    PluginLoader,
    type ComposerPlugin,
    type DeliveryPlugin,
    type DispatchSummary,
    type DomainRegistration,
    type Logger,
} from "@daybreak/engine";
import type { CliOptions } from "./cli/program.js";
import { modesFromCli, sourcesFromCli } from "./cli/program.js";
import type { AppEnv } from "./config/env.js";
import { loadGreetingTemplatesWithFallback } from "./config/loadGreetings.js";
import {
    buildContactStore,
    ConsoleTransport,
    ContactStoreProvider,
    GreetingComposerPlugin,
    MessageSender,
    SendGreetingDeliveryPlugin,
    SmtpTransport,
    type ContactStore,
    type MessageTransport,
    type SourceReader,
} from "./domain/index.js";

export const GREETINGS_DOMAIN_ID = "greetings";

export interface GreetingsAppOptions {
    readonly cli: CliOptions;
    readonly env: AppEnv;
    readonly logger: Logger;

    /** Greeting templates file used when GREETINGS_FILE is unset */
    readonly defaultGreetingsFile: string;

    /** Plugin directory used when --plugins is not given */
    readonly defaultPluginsDir: string;

    /** Overrides for tests */
    readonly reader?: SourceReader;
    readonly transport?: MessageTransport;
    readonly random?: () => number;
}

/**
 * Pick the transport named by TRANSPORT.
 */
export function createTransport(env: AppEnv): MessageTransport {
    if (env.TRANSPORT === "smtp") {
        return new SmtpTransport({
            host   : env.SMTP_HOST,
            port   : env.SMTP_PORT,
            user   : env.SMTP_USER,
            pass   : env.SMTP_PASS,
            from   : env.FROM_EMAIL,
            subject: env.GREETING_SUBJECT,
        });
    }

    return new ConsoleTransport();
}

/**
 * Create the greetings domain registration for the DispatchEngine.
 *
 * @param store - Contacts to greet
 * @param options - Application options
 * @returns Domain registration with provider, composers, and deliveries
 */
export async function createGreetingsDomain(
    store: ContactStore,
    options: GreetingsAppOptions
): Promise<DomainRegistration> {
    const { env, cli, logger } = options;

    const templates = loadGreetingTemplatesWithFallback(
        env.GREETINGS_FILE ?? options.defaultGreetingsFile,
        logger
    );
    logger.info("Loaded greeting templates", { count: templates.length });

    const composers: ComposerPlugin[] = [];
    const deliveries: DeliveryPlugin[] = [];

    const pluginsDir = cli.plugins ?? options.defaultPluginsDir;
    const pluginLoader = new PluginLoader({ logger, random: options.random });
    const userPlugins = await pluginLoader.loadFromDirectory(pluginsDir);
    composers.push(...userPlugins.composers);
    deliveries.push(...userPlugins.deliveries);

    composers.push(new GreetingComposerPlugin({ templates, random: options.random }));

    const transport = options.transport ?? createTransport(env);
    deliveries.push(new SendGreetingDeliveryPlugin(new MessageSender({ transport, logger })));

    return {
        id        : GREETINGS_DOMAIN_ID,
        name      : "Morning Greetings",
        provider  : new ContactStoreProvider(store),
        composers,
        deliveries,
        config    : { transport: transport.id },
    };
}

/**
 * Import contacts, then greet each one in preferred-time order.
 *
 * @throws MissingSourceError or ImportParseError if the contacts cannot be imported
 */
export async function runGreetings(
    options: GreetingsAppOptions,
    engine: DispatchEngine = new DispatchEngine({
        sendInterval: options.env.SEND_INTERVAL_MS,
        logger      : options.logger,
    })
): Promise<DispatchSummary> {
    const { cli, logger } = options;

    const store = buildContactStore(modesFromCli(cli), sourcesFromCli(cli), {
        csvSeparator : cli.csvSep,
        textSeparator: cli.txtSep,
        reader       : options.reader,
        logger,
    });

    if (store.isEmpty()) {
        logger.info("No contacts to greet");
    }
    else {
        logger.debug("Contacts imported", { contacts: store.format() });
    }

    engine.registerDomain(await createGreetingsDomain(store, options));
    return engine.runDomain(GREETINGS_DOMAIN_ID);
}
