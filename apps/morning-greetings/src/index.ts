/**
 * @fileoverview Morning Greetings - Main Entry Point
 *
 * Imports contacts from the files named on the command line and sends
 * each one a morning greeting, earliest preferred time first. Uses the
 * DispatchEngine to wire together the domain components (provider,
 * composers, deliveries).
 *
 * @module morning-greetings
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import { DispatchEngine, describeError, type EventPayload } from "@daybreak/engine";

import { runGreetings, createTransport } from "./app.js";
import { parseCliOptions } from "./cli/index.js";
import { loadEnv } from "./config/index.js";
import { SmtpTransport, isGreetingsError } from "./domain/index.js";
import { createConsoleLogger } from "./logging/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function field(event: EventPayload, key: string): string {
    const value = event.data?.[key];
    return value === undefined ? "" : String(value);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const env = loadEnv();
    const logger = createConsoleLogger({ level: env.LOG_LEVEL });
    const cli = parseCliOptions(process.argv.slice(2));

    console.log("=".repeat(60));
    console.log("Morning Greetings");
    console.log("=".repeat(60));

    const engine = new DispatchEngine({
        sendInterval: env.SEND_INTERVAL_MS,
        logger,
    });

    // Subscribe to engine events for observability
    engine.eventBus.subscribe("recipient:composed", (event) => {
        console.log(`[COMPOSED] ${field(event, "recipientId")} via ${field(event, "templateId") || field(event, "composerId")}`);
    });

    engine.eventBus.subscribe("recipient:waiting", (event) => {
        console.log(`[WAITING] ${field(event, "waitMs")}ms before ${field(event, "recipientId")}`);
    });

    engine.eventBus.subscribe("recipient:deliveryFailed", (event) => {
        console.log(`[FAILED] ${field(event, "recipientId")}: ${field(event, "error")}`);
    });

    engine.eventBus.subscribe("dispatch:error", (event) => {
        console.error("[ENGINE ERROR]", event.data);
    });

    const transport = createTransport(env);

    try {
        const summary = await runGreetings({
            cli,
            env,
            logger,
            transport,
            defaultGreetingsFile: join(__dirname, "..", "config", "greetings.yml"),
            defaultPluginsDir   : join(__dirname, "..", "user", "plugins"),
        }, engine);

        console.log(`\n[DONE] ${summary.delivered} of ${summary.recipients} greetings sent, ${summary.failed} failed`);
    }
    catch (error) {
        if (isGreetingsError(error)) {
            console.error(`[FATAL] ${error.message}`);
        }
        else {
            console.error("[FATAL] Failed to send greetings:", describeError(error));
        }
        process.exitCode = 1;
    }
    finally {
        if (transport instanceof SmtpTransport) {
            transport.close();
        }
    }
}

main().catch((error: unknown) => {
    console.error("[FATAL]", error);
    process.exitCode = 1;
});
