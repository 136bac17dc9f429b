/**
 * @fileoverview Environment configuration
 *
 * Parses process.env into typed settings. `.env` is loaded by the entry
 * point through dotenv before this runs.
 *
 * @module config/env
 */

import { z } from "zod";
import { LOG_LEVELS } from "@daybreak/engine";

const EnvSchema = z.object({
    LOG_LEVEL       : z.enum(LOG_LEVELS).default("info"),
    SEND_INTERVAL_MS: z.coerce.number().int().nonnegative().default(3000),
    GREETINGS_FILE  : z.string().min(1).optional(),
    TRANSPORT       : z.enum(["console", "smtp"]).default("console"),
    SMTP_HOST       : z.string().default("localhost"),
    SMTP_PORT       : z.coerce.number().int().positive().default(1025),
    SMTP_USER       : z.string().optional(),
    SMTP_PASS       : z.string().optional(),
    FROM_EMAIL      : z.string().email().default("greetings@example.test"),
    GREETING_SUBJECT: z.string().default("Good morning!"),
});

export type AppEnv = z.infer<typeof EnvSchema>;

/**
 * @throws ZodError if a variable is set to an invalid value
 *
 * @example
 * ```typescript
 * const env = loadEnv({ SEND_INTERVAL_MS: "0" });
 * env.SEND_INTERVAL_MS; // 0
 * env.TRANSPORT;        // "console"
 * ```
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
    return EnvSchema.parse(source);
}
