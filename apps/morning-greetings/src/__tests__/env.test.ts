/**
 * @fileoverview Unit tests for environment parsing
 *
 * @module config/__tests__/env
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadEnv } from "../config/env.js";

describe("loadEnv", () => {
    // Scenario: Nothing set
    it("should apply defaults to an empty environment", () => {
        expect(loadEnv({})).toEqual({
            LOG_LEVEL       : "info",
            SEND_INTERVAL_MS: 3000,
            TRANSPORT       : "console",
            SMTP_HOST       : "localhost",
            SMTP_PORT       : 1025,
            FROM_EMAIL      : "greetings@example.test",
            GREETING_SUBJECT: "Good morning!",
        });
    });

    // Scenario: String values coerced
    it("should coerce numeric settings", () => {
        const env = loadEnv({
            SEND_INTERVAL_MS: "0",
            SMTP_PORT       : "587",
            TRANSPORT       : "smtp",
            SMTP_USER       : "test-user",
            SMTP_PASS       : "test-secret",
            LOG_LEVEL       : "debug",
        });

        expect(env.SEND_INTERVAL_MS).toBe(0);
        expect(env.SMTP_PORT).toBe(587);
        expect(env.TRANSPORT).toBe("smtp");
        expect(env.SMTP_USER).toBe("test-user");
        expect(env.LOG_LEVEL).toBe("debug");
    });

    // Scenario: Invalid values
    it.each([
        { LOG_LEVEL: "verbose" },
        { TRANSPORT: "carrier-pigeon" },
        { SEND_INTERVAL_MS: "-5" },
        { FROM_EMAIL: "not-an-email" },
    ])("should reject %j", (source) => {
        expect(() => loadEnv(source)).toThrow(ZodError);
    });
});
