/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export { loadEnv, type AppEnv } from "./env.js";
export {
    loadGreetingTemplates,
    loadGreetingTemplatesWithFallback,
} from "./loadGreetings.js";
