/**
 * @fileoverview Contact field validation
 *
 * Pure checks for the three contact fields. Each throws InvalidFieldError
 * on the first problem found and returns nothing on success.
 *
 * Values may arrive from untyped JSON, so every check accepts `unknown`
 * and narrows to string.
 *
 * @module domain/validation/contactValidator
 */

import { InvalidFieldError } from "../errors.js";

/**
 * `local@domain.tld`: ASCII local part of letters, digits and `._%+-`,
 * dot-separated domain labels, final label of two or more letters.
 */
export const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@(?:[A-Za-z0-9-]+\.)+[A-Za-z]{2,}$/;

/**
 * Four ASCII digits, conceptually HHMM. Not checked against a 24-hour clock.
 */
export const TIME_PATTERN = /^[0-9]{4}$/;

export function validateName(name: unknown): asserts name is string {
    if (typeof name !== "string" || name.length === 0) {
        throw new InvalidFieldError("name", "Contact name must be a non-empty string");
    }
}

export function validateEmail(email: unknown): asserts email is string {
    if (typeof email !== "string" || email.length === 0) {
        throw new InvalidFieldError("email", "Email address must be a non-empty string");
    }

    if (!EMAIL_PATTERN.test(email)) {
        throw new InvalidFieldError("email", `Invalid email address: "${email}"`);
    }
}

export function validateTime(time: unknown): asserts time is string {
    if (typeof time !== "string" || time.length === 0) {
        throw new InvalidFieldError("preferredTime", "Preferred time must be a non-empty string");
    }

    if (!TIME_PATTERN.test(time)) {
        throw new InvalidFieldError("preferredTime", `Preferred time must be 4 digits (HHMM), got "${time}"`);
    }
}

/**
 * Boolean form of {@link validateEmail}.
 */
export function isValidEmail(email: unknown): email is string {
    return typeof email === "string" && EMAIL_PATTERN.test(email);
}
