import * as path from "path";

import {VALIDATION} from "../core/constants.js";
import type {MarkerPattern} from "../core/types.js";
import {ValidationError} from "./errors.js";

export interface ValidationOptions {
    required?: boolean;
    maxLength?: number;
    pattern?: RegExp;
    errorMessage?: string;
    sanitizer?: (value: string) => string;
}

/**
 * Validates and sanitizes a string according to the specified options.
 *
 * @param value - The value to validate
 * @param fieldName - The name of the field being validated (used in error messages)
 * @returns The validated and processed string
 * @throws {ValidationError} When validation fails
 *
 * @example
 * ```typescript
 * validateString("src", "Directory"); // "src"
 * validateString("  src  ", "Directory"); // "src" (trimmed)
 * validateString(undefined, "Directory"); // throws ValidationError
 * ```
 */
export function validateString(
    value: string | undefined,
    fieldName: string,
    options: ValidationOptions = {},
): string {
    const {
        required = true,
        maxLength,
        pattern,
        errorMessage,
        sanitizer,
    } = options;

    if (value === undefined) {
        if (required) {
            throw new ValidationError(errorMessage ?? `${fieldName} is required`);
        }

        return "";
    }

    const processedValue = sanitizer ? sanitizer(value) : value.trim();

    if (required && processedValue === "") {
        throw new ValidationError(errorMessage ?? `${fieldName} ${VALIDATION.EMPTY_STRING_ERROR}`);
    }

    if (maxLength && processedValue.length > maxLength) {
        throw new ValidationError(
            errorMessage ?? `${fieldName} is too long (max ${String(maxLength)} characters)`,
        );
    }

    if (pattern && !pattern.test(processedValue)) {
        throw new ValidationError(errorMessage ?? `${fieldName} has invalid format`);
    }

    return processedValue;
}

/**
 * Whether the character ends a directory marker
 */
export function isSeparator(char: string): boolean {
    return char === "/" || char === path.sep;
}

/**
 * Remove every trailing path separator
 */
export function stripTrailingSeparators(value: string): string {
    let end = value.length;
    while (end > 0 && isSeparator(value.charAt(end - 1))) {
        end--;
    }

    return value.slice(0, end);
}

/**
 * Reject marker patterns that name nothing: the empty string and patterns
 * made only of separators.
 * @returns The pattern unchanged
 * @throws {ValidationError} When the pattern is empty
 */
export function validateMarkerPattern(pattern: MarkerPattern): MarkerPattern {
    validateString(stripTrailingSeparators(pattern), "Marker", {
        sanitizer: (value) => value,
        errorMessage: `Marker ${VALIDATION.EMPTY_STRING_ERROR}: "${pattern}"`,
    });

    return pattern;
}
