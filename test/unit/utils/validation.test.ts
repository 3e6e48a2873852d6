import {describe, expect, it} from "vitest";

import {ValidationError} from "../../../src/utils/errors.js";
import {
    isSeparator,
    stripTrailingSeparators,
    validateMarkerPattern,
    validateString,
} from "../../../src/utils/validation.js";

describe("validateString", () => {
    it("should trim values by default", () => {
        expect(validateString("  src  ", "Directory")).toBe("src");
    });

    it("should require a value", () => {
        expect(() => validateString(undefined, "Directory")).toThrow("Directory is required");
    });

    it("should allow a missing optional value", () => {
        expect(validateString(undefined, "Directory", {required: false})).toBe("");
    });

    it("should reject empty values", () => {
        expect(() => validateString("   ", "Directory")).toThrow("Directory cannot be empty");
    });

    it("should apply a custom sanitizer instead of trimming", () => {
        expect(validateString(" a ", "Name", {sanitizer: (value) => value})).toBe(" a ");
    });

    it("should enforce maximum length and pattern", () => {
        expect(() => validateString("abcdef", "Name", {maxLength: 3})).toThrow("Name is too long (max 3 characters)");
        expect(() => validateString("a b", "Name", {pattern: /^\S+$/})).toThrow("Name has invalid format");
    });

    it("should prefer a custom error message", () => {
        expect(() => validateString("", "Name", {errorMessage: "Give a name"})).toThrow("Give a name");
    });
});

describe("separators", () => {
    it("should recognise forward slashes", () => {
        expect(isSeparator("/")).toBe(true);
        expect(isSeparator("a")).toBe(false);
    });

    it("should strip only trailing separators", () => {
        expect(stripTrailingSeparators("a/b//")).toBe("a/b");
        expect(stripTrailingSeparators("a/b")).toBe("a/b");
        expect(stripTrailingSeparators("///")).toBe("");
    });
});

describe("validateMarkerPattern", () => {
    it("should return valid patterns unchanged", () => {
        expect(validateMarkerPattern(".git/")).toBe(".git/");
        expect(validateMarkerPattern(" spaced ")).toBe(" spaced ");
    });

    it("should reject patterns that name nothing", () => {
        expect(() => validateMarkerPattern("")).toThrow(ValidationError);
        expect(() => validateMarkerPattern("/")).toThrow("Marker cannot be empty: \"/\"");
    });
});
