import {afterEach, beforeEach, describe, expect, it} from "vitest";

import {BufferList, PathBufferSource, searchPathFor} from "../../../src/core/buffers.js";
import {ValidationError} from "../../../src/utils/errors.js";
import {TestTree} from "../../helpers/tree.js";

describe("PathBufferSource", () => {
    it("should use string ids as paths", () => {
        expect(new PathBufferSource().bufferPath("/work/a.ts")).toBe("/work/a.ts");
    });

    it("should have no path for numeric ids", () => {
        expect(new PathBufferSource().bufferPath(3)).toBe("");
    });
});

describe("BufferList", () => {
    let buffers: BufferList;

    beforeEach(() => {
        buffers = new BufferList();
    });

    it("should assign increasing ids", () => {
        expect(buffers.add("/work/a.ts")).toBe(1);
        expect(buffers.add("/work/b.ts")).toBe(2);
        expect(buffers.ids()).toEqual([1, 2]);
    });

    it("should return the path of a buffer", () => {
        const id = buffers.add("/work/a.ts");

        expect(buffers.bufferPath(id)).toBe("/work/a.ts");
    });

    it("should give unnamed buffers an empty path", () => {
        const id = buffers.add();

        expect(buffers.bufferPath(id)).toBe("");
    });

    it("should rename buffers", () => {
        const id = buffers.add();
        buffers.rename(id, "/work/saved.ts");

        expect(buffers.bufferPath(id)).toBe("/work/saved.ts");
    });

    it("should reject renaming unknown buffers", () => {
        expect(() => {
            buffers.rename(9, "/work/a.ts");
        }).toThrow(ValidationError);
    });

    it("should not reuse ids of removed buffers", () => {
        const first = buffers.add("/work/a.ts");

        expect(buffers.remove(first)).toBe(true);
        expect(buffers.remove(first)).toBe(false);
        expect(buffers.bufferPath(first)).toBe("");
        expect(buffers.add("/work/b.ts")).toBe(2);
    });

    it("should have no path for string ids", () => {
        buffers.add("/work/a.ts");

        expect(buffers.bufferPath("1")).toBe("");
    });
});

describe("searchPathFor", () => {
    let tree: TestTree;
    let buffers: BufferList;

    beforeEach(async() => {
        tree = new TestTree();
        await tree.setup(["src/index.ts"]);
        buffers = new BufferList();
    });

    afterEach(async() => {
        await tree.cleanup();
    });

    it("should use a directory buffer as is", async() => {
        const id = buffers.add(tree.path("src"));

        expect(await searchPathFor(buffers, id)).toBe(tree.path("src"));
    });

    it("should use the parent of a file buffer", async() => {
        const id = buffers.add(tree.path("src/index.ts"));

        expect(await searchPathFor(buffers, id)).toBe(tree.path("src"));
    });

    it("should use the parent of a file not yet saved", async() => {
        const id = buffers.add(tree.path("src/new/draft.ts"));

        expect(await searchPathFor(buffers, id)).toBe(tree.path("src/new"));
    });

    it("should return null for unnamed buffers", async() => {
        const id = buffers.add();

        expect(await searchPathFor(buffers, id)).toBeNull();
    });
});
