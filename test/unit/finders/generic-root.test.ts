import {afterEach, beforeEach, describe, expect, it} from "vitest";

import {BufferList} from "../../../src/core/buffers.js";
import {ValidationError} from "../../../src/utils/errors.js";
import {findNearestDir} from "../../../src/finders/generic-root.js";
import {createMockLogger} from "../../helpers/mocks.js";
import {TestTree} from "../../helpers/tree.js";

describe("findNearestDir", () => {
    let tree: TestTree;
    let buffers: BufferList;

    beforeEach(() => {
        tree = new TestTree();
        buffers = new BufferList();
    });

    afterEach(async() => {
        await tree.cleanup();
    });

    it("should return the matched directory itself", async() => {
        await tree.setup(["node_modules/", "src/app/main.ts"]);
        const id = buffers.add(tree.path("src/app/main.ts"));

        const match = await findNearestDir(buffers, id, "node_modules");

        expect(match).toBe(tree.path("node_modules"));
    });

    it("should accept a trailing separator on the name", async() => {
        await tree.setup(["node_modules/", "src/main.ts"]);
        const id = buffers.add(tree.path("src/main.ts"));

        const match = await findNearestDir(buffers, id, "node_modules/");

        expect(match).toBe(tree.path("node_modules"));
    });

    it("should return the match even when the buffer is inside it", async() => {
        await tree.setup([".git/hooks/pre-commit"]);
        const id = buffers.add(tree.path(".git/hooks/pre-commit"));

        const match = await findNearestDir(buffers, id, ".git");

        expect(match).toBe(tree.path(".git"));
    });

    it("should ignore files with the directory name", async() => {
        await tree.setup(["rootscout-no-such-dir-5d1e", "src/main.ts"]);
        const id = buffers.add(tree.path("src/main.ts"));

        const match = await findNearestDir(buffers, id, "rootscout-no-such-dir-5d1e");

        expect(match).toBeNull();
    });

    it("should return null for unnamed buffers", async() => {
        await tree.setup();
        const logger = createMockLogger();
        const id = buffers.add();

        const match = await findNearestDir(buffers, id, "node_modules", logger);

        expect(match).toBeNull();
        expect(logger.verbose).toHaveBeenCalledWith(`Buffer ${String(id)} has no path`);
    });

    it("should reject an empty directory name", async() => {
        await tree.setup(["src/main.ts"]);
        const id = buffers.add(tree.path("src/main.ts"));

        await expect(findNearestDir(buffers, id, "/")).rejects.toThrow(ValidationError);
    });
});
