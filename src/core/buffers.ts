import * as path from "path";

import {isDirectory} from "../utils/find-root.js";
import {ValidationError} from "../utils/errors.js";
import type {BufferId, BufferSource} from "./types.js";

/**
 * Buffer source whose ids are file paths. Used by the CLI, where the
 * "buffer" is whatever path the caller passes.
 */
export class PathBufferSource implements BufferSource {
    bufferPath(id: BufferId): string {
        return typeof id === "string" ? id : "";
    }
}

/**
 * In-memory buffer table for editor integrations. Ids are assigned in
 * increasing order and never reused.
 */
export class BufferList implements BufferSource {
    private buffers = new Map<number, string>();
    private nextId = 1;

    /**
     * Register a buffer. Unnamed buffers have an empty path.
     * @returns The new buffer id
     */
    add(filePath = ""): number {
        const id = this.nextId++;
        this.buffers.set(id, filePath);
        return id;
    }

    /**
     * Point an existing buffer at another file, as "save as" does
     */
    rename(id: number, filePath: string): void {
        if (!this.buffers.has(id)) {
            throw new ValidationError(`Unknown buffer: ${String(id)}`);
        }

        this.buffers.set(id, filePath);
    }

    remove(id: number): boolean {
        return this.buffers.delete(id);
    }

    ids(): number[] {
        return [...this.buffers.keys()];
    }

    bufferPath(id: BufferId): string {
        if (typeof id !== "number") {
            return "";
        }

        return this.buffers.get(id) ?? "";
    }
}

/**
 * Directory a root search for the buffer starts from: the buffer's path
 * when it is an existing directory, its parent otherwise.
 * @returns The absolute search path, or null for buffers without a path
 */
export async function searchPathFor(buffers: BufferSource, id: BufferId): Promise<string | null> {
    const filePath = buffers.bufferPath(id);
    if (filePath === "") {
        return null;
    }

    const resolved = path.resolve(filePath);
    if (await isDirectory(resolved)) {
        return resolved;
    }

    return path.dirname(resolved);
}
