import simpleGit, {type SimpleGit, type SimpleGitOptions} from "simple-git";

import {getErrorMessage} from "../utils/error-handler.js";
import {GitError} from "../utils/errors.js";
import {GIT_ERRORS} from "./constants.js";

/**
 * Error detection for simple-git that rejects on any non-zero exit,
 * whatever git printed. simple-git's own check also needs output on stderr.
 */
export const failOnNonZeroExit: NonNullable<SimpleGitOptions["errors"]> = (error, result) => {
    if (error) {
        return error;
    }

    if (result.exitCode !== 0) {
        const output = Buffer.concat([... result.stdErr, ... result.stdOut]).toString("utf-8").trim();
        return new Error(`git exited with code ${String(result.exitCode)}${output ? `: ${output}` : ""}`);
    }

    return undefined;
};

/**
 * Git operations wrapper for rootscout
 */
export class Git {
    private git: SimpleGit;

    constructor(baseDir?: string) {
        this.git = simpleGit({baseDir, errors: failOnNonZeroExit});
    }

    /**
     * Ask git for the top-level directory of the working tree.
     * Only the first line of output is used.
     * @throws {GitError} When git exits non-zero or prints nothing
     */
    async getRepoRoot(): Promise<string> {
        let output: string;
        try {
            output = await this.git.revparse(["--show-toplevel"]);
        } catch(error) {
            throw new GitError(`Failed to get repository root: ${getErrorMessage(error)}`);
        }

        const [firstLine = ""] = output.split(/\r?\n/);
        const root = firstLine.trim();
        if (root === "") {
            throw new GitError(GIT_ERRORS.NOT_A_REPO);
        }

        return root;
    }
}

/**
 * Create a Git instance for the given directory (defaults to cwd)
 */
export function createGit(baseDir?: string): Git {
    return new Git(baseDir);
}
