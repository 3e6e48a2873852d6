import {defineConfig} from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        // Tests change the working directory, which worker threads cannot do
        pool: "forks",
        setupFiles: ["./test/setup.ts"],
        include: [
            "test/unit/**/*.test.ts",
            "test/helpers/**/*.test.ts",
        ],
        exclude: [
            "node_modules",
            "dist",
        ],
    },
});
