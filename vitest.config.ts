import { defineConfig } from "vitest/config";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const root = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
    test: {
        environment: "node",
        include: [
            "test/tests-unit/**/*.test.ts",
            "test/tests-integration/**/*.test.ts",
        ],
    },
    resolve: {
        // Map bare "ledgertools" imports to source files so tests exercise
        // the real implementation without requiring a build step.
        // More-specific subpath patterns must come before the catch-all.
        alias: [
            {
                find: /^ledgertools\/tools$/,
                replacement: resolve(root, "src/tools/index.ts"),
            },
            {
                find: /^ledgertools\/models$/,
                replacement: resolve(root, "src/models/index.ts"),
            },
            {
                find: /^ledgertools$/,
                replacement: resolve(root, "src/index.ts"),
            },
        ],
    },
});
