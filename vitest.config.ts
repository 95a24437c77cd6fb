import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: {
            "@": fileURLToPath(new URL("./packages/converter/src", import.meta.url)),
        },
    },
    test: {
        include: ["packages/**/*.test.ts"],
        environment: "node",
    },
});
