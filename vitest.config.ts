import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Rendering and date parsing depend on the local zone; pin it for every worker.
process.env.TZ = "UTC";

export default defineConfig({
    resolve: {
        alias: {
            "@app": fileURLToPath(new URL("./src", import.meta.url)),
        },
    },
    test: {
        include: ["src/**/*.test.ts"],
        env: {
            TZ: "UTC",
        },
    },
});
