import path from "node:path";
import { fileURLToPath } from "node:url";
import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: { "@": path.dirname(fileURLToPath(import.meta.url)) },
    },
    test: {
        environment: "node",
        include: ["**/*.test.ts"],
        exclude: [...configDefaults.exclude, "**/.next/**"],
        // rule-based engine with logging off
        env: { OPENAI_API_KEY: "", JOB_ANALYZER_MODE: "rules", LOG_LEVEL: "silent" },
    },
});
