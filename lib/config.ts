// lib/config.ts
import { z } from "zod";
import { ConfigurationError } from "./errors";

const optionalText = z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined));

export const EnvSchema = z.object({
    OPENAI_API_KEY: optionalText,
    OPENAI_MODEL: optionalText.transform((v) => v ?? "gpt-4o-mini"),
    JOB_ANALYZER_MODE: optionalText.pipe(z.enum(["rules", "llm"]).optional()),
    LLM_TIMEOUT_MS: optionalText.pipe(z.coerce.number().int().positive().default(20_000)),
    KEYWORD_LIMIT: optionalText.pipe(z.coerce.number().int().positive().default(20)),
});

export type AppConfig = {
    analyzerMode: "rules" | "llm";
    openaiApiKey?: string;
    openaiModel: string;
    llmTimeoutMs: number;
    keywordLimit: number;
};

/** Read and validate the engine settings from the environment. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new ConfigurationError(`Invalid environment: ${issues}`);
    }

    const { OPENAI_API_KEY, OPENAI_MODEL, JOB_ANALYZER_MODE, LLM_TIMEOUT_MS, KEYWORD_LIMIT } = parsed.data;
    const analyzerMode = JOB_ANALYZER_MODE ?? (OPENAI_API_KEY ? "llm" : "rules");
    if (analyzerMode === "llm" && !OPENAI_API_KEY) {
        throw new ConfigurationError("JOB_ANALYZER_MODE=llm requires OPENAI_API_KEY");
    }

    return {
        analyzerMode,
        openaiApiKey: OPENAI_API_KEY,
        openaiModel: OPENAI_MODEL,
        llmTimeoutMs: LLM_TIMEOUT_MS,
        keywordLimit: KEYWORD_LIMIT,
    };
}
