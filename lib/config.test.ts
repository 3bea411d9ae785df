import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ConfigurationError } from "./errors";

describe("loadConfig", () => {
    it("defaults to the rule-based engine", () => {
        expect(loadConfig({})).toEqual({
            analyzerMode: "rules",
            openaiApiKey: undefined,
            openaiModel: "gpt-4o-mini",
            llmTimeoutMs: 20_000,
            keywordLimit: 20,
        });
    });

    it("switches to the LLM engine when a key is present", () => {
        expect(loadConfig({ OPENAI_API_KEY: "test-key" }).analyzerMode).toBe("llm");
        expect(loadConfig({ OPENAI_API_KEY: "test-key", JOB_ANALYZER_MODE: "rules" }).analyzerMode).toBe("rules");
    });

    it("treats a blank key as missing", () => {
        expect(loadConfig({ OPENAI_API_KEY: "   " })).toMatchObject({ analyzerMode: "rules", openaiApiKey: undefined });
    });

    it("reads numeric settings", () => {
        expect(
            loadConfig({ KEYWORD_LIMIT: "5", LLM_TIMEOUT_MS: "1500", OPENAI_MODEL: " gpt-4.1-mini " })
        ).toMatchObject({ keywordLimit: 5, llmTimeoutMs: 1500, openaiModel: "gpt-4.1-mini" });
    });

    it.each([
        [{ JOB_ANALYZER_MODE: "llm" }],
        [{ JOB_ANALYZER_MODE: "fancy" }],
        [{ LLM_TIMEOUT_MS: "soon" }],
        [{ KEYWORD_LIMIT: "-4" }],
    ])("rejects %o", (env) => {
        expect(() => loadConfig(env)).toThrow(ConfigurationError);
    });
});
