// lib/analysisEngine.ts
import OpenAI from "openai";
import { loadConfig, type AppConfig } from "./config";
import { ConfigurationError } from "./errors";
import { logInfo } from "./debug";
import { analyzeJobDescription } from "./jobAnalyzer";
import { LlmJobAnalyzer, type ChatClient } from "./llmJobAnalyzer";
import { calculateMatchScore } from "./matchScore";
import type { JobAnalysis, JobAnalysisEngine } from "./types";

/** Deterministic engine; the promise wrappers only exist to share the contract. */
export class RuleBasedJobAnalyzer implements JobAnalysisEngine {
    readonly kind = "rules";

    constructor(private readonly keywordLimit?: number) {}

    async analyze(jobText: string): Promise<JobAnalysis> {
        return analyzeJobDescription(jobText, { keywordLimit: this.keywordLimit });
    }

    async score(candidateSkills: string[], analysis: JobAnalysis): Promise<number> {
        return calculateMatchScore(candidateSkills, analysis);
    }
}

export function createJobAnalysisEngine(config: AppConfig, client?: ChatClient): JobAnalysisEngine {
    const rules = new RuleBasedJobAnalyzer(config.keywordLimit);
    if (config.analyzerMode === "rules") return rules;

    if (!client && !config.openaiApiKey) {
        throw new ConfigurationError("LLM analyzer selected but no OpenAI API key is configured");
    }
    const chat: ChatClient =
        client ??
        new OpenAI({
            apiKey: config.openaiApiKey,
            timeout: config.llmTimeoutMs,
            maxRetries: 0, // failures go straight to the rule-based fallback
        });

    return new LlmJobAnalyzer(chat, rules, { model: config.openaiModel, keywordLimit: config.keywordLimit });
}

let engine: JobAnalysisEngine | undefined;

/** Process-wide engine built from the environment on first use. */
export function getJobAnalysisEngine(): JobAnalysisEngine {
    if (!engine) {
        engine = createJobAnalysisEngine(loadConfig());
        logInfo(`🔧 Job analysis engine: ${engine.kind}`);
    }
    return engine;
}

/** Forget the memoized engine so the next call re-reads the environment. */
export function resetJobAnalysisEngine(): void {
    engine = undefined;
}
