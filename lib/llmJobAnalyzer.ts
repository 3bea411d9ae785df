// lib/llmJobAnalyzer.ts
// Chat-completion backed engine. Every failure lands on the rule-based engine.
import { z } from "zod";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { logWarning, debug } from "./debug";
import { ExternalServiceError, InvalidInputError, errorMessage } from "./errors";
import { assertJobText, countOccurrences, derivePrioritySkills, emptyJobAnalysis, DEFAULT_KEYWORD_LIMIT } from "./jobAnalyzer";
import { clampScore, roundHalfEven } from "./matchScore";
import { categoryOf } from "./skillCatalog";
import { EXPERIENCE_LEVELS, type JobAnalysis, type JobAnalysisEngine, type SkillCategory } from "./types";

/** The slice of the OpenAI client this engine touches; tests hand in a fake. */
export interface ChatClient {
    chat: {
        completions: {
            create(body: ChatCompletionCreateParamsNonStreaming): Promise<{
                choices: Array<{ message: { content: string | null } }>;
            }>;
        };
    };
}

export type LlmEngineOptions = {
    model: string;
    keywordLimit?: number;
};

/** -------------------- Reply schemas -------------------- */
const stringList = z.array(z.string()).catch([]);

export const LlmAnalysisSchema = z.object({
    technical_skills: stringList,
    soft_skills: stringList,
    experience_level: z.string().catch("unknown"),
    requirements: stringList,
    responsibilities: stringList,
    keywords: stringList,
});
type LlmAnalysis = z.infer<typeof LlmAnalysisSchema>;

export const LlmMatchSchema = z.object({
    match_score: z.coerce.number().finite(),
});

/** -------------------- Prompts -------------------- */
const ANALYSIS_SYSTEM_PROMPT =
    "You are an expert HR analyst and resume writer. Analyze job descriptions and extract structured information to help tailor resumes effectively.";

const MATCH_SYSTEM_PROMPT =
    "You are an expert resume matcher. Calculate how well a candidate's skills match a job's requirements, considering skill relevance, transferability, and industry context.";

export const buildAnalysisPrompt = (jobText: string) =>
    `
Analyze this job description and extract the following information in JSON format:

{
  "technical_skills": ["skill1", "skill2"],
  "soft_skills": ["skill1", "skill2"],
  "experience_level": "entry|mid|senior|executive",
  "required_years": "number or range",
  "requirements": ["requirement1", "requirement2"],
  "responsibilities": ["responsibility1", "responsibility2"],
  "keywords": ["keyword1", "keyword2"],
  "industry": "industry_name"
}

Focus on:
1. Technical skills (programming languages, tools, frameworks, technologies)
2. Soft skills (leadership, communication, problem-solving, etc.)
3. Experience level based on job title and requirements
4. Must-have vs nice-to-have requirements
5. Key responsibilities that show what the role involves
6. Industry-specific terminology

Job Description:
${jobText}

Return only valid JSON, no additional text.
`.trim();

export const buildMatchPrompt = (candidateSkills: string[], analysis: JobAnalysis) =>
    `
Calculate a match score (0-100) between these profile skills and job requirements:

Profile Skills: ${candidateSkills.join(", ")}

Job Analysis: ${JSON.stringify(analysis, null, 2)}

Consider direct skill matches, transferable skills, soft skills alignment and experience level compatibility.

Provide your analysis in this JSON format:
{ "match_score": 85.5, "matching_skills": ["skill1"], "missing_critical_skills": ["skill1"] }

Return only valid JSON.
`.trim();

/** -------------------- Reply parsing -------------------- */
/** Strip a ```json fence if the model added one, then JSON.parse. */
export function parseJsonReply(content: string): unknown {
    const body = content
        .trim()
        .replace(/^```(?:json)?\s*/i, "")
        .replace(/\s*```$/, "")
        .trim();
    try {
        return JSON.parse(body);
    } catch (error) {
        throw new ExternalServiceError("Model reply is not valid JSON", { cause: error });
    }
}

function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw new ExternalServiceError(`Model ${what} did not match the expected shape`, { cause: parsed.error });
    }
    return parsed.data;
}

const uniqLower = (arr: string[]) => {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const s of arr) {
        const k = s.toLowerCase().trim();
        if (k && !seen.has(k)) {
            seen.add(k);
            out.push(k);
        }
    }
    return out;
};

const isExperienceLevel = (value: string): value is JobAnalysis["experienceLevel"] =>
    EXPERIENCE_LEVELS.some((level) => level === value);

/** Shape a validated model reply into the shared JobAnalysis contract. */
export function toJobAnalysis(reply: LlmAnalysis, jobText: string, keywordLimit = DEFAULT_KEYWORD_LIMIT): JobAnalysis {
    const technical = uniqLower(reply.technical_skills);
    const soft = uniqLower(reply.soft_skills);
    const requirements = reply.requirements.map((r) => r.trim()).filter(Boolean);
    const level = reply.experience_level.toLowerCase().trim();
    const raw = jobText.toLowerCase();

    const allCategories: Partial<Record<SkillCategory, string[]>> = {};
    for (const skill of technical) {
        const category = categoryOf(skill);
        if (!category) continue;
        const bucket = allCategories[category] ?? [];
        bucket.push(skill);
        allCategories[category] = bucket;
    }

    return {
        skills: { technical, soft, allCategories },
        requirements,
        responsibilities: reply.responsibilities.map((r) => r.trim()).filter(Boolean),
        experienceLevel: isExperienceLevel(level) ? level : "unknown",
        keywords: uniqLower(reply.keywords)
            .slice(0, keywordLimit)
            .map((kw): [string, number] => [kw, countOccurrences(raw, kw)]),
        prioritySkills: derivePrioritySkills([...technical, ...soft], jobText, requirements),
    };
}

/** -------------------- Engine -------------------- */
export class LlmJobAnalyzer implements JobAnalysisEngine {
    readonly kind = "llm";

    constructor(
        private readonly client: ChatClient,
        private readonly fallback: JobAnalysisEngine,
        private readonly options: LlmEngineOptions
    ) {}

    async analyze(jobText: string): Promise<JobAnalysis> {
        assertJobText(jobText);

        try {
            const content = await this.complete(ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt(jobText));
            const reply = validate(LlmAnalysisSchema, parseJsonReply(content), "analysis");
            return toJobAnalysis(reply, jobText, this.options.keywordLimit);
        } catch (error) {
            logWarning("⚠️ LLM job analysis failed, using rule-based analyzer:", errorMessage(error));
            return this.fallbackAnalysis(jobText);
        }
    }

    async score(candidateSkills: string[], analysis: JobAnalysis): Promise<number> {
        if (!candidateSkills.length) return 0;
        if (!analysis.skills.technical.length && !analysis.skills.soft.length) return 0;

        try {
            const content = await this.complete(MATCH_SYSTEM_PROMPT, buildMatchPrompt(candidateSkills, analysis));
            const { match_score } = validate(LlmMatchSchema, parseJsonReply(content), "match score");
            return roundHalfEven(clampScore(match_score), 1);
        } catch (error) {
            logWarning("⚠️ LLM match score failed, using rule-based scorer:", errorMessage(error));
            return this.fallback.score(candidateSkills, analysis);
        }
    }

    private async fallbackAnalysis(jobText: string): Promise<JobAnalysis> {
        try {
            return await this.fallback.analyze(jobText);
        } catch (error) {
            if (error instanceof InvalidInputError) throw error;
            logWarning("⚠️ Fallback analyzer failed, returning empty analysis:", errorMessage(error));
            return emptyJobAnalysis();
        }
    }

    private async complete(system: string, prompt: string): Promise<string> {
        let content: string | null | undefined;
        try {
            const completion = await this.client.chat.completions.create({
                model: this.options.model,
                temperature: 0.1,
                max_tokens: 2000,
                response_format: { type: "json_object" },
                messages: [
                    { role: "system", content: system },
                    { role: "user", content: prompt },
                ],
            });
            content = completion.choices[0]?.message?.content;
        } catch (error) {
            throw new ExternalServiceError("Chat completion request failed", { cause: error });
        }

        if (!content) throw new ExternalServiceError("Chat completion returned no content");
        debug("🔍 LLM reply:", { length: content.length, preview: content.substring(0, 200) });
        return content;
    }
}
