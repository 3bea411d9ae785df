// lib/types.ts
export const SKILL_CATEGORIES = ["programming", "web", "database", "cloud", "data", "tools"] as const;
export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export const EXPERIENCE_LEVELS = ["entry", "mid", "senior", "executive", "unknown"] as const;
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export type ExtractedSkills = {
    technical: string[];
    soft: string[];
    allCategories: Partial<Record<SkillCategory, string[]>>;
};

/** A skill that recurs in the posting or shows up in its requirements block. */
export type PrioritySkill = {
    skill: string;
    frequency: number;
    inRequirements: boolean;
};

export type KeywordCount = [keyword: string, count: number];

export type JobAnalysis = {
    skills: ExtractedSkills;
    requirements: string[];
    responsibilities: string[];
    experienceLevel: ExperienceLevel;
    keywords: KeywordCount[];
    prioritySkills: PrioritySkill[];
};

/** Swappable analyzer contract: rule-based and LLM-backed engines both satisfy it. */
export interface JobAnalysisEngine {
    readonly kind: "rules" | "llm";
    analyze(jobText: string): Promise<JobAnalysis>;
    score(candidateSkills: string[], analysis: JobAnalysis): Promise<number>;
}

export type ProfileExperience = {
    title: string;
    company: string;
    description?: string;
};

export type CandidateProfile = {
    summary?: string;
    programmingSkills?: string;
    technologies?: string;
    languageSkills?: string;
    certifications?: string;
    experiences?: ProfileExperience[];
};
