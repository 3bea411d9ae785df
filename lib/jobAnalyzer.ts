// lib/jobAnalyzer.ts
// Rule-based job description analysis: catalogs + regex, no model calls.
import { InvalidInputError } from "./errors";
import { EXPERIENCE_INDICATORS, SOFT_SKILLS, STOP_WORDS, TECHNICAL_SKILLS } from "./skillCatalog";
import {
    SKILL_CATEGORIES,
    type ExperienceLevel,
    type ExtractedSkills,
    type JobAnalysis,
    type KeywordCount,
    type PrioritySkill,
} from "./types";

export const DEFAULT_KEYWORD_LIMIT = 20;
const MIN_FRAGMENT_LENGTH = 10;

/** -------------------- Small helpers -------------------- */
const WORD_RE = /[\p{L}\p{N}_]+/gu;

/** Lowercase, flatten whitespace, drop punctuation except - + # . so c++, c#, node.js survive. */
export const preprocess = (text: string) =>
    text
        .toLowerCase()
        .replace(/\s+/g, " ")
        .replace(/[^\p{L}\p{N}_\s\-+#.]/gu, " ")
        .trim();

/** Non-overlapping occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
    if (!needle) return 0;
    let count = 0;
    let from = haystack.indexOf(needle);
    while (from !== -1) {
        count++;
        from = haystack.indexOf(needle, from + needle.length);
    }
    return count;
}

export function assertJobText(jobText: string): void {
    if (typeof jobText !== "string" || !jobText.trim()) {
        throw new InvalidInputError();
    }
}

/** -------------------- Skills -------------------- */
export function extractSkills(jobText: string): ExtractedSkills {
    const text = preprocess(jobText);
    const found: ExtractedSkills = { technical: [], soft: [], allCategories: {} };

    for (const category of SKILL_CATEGORIES) {
        const hits = TECHNICAL_SKILLS[category].filter((skill) => text.includes(skill));
        if (hits.length) {
            found.allCategories[category] = hits;
            found.technical.push(...hits);
        }
    }
    found.soft = SOFT_SKILLS.filter((skill) => text.includes(skill));

    return found;
}

/** -------------------- Sections -------------------- */
// First match of each pattern contributes; order matters and overlaps are kept.
const REQUIREMENT_PATTERNS: RegExp[] = [
    /requirements?\s*[:-]?\s*(.+?)(?=\n\s*\n|\nresponsibilities|\nqualifications|$)/is,
    /qualifications?\s*[:-]?\s*(.+?)(?=\n\s*\n|\nresponsibilities|\nrequirements|$)/is,
    /must\s+have\s*[:-]?\s*(.+?)(?=\n\s*\n|\nnice\s+to\s+have|\npreferred|$)/is,
    // "Required:" only with its colon, after the real headers
    /required\s*:\s*(.+?)(?=\n\s*\n|\nresponsibilities|\nqualifications|$)/is,
];

const RESPONSIBILITY_PATTERNS: RegExp[] = [
    /responsibilities\s*[:-]?\s*(.+?)(?=\n\s*\n|\nrequirements|\nqualifications|$)/is,
    /duties\s*[:-]?\s*(.+?)(?=\n\s*\n|\nrequirements|\nqualifications|$)/is,
    /you\s+will\s*[:-]?\s*(.+?)(?=\n\s*\n|\nrequirements|\nqualifications|$)/is,
];

function extractSectionItems(jobText: string, patterns: RegExp[]): string[] {
    const items: string[] = [];
    for (const re of patterns) {
        const m = jobText.match(re);
        if (!m?.[1]) continue;
        for (const part of m[1].split(/[•\-*\n]/)) {
            const item = part.trim();
            if (item.length > MIN_FRAGMENT_LENGTH) items.push(item);
        }
    }
    return items;
}

export const extractRequirements = (jobText: string) => extractSectionItems(jobText, REQUIREMENT_PATTERNS);

export const extractResponsibilities = (jobText: string) => extractSectionItems(jobText, RESPONSIBILITY_PATTERNS);

/** -------------------- Seniority -------------------- */
const YEARS_RE = /(\d+)[+\-\s]*years?\s+(?:of\s+)?experience/;

export function extractExperienceLevel(jobText: string): ExperienceLevel {
    const text = preprocess(jobText);

    for (const [level, indicators] of EXPERIENCE_INDICATORS) {
        if (indicators.some((indicator) => text.includes(indicator))) return level;
    }

    const years = text.match(YEARS_RE);
    if (years) {
        const n = parseInt(years[1], 10);
        if (n <= 2) return "entry";
        if (n <= 5) return "mid";
        return "senior";
    }

    return "unknown";
}

/** -------------------- Keywords -------------------- */
export function extractKeywords(jobText: string, limit = DEFAULT_KEYWORD_LIMIT): KeywordCount[] {
    const counts = new Map<string, number>();
    for (const word of preprocess(jobText).match(WORD_RE) || []) {
        if (word.length <= 2 || STOP_WORDS.has(word)) continue;
        counts.set(word, (counts.get(word) ?? 0) + 1);
    }
    // Array#sort is stable, so equal counts keep first-seen order.
    return Array.from(counts.entries())
        .sort((a, b) => b[1] - a[1])
        .slice(0, limit);
}

/** -------------------- Priority skills -------------------- */
export function derivePrioritySkills(skills: string[], jobText: string, requirements: string[]): PrioritySkill[] {
    const raw = jobText.toLowerCase();
    const reqText = requirements.join(" ").toLowerCase();

    const out: PrioritySkill[] = [];
    for (const skill of skills) {
        const key = skill.toLowerCase();
        const frequency = countOccurrences(raw, key);
        const inRequirements = reqText.includes(key);
        if (frequency > 1 || inRequirements) {
            out.push({ skill, frequency, inRequirements });
        }
    }

    return out.sort((a, b) => Number(b.inRequirements) - Number(a.inRequirements) || b.frequency - a.frequency);
}

/** -------------------- Entry point -------------------- */
export type AnalyzeOptions = { keywordLimit?: number };

/**
 * Full rule-based analysis of a job posting.
 * Throws InvalidInputError for blank text before any matching runs.
 */
export function analyzeJobDescription(jobText: string, options: AnalyzeOptions = {}): JobAnalysis {
    assertJobText(jobText);

    const skills = extractSkills(jobText);
    const requirements = extractRequirements(jobText);

    return {
        skills,
        requirements,
        responsibilities: extractResponsibilities(jobText),
        experienceLevel: extractExperienceLevel(jobText),
        keywords: extractKeywords(jobText, options.keywordLimit ?? DEFAULT_KEYWORD_LIMIT),
        prioritySkills: derivePrioritySkills([...skills.technical, ...skills.soft], jobText, requirements),
    };
}

/** Degenerate result used when no analyzer could produce anything. */
export const emptyJobAnalysis = (): JobAnalysis => ({
    skills: { technical: [], soft: [], allCategories: {} },
    requirements: [],
    responsibilities: [],
    experienceLevel: "unknown",
    keywords: [],
    prioritySkills: [],
});
