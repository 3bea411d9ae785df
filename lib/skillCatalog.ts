// lib/skillCatalog.ts
// Fixed lookup tables shared by both analyzers. Loaded once, frozen.
import skillsData from "./data/skills.json";
import stopWordsData from "./data/stopwords.json";
import { SKILL_CATEGORIES, type ExperienceLevel, type SkillCategory } from "./types";

for (const terms of Object.values(skillsData.technical)) Object.freeze(terms);

export const TECHNICAL_SKILLS: Readonly<Record<SkillCategory, readonly string[]>> = Object.freeze(skillsData.technical);

export const SOFT_SKILLS: readonly string[] = Object.freeze([...skillsData.soft]);

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordsData);

// Checked top to bottom; the first level with a hit wins.
export const EXPERIENCE_INDICATORS: ReadonlyArray<readonly [Exclude<ExperienceLevel, "unknown">, readonly string[]]> = [
    ["entry", ["entry", "junior", "associate", "graduate", "trainee", "0-2 years"]],
    ["mid", ["mid", "intermediate", "experienced", "3-5 years", "2-4 years"]],
    ["senior", ["senior", "lead", "principal", "staff", "5+ years", "6+ years"]],
    ["executive", ["director", "manager", "head", "chief", "vp", "vice president"]],
];

/** Catalog category of a technical skill, if it is in the catalog at all. */
export function categoryOf(skill: string): SkillCategory | undefined {
    const key = skill.toLowerCase().trim();
    return SKILL_CATEGORIES.find((category) => TECHNICAL_SKILLS[category].includes(key));
}
