// lib/tailoring.ts
// Resume-side helpers that read a JobAnalysis: skill lists, experience order, summary.
import { splitSkills } from "./schemas";
import type { CandidateProfile, JobAnalysis, ProfileExperience } from "./types";

const PROFILE_SKILL_FIELDS = ["programmingSkills", "technologies", "languageSkills", "certifications"] as const;

const TOP_PRIORITY = 5;

/** Every comma-separated skill field of the profile, merged in field order. */
export function flattenProfileSkills(profile: CandidateProfile): string[] {
    return PROFILE_SKILL_FIELDS.flatMap((field) => splitSkills(profile[field] ?? ""));
}

const jobSkillsOf = (analysis: JobAnalysis) =>
    [...analysis.skills.technical, ...analysis.skills.soft].map((s) => s.toLowerCase());

/** Relevance of one experience entry to the posting. */
export function experienceRelevance(exp: ProfileExperience, analysis: JobAnalysis): number {
    const text = `${exp.title} ${exp.company} ${exp.description ?? ""}`.toLowerCase();
    const terms = new Set([...analysis.keywords.map(([kw]) => kw.toLowerCase()), ...jobSkillsOf(analysis)]);

    let score = 0;
    for (const term of terms) if (text.includes(term)) score++;

    for (const p of analysis.prioritySkills.slice(0, TOP_PRIORITY)) {
        if (text.includes(p.skill.toLowerCase())) score += p.inRequirements ? 3 : 2;
    }
    return score;
}

/** Most relevant experience first; ties keep profile order. */
export function prioritizeExperiences<T extends ProfileExperience>(experiences: T[], analysis: JobAnalysis): T[] {
    return experiences
        .map((exp) => ({ exp, score: experienceRelevance(exp, analysis) }))
        .sort((a, b) => b.score - a.score)
        .map(({ exp }) => exp);
}

/** Skills the posting asks for come first. */
export function tailorSkills(skills: string[], analysis: JobAnalysis): string[] {
    const jobSkills = new Set(jobSkillsOf(analysis));
    const priority = new Set(analysis.prioritySkills.map((p) => p.skill.toLowerCase()));

    const matched: string[] = [];
    const rest: string[] = [];
    for (const skill of skills) {
        const key = skill.toLowerCase().trim();
        (jobSkills.has(key) || priority.has(key) ? matched : rest).push(skill);
    }
    return [...matched, ...rest];
}

const LEVEL_OPENERS: Record<JobAnalysis["experienceLevel"], string> = {
    entry: "Motivated entry-level professional",
    mid: "Experienced professional",
    senior: "Senior professional with proven leadership",
    executive: "Executive-level professional",
    unknown: "Experienced professional",
};

/** The profile's own summary, or one assembled from level and top priority skills. */
export function buildProfessionalSummary(profile: CandidateProfile, analysis: JobAnalysis): string {
    const own = profile.summary?.trim();
    if (own) return own;

    const top = analysis.prioritySkills.slice(0, 3).map((p) => p.skill);
    const expertise = top.length ? ` with expertise in ${top.join(", ")}` : "";

    return `${LEVEL_OPENERS[analysis.experienceLevel]}${expertise}, ready to contribute to organizational success.`;
}
