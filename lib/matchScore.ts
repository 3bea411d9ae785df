// lib/matchScore.ts
// Skill coverage: set overlap plus a small bonus per priority skill the candidate holds.
import type { JobAnalysis } from "./types";

const PRIORITY_BONUS = 0.1;

const norm = (s: string) => s.toLowerCase().trim();

/** Round to `digits` decimals; exact ties go to the even digit. */
export function roundHalfEven(value: number, digits = 1): number {
    const factor = 10 ** digits;
    const scaled = value * factor;
    const floor = Math.floor(scaled);
    const diff = scaled - floor;
    if (diff > 0.5) return (floor + 1) / factor;
    if (diff < 0.5) return floor / factor;
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

export const clampScore = (n: number) => Math.max(0, Math.min(100, n));

/**
 * Percentage (0–100, one decimal) of the job's skills the candidate covers.
 * Never throws; empty candidate or job skill lists score 0.
 */
export function calculateMatchScore(candidateSkills: string[], analysis: JobAnalysis): number {
    if (!candidateSkills.length) return 0;

    const candidate = new Set(candidateSkills.map(norm));
    const jobSkills = new Set([...analysis.skills.technical, ...analysis.skills.soft].map(norm));
    if (!jobSkills.size) return 0;

    let matched = 0;
    for (const skill of jobSkills) if (candidate.has(skill)) matched++;

    let priorityWeight = 0;
    for (const p of analysis.prioritySkills) {
        if (candidate.has(norm(p.skill))) priorityWeight += p.inRequirements ? 2 : 1;
    }

    const base = matched / jobSkills.size;
    const adjusted = Math.min(1, base + priorityWeight * PRIORITY_BONUS);

    return roundHalfEven(adjusted * 100, 1);
}
