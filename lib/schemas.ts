// lib/schemas.ts
import { z } from "zod";
import { EXPERIENCE_LEVELS, SKILL_CATEGORIES, type JobAnalysis } from "./types";

export const splitSkills = (text: string) =>
    text
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean);

/** Skills as a list, or as the comma-separated text the profile form stores. */
export const CandidateSkillsSchema = z.union([z.array(z.string()), z.string().transform(splitSkills)]);

export const PrioritySkillSchema = z.object({
    skill: z.string(),
    frequency: z.number().int().nonnegative(),
    inRequirements: z.boolean(),
});

export const JobAnalysisSchema: z.ZodType<JobAnalysis> = z.object({
    skills: z.object({
        technical: z.array(z.string()),
        soft: z.array(z.string()),
        allCategories: z.record(z.enum(SKILL_CATEGORIES), z.array(z.string())),
    }),
    requirements: z.array(z.string()),
    responsibilities: z.array(z.string()),
    experienceLevel: z.enum(EXPERIENCE_LEVELS),
    keywords: z.array(z.tuple([z.string(), z.number().int().nonnegative()])),
    prioritySkills: z.array(PrioritySkillSchema),
});

export const AnalyzeJobRequestSchema = z.object({
    jobDescription: z.string(),
    candidateSkills: CandidateSkillsSchema.optional(),
});

export const MatchScoreRequestSchema = z.object({
    candidateSkills: CandidateSkillsSchema,
    analysis: JobAnalysisSchema,
});

export const ProfileExperienceSchema = z.object({
    title: z.string().default(""),
    company: z.string().default(""),
    description: z.string().optional(),
});

export const CandidateProfileSchema = z.object({
    summary: z.string().optional(),
    programmingSkills: z.string().optional(),
    technologies: z.string().optional(),
    languageSkills: z.string().optional(),
    certifications: z.string().optional(),
    experiences: z.array(ProfileExperienceSchema).default([]),
});

export const TailorResumeRequestSchema = z.object({
    profile: CandidateProfileSchema,
    analysis: JobAnalysisSchema,
});
