// app/api/tailor-resume/route.ts
// Job-aware ordering of the profile's skills and experience, ready for the document generator.
import type { NextRequest } from "next/server";
import { getJobAnalysisEngine } from "@/lib/analysisEngine";
import { errorResponse, jsonOk, readJsonBody } from "@/lib/http";
import { TailorResumeRequestSchema } from "@/lib/schemas";
import { buildProfessionalSummary, flattenProfileSkills, prioritizeExperiences, tailorSkills } from "@/lib/tailoring";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export async function POST(request: NextRequest) {
    try {
        const { profile, analysis } = await readJsonBody(request, TailorResumeRequestSchema);

        const skills = flattenProfileSkills(profile);
        const matchScore = await getJobAnalysisEngine().score(skills, analysis);

        return jsonOk({
            skills: tailorSkills(skills, analysis),
            experiences: prioritizeExperiences(profile.experiences, analysis),
            summary: buildProfessionalSummary(profile, analysis),
            matchScore,
        });
    } catch (error) {
        return errorResponse(error, "Tailor resume");
    }
}
