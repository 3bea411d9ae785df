// app/api/match-score/route.ts
import type { NextRequest } from "next/server";
import { getJobAnalysisEngine } from "@/lib/analysisEngine";
import { errorResponse, jsonOk, readJsonBody } from "@/lib/http";
import { MatchScoreRequestSchema } from "@/lib/schemas";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export async function POST(request: NextRequest) {
    try {
        const { candidateSkills, analysis } = await readJsonBody(request, MatchScoreRequestSchema);
        const score = await getJobAnalysisEngine().score(candidateSkills, analysis);
        return jsonOk({ score });
    } catch (error) {
        return errorResponse(error, "Score skills");
    }
}
