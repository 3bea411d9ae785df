// app/api/analyze-job/route.ts
import { NextResponse, type NextRequest } from "next/server";
import { getJobAnalysisEngine } from "@/lib/analysisEngine";
import { debug } from "@/lib/debug";
import { errorResponse, jsonOk, noStoreHeaders, readJsonBody } from "@/lib/http";
import { AnalyzeJobRequestSchema } from "@/lib/schemas";

/** Next.js runtime flags */
export const dynamic = "force-dynamic";
export const revalidate = 0;
export const runtime = "nodejs";

export async function GET() {
    return NextResponse.json({ ok: true }, { headers: noStoreHeaders() });
}

export async function POST(request: NextRequest) {
    try {
        const { jobDescription, candidateSkills } = await readJsonBody(request, AnalyzeJobRequestSchema);

        debug("🔍 Job description received:", {
            length: jobDescription.length,
            preview: jobDescription.substring(0, 300),
            hasSkills: Boolean(candidateSkills?.length),
        });

        const engine = getJobAnalysisEngine();
        const analysis = await engine.analyze(jobDescription);

        if (candidateSkills === undefined) {
            return jsonOk({ analysis });
        }

        const matchScore = await engine.score(candidateSkills, analysis);
        return jsonOk({ analysis, matchScore });
    } catch (error) {
        return errorResponse(error, "Analyze job description");
    }
}
