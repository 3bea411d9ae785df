// lib/http.ts - shared bits for the API route handlers
import { NextResponse, type NextRequest } from "next/server";
import { z, ZodError } from "zod";
import { logError } from "./debug";
import { InvalidInputError, errorMessage } from "./errors";

export function noStoreHeaders() {
    return { "Cache-Control": "no-store, max-age=0", Pragma: "no-cache", Expires: "0" };
}

export const jsonOk = <T extends Record<string, unknown>>(body: T) =>
    NextResponse.json({ success: true, ...body }, { status: 200, headers: noStoreHeaders() });

/** Parse the JSON body and validate it; throws ZodError or SyntaxError. */
export async function readJsonBody<S extends z.ZodTypeAny>(request: NextRequest, schema: S): Promise<z.infer<S>> {
    const body: unknown = await request.json();
    return schema.parse(body);
}

/** Map a thrown error onto the route's error response. */
export function errorResponse(error: unknown, context: string) {
    if (error instanceof InvalidInputError) {
        return NextResponse.json({ error: error.message }, { status: 400, headers: noStoreHeaders() });
    }
    if (error instanceof ZodError) {
        return NextResponse.json(
            { error: "Invalid request body", details: error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`) },
            { status: 400, headers: noStoreHeaders() }
        );
    }
    if (error instanceof SyntaxError) {
        return NextResponse.json({ error: "Request body must be JSON" }, { status: 400, headers: noStoreHeaders() });
    }

    logError(`❌ ${context} error:`, error);
    return NextResponse.json(
        { error: `Failed to ${context.toLowerCase()}`, details: errorMessage(error) },
        { status: 500, headers: noStoreHeaders() }
    );
}
