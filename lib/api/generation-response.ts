import { NextResponse } from "next/server";
import type { GenerationOutcome } from "@/lib/generation/orchestrator";

// Responses keep the bare content shape; fallback use rides in a header.
export const FALLBACK_HEADER = "x-generation-fallback";

export function generationResponse<T>(outcome: GenerationOutcome<T>, body: unknown) {
    return NextResponse.json(body, {
        headers: { [FALLBACK_HEADER]: String(outcome.usedFallback) },
    });
}
