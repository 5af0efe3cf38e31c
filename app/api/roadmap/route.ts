// ============================================================
// POST /api/roadmap
// Generates a roadmap for { topic, time, knowledge_level } and
// upserts it under (user, topic). Always 200 with a week map;
// x-generation-fallback tells whether the fallback was used.
// ============================================================

import { NextRequest } from "next/server";
import { getRequestContext } from "@/lib/server/context";
import { readJsonBody, safeRouteErrorResponse } from "@/lib/api/safe-error";
import { generationResponse } from "@/lib/api/generation-response";
import { RoadmapCreateBodySchema, toRoadmapRequest } from "@/lib/schemas/requests";

export async function POST(request: NextRequest) {
    try {
        const { userId, orchestrator } = await getRequestContext();
        const body = RoadmapCreateBodySchema.parse(await readJsonBody(request));

        const outcome = await orchestrator.generateRoadmap(userId, toRoadmapRequest(body));

        return generationResponse(outcome, outcome.data);
    } catch (err) {
        return safeRouteErrorResponse("roadmap", err);
    }
}
