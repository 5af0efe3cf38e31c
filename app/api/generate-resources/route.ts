// ============================================================
// POST /api/generate-resources
// Markdown study guide for one subtopic → { resources }.
// ============================================================

import { NextRequest } from "next/server";
import { getRequestContext } from "@/lib/server/context";
import { readJsonBody, safeRouteErrorResponse } from "@/lib/api/safe-error";
import { ResourceBodySchema, toResourceRequest } from "@/lib/schemas/requests";
import { generationResponse } from "@/lib/api/generation-response";

export async function POST(request: NextRequest) {
    try {
        const { orchestrator } = await getRequestContext();
        const body = ResourceBodySchema.parse(await readJsonBody(request));

        const outcome = await orchestrator.generateResources(toResourceRequest(body));

        return generationResponse(outcome, { resources: outcome.data });
    } catch (err) {
        return safeRouteErrorResponse("generate-resources", err);
    }
}
