// ============================================================
// POST /api/quiz
// Five multiple-choice questions for a roadmap subtopic.
// Not persisted; only results are (see /api/quiz/stats).
// ============================================================

import { NextRequest } from "next/server";
import { getRequestContext } from "@/lib/server/context";
import { readJsonBody, safeRouteErrorResponse } from "@/lib/api/safe-error";
import { QuizBodySchema, toQuizRequest } from "@/lib/schemas/requests";
import { generationResponse } from "@/lib/api/generation-response";

export async function POST(request: NextRequest) {
    try {
        const { orchestrator } = await getRequestContext();
        const body = QuizBodySchema.parse(await readJsonBody(request));

        const outcome = await orchestrator.generateQuiz(toQuizRequest(body));

        return generationResponse(outcome, outcome.data);
    } catch (err) {
        return safeRouteErrorResponse("quiz", err);
    }
}
