// ============================================================
// POST /api/quiz/stats
// Records one quiz result (score + elapsed ms) for the caller.
// ============================================================

import { NextRequest, NextResponse } from "next/server";
import { getRequestContext } from "@/lib/server/context";
import { readJsonBody, safeRouteErrorResponse } from "@/lib/api/safe-error";
import { QuizStatBodySchema, toQuizStatResponse } from "@/lib/quiz-stats/store";

export async function POST(request: NextRequest) {
    try {
        const { userId, quizStats } = await getRequestContext();
        const body = QuizStatBodySchema.parse(await readJsonBody(request));

        const stat = await quizStats.record({
            userId,
            topic: body.topic,
            weekNum: body.week_num,
            subtopicNum: body.subtopic_num,
            numCorrect: body.num_correct,
            numQuestions: body.num_questions,
            timeTaken: body.time_taken,
        });

        return NextResponse.json(toQuizStatResponse(stat), { status: 201 });
    } catch (err) {
        return safeRouteErrorResponse("quiz/stats", err);
    }
}
