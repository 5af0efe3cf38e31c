// ============================================================
// GET /api/dashboard/stats
// Course count, quiz count, hardness index and per-topic progress.
// ============================================================

import { NextResponse } from "next/server";
import { getRequestContext } from "@/lib/server/context";
import { safeRouteErrorResponse } from "@/lib/api/safe-error";
import { computeDashboardStats } from "@/lib/dashboard/stats";
import { DEFAULT_HARDNESS_INDEX } from "@/lib/profiles/store";

export async function GET() {
    try {
        const { userId, profile, roadmaps, quizStats } = await getRequestContext();
        const [roadmapRecords, statRecords] = await Promise.all([
            roadmaps.listByUser(userId),
            quizStats.listByUser(userId),
        ]);

        return NextResponse.json(
            computeDashboardStats(
                roadmapRecords,
                statRecords,
                profile?.hardnessIndex ?? DEFAULT_HARDNESS_INDEX
            )
        );
    } catch (err) {
        return safeRouteErrorResponse("dashboard/stats", err);
    }
}
