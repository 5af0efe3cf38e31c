// ============================================================
// GET /api/roadmaps
// Lists the caller's roadmaps, newest first.
// ============================================================

import { NextResponse } from "next/server";
import { getRequestContext } from "@/lib/server/context";
import { safeRouteErrorResponse } from "@/lib/api/safe-error";

export async function GET() {
    try {
        const { userId, roadmaps } = await getRequestContext();
        const records = await roadmaps.listByUser(userId);

        return NextResponse.json(
            records.map((record) => ({
                topic: record.topic,
                time: record.time,
                knowledge_level: record.knowledgeLevel,
                roadmap_data: record.roadmap,
                is_fallback: record.isFallback,
                created_at: record.createdAt,
            }))
        );
    } catch (err) {
        return safeRouteErrorResponse("roadmaps", err);
    }
}
