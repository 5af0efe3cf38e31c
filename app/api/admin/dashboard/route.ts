// ============================================================
// GET /api/admin/dashboard
// Admin-only: user, roadmap and quiz totals plus newest users.
// ============================================================

import { NextResponse } from "next/server";
import { getAdminContext } from "@/lib/server/context";
import { safeRouteErrorResponse } from "@/lib/api/safe-error";
import { loadAdminDashboard } from "@/lib/admin/dashboard";

export async function GET() {
    try {
        const { profiles, roadmaps, quizStats } = await getAdminContext();

        return NextResponse.json(await loadAdminDashboard({ profiles, roadmaps, quizStats }));
    } catch (err) {
        return safeRouteErrorResponse("admin/dashboard", err);
    }
}
