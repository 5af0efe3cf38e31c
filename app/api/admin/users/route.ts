// ============================================================
// GET /api/admin/users?limit=20&offset=0
// Admin-only: list users (profiles), newest first.
// ============================================================

import { NextRequest, NextResponse } from "next/server";
import { getAdminContext } from "@/lib/server/context";
import { safeRouteErrorResponse } from "@/lib/api/safe-error";
import { parsePagination } from "@/lib/api/pagination";
import { toUserResponse } from "@/lib/profiles/store";

export async function GET(request: NextRequest) {
    try {
        const { profiles } = await getAdminContext();

        const { limit, page, offset } = parsePagination(request.nextUrl.searchParams);
        const result = await profiles.list({ limit, offset });

        return NextResponse.json({
            users: result.profiles.map(toUserResponse),
            total: result.total,
            limit,
            page,
            offset,
        });
    } catch (err) {
        return safeRouteErrorResponse("admin/users", err);
    }
}
