// ============================================================
// GET /api/profile    — the caller's profile
// PATCH /api/profile  — update username, full_name, avatar or
//                       hardness_index (role and status are
//                       admin-only)
// ============================================================

import { NextRequest, NextResponse } from "next/server";
import { getRequestContext } from "@/lib/server/context";
import { readJsonBody, safeRouteErrorResponse } from "@/lib/api/safe-error";
import { NotFoundError } from "@/lib/errors";
import {
    ProfileUpdateBodySchema,
    toProfilePatch,
    toUserResponse,
} from "@/lib/profiles/store";

export async function GET() {
    try {
        const { profile } = await getRequestContext();
        if (!profile) {
            throw new NotFoundError("Profile not found");
        }
        return NextResponse.json(toUserResponse(profile));
    } catch (err) {
        return safeRouteErrorResponse("profile", err);
    }
}

export async function PATCH(request: NextRequest) {
    try {
        const { userId, profiles } = await getRequestContext();
        const body = ProfileUpdateBodySchema.parse(await readJsonBody(request));

        const updated = await profiles.update(userId, toProfilePatch(body));
        if (!updated) {
            throw new NotFoundError("Profile not found");
        }
        return NextResponse.json(toUserResponse(updated));
    } catch (err) {
        return safeRouteErrorResponse("profile", err);
    }
}
