// ============================================================
// Account checks applied after authentication.
// A user without a profile row is an active, non-admin user.
// ============================================================

import { AuthError } from "@/lib/errors";
import type { ProfileRecord } from "./store";

export function assertActive(profile: ProfileRecord | null): void {
    if (profile && !profile.isActive) {
        throw new AuthError("Account is deactivated", 403);
    }
}

export function assertAdmin(profile: ProfileRecord | null): void {
    assertActive(profile);
    if (profile?.role !== "admin") {
        throw new AuthError("Admin access denied", 403);
    }
}
