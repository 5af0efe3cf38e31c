// ============================================================
// Auth helper — resolves the caller from the Supabase session
// JWT carried in the auth cookies and returns userId
// plus a Supabase client that runs under the user's RLS.
// ============================================================

import "server-only";
import { createClient, SupabaseConfigError } from "@/lib/supabase/server";
import { AuthError } from "@/lib/errors";

export interface AuthResult {
    userId: string;
    supabase: Awaited<ReturnType<typeof createClient>>;
}

/**
 * Require authenticated user.
 * Throws 401 if unauthenticated, 503 if auth backend is unavailable.
 */
export async function requireAuth(): Promise<AuthResult> {
    let supabase: Awaited<ReturnType<typeof createClient>>;
    try {
        supabase = await createClient();
    } catch (error) {
        if (error instanceof SupabaseConfigError) {
            throw new AuthError("Authentication service unavailable", 503);
        }
        throw error;
    }

    const {
        data: { user },
        error,
    } = await supabase.auth.getUser();

    if (error && error.name !== "AuthSessionMissingError") {
        console.error("[auth] supabase.auth.getUser failed:", error.message);
        throw new AuthError("Authentication service unavailable", 503);
    }

    if (!user) {
        throw new AuthError("Authentication required", 401);
    }

    return { userId: user.id, supabase };
}
