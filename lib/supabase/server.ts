// ============================================================
// Supabase server client bound to the request cookies.
// ============================================================

import "server-only";
import { createServerClient, type CookieOptions } from "@supabase/ssr";
import { cookies } from "next/headers";

export class SupabaseConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "SupabaseConfigError";
    }
}

function getSupabasePublicEnv(): { url: string; anonKey: string } {
    const url = process.env.NEXT_PUBLIC_SUPABASE_URL?.trim();
    const anonKey = process.env.NEXT_PUBLIC_SUPABASE_ANON_KEY?.trim();

    if (!url || !anonKey) {
        const missing = [
            url ? null : "NEXT_PUBLIC_SUPABASE_URL",
            anonKey ? null : "NEXT_PUBLIC_SUPABASE_ANON_KEY",
        ].filter((name): name is string => name !== null);
        console.error(`[supabase/server] Missing required Supabase env vars: ${missing.join(", ")}`);
        throw new SupabaseConfigError(
            "Supabase is unavailable due to missing environment configuration."
        );
    }

    return { url, anonKey };
}

export async function createClient() {
    const cookieStore = await cookies();
    const { url, anonKey } = getSupabasePublicEnv();

    return createServerClient(url, anonKey, {
        cookies: {
            getAll() {
                return cookieStore.getAll();
            },
            setAll(cookiesToSet: { name: string; value: string; options: CookieOptions }[]) {
                try {
                    cookiesToSet.forEach(({ name, value, options }) =>
                        cookieStore.set(name, value, options)
                    );
                } catch (error) {
                    // Route handlers may run after the response is committed;
                    // the session is refreshed again on the next request.
                    console.warn("[supabase/server] could not persist auth cookies:", error);
                }
            },
        },
    });
}
