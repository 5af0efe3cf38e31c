// ============================================================
// trackEvent — server-side event tracking utility.
// Writes to the `events` table. No PII in payload.
// ============================================================

import type { SupabaseClient } from "@supabase/supabase-js";

export interface TrackEventOptions {
    supabase: SupabaseClient;
    userId: string | null;
    eventType: string;
    payload?: Record<string, unknown>;
    requestId?: string;
}

/** Receives pipeline events; implementations never throw. */
export interface EventSink {
    track(eventType: string, payload: Record<string, unknown>): Promise<void>;
}

/**
 * Awaited event tracking with safe error swallowing.
 * Writes a row to `events` table. Errors are logged but never thrown.
 * IMPORTANT: Do NOT include PII (quiz answers, raw prompts) in payload.
 */
export async function trackEvent(opts: TrackEventOptions): Promise<void> {
    const { supabase, userId, eventType, payload = {}, requestId } = opts;

    const safePayload = {
        ...payload,
        ...(requestId ? { request_id: requestId } : {}),
    };

    try {
        const { error } = await supabase
            .from("events")
            .insert({
                user_id: userId,
                event_type: eventType,
                payload: safePayload,
            });

        if (error) {
            console.warn(`[trackEvent] ${eventType} failed:`, error);
        }
    } catch (err: unknown) {
        console.warn(`[trackEvent] ${eventType} error:`, err);
    }
}

export function createSupabaseEventSink(
    supabase: SupabaseClient,
    userId: string,
    requestId: string = generateRequestId()
): EventSink {
    return {
        track: (eventType, payload) =>
            trackEvent({ supabase, userId, eventType, payload, requestId }),
    };
}

/**
 * Generate a request ID (UUID v4) for correlating events.
 */
export function generateRequestId(): string {
    return crypto.randomUUID();
}
