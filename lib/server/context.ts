// ============================================================
// Per-request wiring: authenticated user + stores + orchestrator.
// The completion source is built once, when this module loads;
// an invalid LLM configuration only affects generation, which
// then serves its fallbacks.
// ============================================================

import "server-only";
import { requireAuth } from "@/lib/auth";
import { GenerationOrchestrator } from "@/lib/generation/orchestrator";
import { createCompletionSource } from "@/lib/llm";
import { createSupabaseEventSink, generateRequestId } from "@/lib/observability/track-event";
import { assertActive, assertAdmin } from "@/lib/profiles/access";
import {
    SupabaseProfileStore,
    type ProfileRecord,
    type ProfileStore,
} from "@/lib/profiles/store";
import { SupabaseQuizStatStore, type QuizStatStore } from "@/lib/quiz-stats/store";
import { SupabaseRoadmapStore, type RoadmapStore } from "@/lib/roadmap/store";

export interface RequestContext {
    userId: string;
    requestId: string;
    /** null when the user has no profile row yet. */
    profile: ProfileRecord | null;
    roadmaps: RoadmapStore;
    quizStats: QuizStatStore;
    profiles: ProfileStore;
    orchestrator: GenerationOrchestrator;
}

const completionSource = createCompletionSource(process.env);

/** Throws AuthError: 401 without a session, 403 for a deactivated account. */
export async function getRequestContext(): Promise<RequestContext> {
    const { userId, supabase } = await requireAuth();
    const requestId = generateRequestId();
    const profiles = new SupabaseProfileStore(supabase);

    const profile = await profiles.findById(userId);
    assertActive(profile);

    const roadmaps = new SupabaseRoadmapStore(supabase);

    return {
        userId,
        requestId,
        profile,
        roadmaps,
        quizStats: new SupabaseQuizStatStore(supabase),
        profiles,
        orchestrator: new GenerationOrchestrator({
            llm: completionSource,
            roadmaps,
            events: createSupabaseEventSink(supabase, userId, requestId),
        }),
    };
}

/** Same as getRequestContext, and 403 unless the caller is an admin. */
export async function getAdminContext(): Promise<RequestContext> {
    const context = await getRequestContext();
    assertAdmin(context.profile);
    return context;
}
