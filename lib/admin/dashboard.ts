// ============================================================
// Admin dashboard — platform totals and the newest accounts.
// ============================================================

import type { ProfileStore } from "@/lib/profiles/store";
import { toUserResponse } from "@/lib/profiles/store";
import type { QuizStatStore } from "@/lib/quiz-stats/store";
import type { RoadmapStore } from "@/lib/roadmap/store";

export const RECENT_USERS_LIMIT = 5;

export interface AdminDashboardDeps {
    profiles: ProfileStore;
    roadmaps: RoadmapStore;
    quizStats: QuizStatStore;
}

export async function loadAdminDashboard({ profiles, roadmaps, quizStats }: AdminDashboardDeps) {
    const [totalUsers, activeUsers, totalRoadmaps, totalQuizzes, recent] = await Promise.all([
        profiles.count(),
        profiles.count({ activeOnly: true }),
        roadmaps.countAll(),
        quizStats.countAll(),
        profiles.list({ limit: RECENT_USERS_LIMIT, offset: 0 }),
    ]);

    return {
        total_users: totalUsers,
        active_users: activeUsers,
        total_roadmaps: totalRoadmaps,
        total_quizzes: totalQuizzes,
        recent_users: recent.profiles.map(toUserResponse),
    };
}
