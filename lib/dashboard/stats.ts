// ============================================================
// Dashboard stats — course count, quiz count, the user's
// hardness index and per-topic progress (distinct subtopics
// with a recorded quiz).
// ============================================================

import type { RoadmapRecord } from "@/lib/roadmap/store";
import { countSubtopics, orderedWeeks } from "@/lib/roadmap/weeks";
import type { QuizStatRecord } from "@/lib/quiz-stats/store";

export interface TopicProgress {
    completed: number;
    total: number;
}

export interface DashboardStats {
    total_courses: number;
    completed_quizzes: number;
    hardness_index: number;
    progress: Record<string, TopicProgress>;
}

function topicProgress(
    roadmap: RoadmapRecord,
    quizStats: readonly QuizStatRecord[]
): TopicProgress {
    const subtopicCounts = new Map(
        orderedWeeks(roadmap.roadmap).map((week) => [week.weekNumber, week.subtopics.length])
    );

    // week_num / subtopic_num are 1-based positions in the roadmap.
    const done = new Set<string>();
    for (const stat of quizStats) {
        if (stat.topic !== roadmap.topic) continue;
        const count = subtopicCounts.get(stat.weekNum);
        if (count !== undefined && stat.subtopicNum >= 1 && stat.subtopicNum <= count) {
            done.add(`${stat.weekNum}:${stat.subtopicNum}`);
        }
    }

    return { completed: done.size, total: countSubtopics(roadmap.roadmap) };
}

export function computeDashboardStats(
    roadmaps: readonly RoadmapRecord[],
    quizStats: readonly QuizStatRecord[],
    hardnessIndex: number
): DashboardStats {
    return {
        total_courses: roadmaps.length,
        completed_quizzes: quizStats.length,
        hardness_index: hardnessIndex,
        // Topics are user input; fromEntries keeps "__proto__" an own key.
        progress: Object.fromEntries(
            roadmaps.map((roadmap) => [roadmap.topic, topicProgress(roadmap, quizStats)])
        ),
    };
}
