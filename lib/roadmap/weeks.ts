// ============================================================
// Week-keyed roadmap structure.
//
// Roadmaps travel and are stored as { "Week N": {...} } maps. Key
// order is not part of the contract: every consumer goes through
// orderedWeeks(), which sorts on the numeric suffix.
// ============================================================

import { RoadmapWeekMapSchema, type WeekBody } from "@/lib/schemas/roadmap";

export type WeekKey = `Week ${number}`;

export type RoadmapStructure = Record<WeekKey, WeekBody>;

export interface WeekEntry extends WeekBody {
    weekNumber: number;
}

const WEEK_KEY_PATTERN = /^Week (\d+)$/;

export function weekKey(weekNumber: number): WeekKey {
    return `Week ${weekNumber}`;
}

/** Numeric suffix of a "Week N" key, or null for any other key. */
export function weekNumberOf(key: string): number | null {
    const match = WEEK_KEY_PATTERN.exec(key);
    if (!match) {
        return null;
    }
    const value = Number(match[1]);
    return Number.isSafeInteger(value) ? value : null;
}

/**
 * Entries sorted by week number. Keys that are not "Week N" are dropped;
 * callers validate with RoadmapWeekMapSchema first.
 */
export function orderedWeeks(roadmap: Record<string, WeekBody>): WeekEntry[] {
    const entries: WeekEntry[] = [];
    for (const [key, body] of Object.entries(roadmap)) {
        const weekNumber = weekNumberOf(key);
        if (weekNumber !== null) {
            entries.push({ weekNumber, topic: body.topic, subtopics: body.subtopics });
        }
    }
    return entries.sort((a, b) => a.weekNumber - b.weekNumber);
}

export function fromWeekEntries(entries: readonly WeekEntry[]): RoadmapStructure {
    const roadmap: RoadmapStructure = {};
    const sorted = [...entries].sort((a, b) => a.weekNumber - b.weekNumber);
    for (const entry of sorted) {
        roadmap[weekKey(entry.weekNumber)] = {
            topic: entry.topic,
            subtopics: entry.subtopics,
        };
    }
    return roadmap;
}

/**
 * Describes why a sorted week sequence is not 1..N with at least one
 * subtopic per week, or returns null when it is.
 */
export function findWeekSequenceProblem(sorted: readonly WeekEntry[]): string | null {
    if (sorted.length === 0) {
        return "roadmap has no weeks";
    }
    for (let i = 0; i < sorted.length; i++) {
        const expected = i + 1;
        if (sorted[i].weekNumber !== expected) {
            return `expected week ${expected}, found week ${sorted[i].weekNumber}`;
        }
        if (sorted[i].subtopics.length === 0) {
            return `week ${expected} has no subtopics`;
        }
    }
    return null;
}

export function countSubtopics(roadmap: RoadmapStructure): number {
    return orderedWeeks(roadmap).reduce((sum, week) => sum + week.subtopics.length, 0);
}

/**
 * Validates a stored or received week map and rebuilds it in week order.
 * Returns null when the value is not a contiguous "Week 1..N" roadmap.
 */
export function parseRoadmapStructure(value: unknown): RoadmapStructure | null {
    const parsed = RoadmapWeekMapSchema.safeParse(value);
    if (!parsed.success) {
        return null;
    }
    const weeks = orderedWeeks(parsed.data);
    if (findWeekSequenceProblem(weeks) !== null) {
        return null;
    }
    return fromWeekEntries(weeks);
}
