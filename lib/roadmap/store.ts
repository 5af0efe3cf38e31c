// ============================================================
// Roadmap persistence — one row per (user, topic).
// Topic matching is exact and case-sensitive: "Rust" and "rust"
// are separate roadmaps.
// ============================================================

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod/v4";
import { StorageError } from "@/lib/errors";
import { parseRoadmapStructure, type RoadmapStructure } from "./weeks";

export interface RoadmapRecord {
    userId: string;
    topic: string;
    time: string;
    knowledgeLevel: string;
    roadmap: RoadmapStructure;
    isFallback: boolean;
    createdAt: string;
    updatedAt: string;
}

export type NewRoadmapRecord = Omit<RoadmapRecord, "createdAt" | "updatedAt">;

export interface RoadmapStore {
    /** Insert, or replace the roadmap stored for the same (userId, topic). */
    upsert(record: NewRoadmapRecord): Promise<void>;
    /** Insert only when (userId, topic) has no roadmap yet. */
    insertIfAbsent(record: NewRoadmapRecord): Promise<void>;
    findByTopic(userId: string, topic: string): Promise<RoadmapRecord | null>;
    /** Newest first. */
    listByUser(userId: string): Promise<RoadmapRecord[]>;
    /** Every roadmap visible to the caller; all of them for an admin. */
    countAll(): Promise<number>;
}

// ---- Supabase implementation ---------------------------------

const ROADMAP_COLUMNS =
    "user_id, topic, time, knowledge_level, roadmap_data, is_fallback, created_at, updated_at";

const RoadmapRowSchema = z.object({
    user_id: z.string(),
    topic: z.string(),
    time: z.string(),
    knowledge_level: z.string(),
    roadmap_data: z.unknown(),
    is_fallback: z.boolean(),
    created_at: z.string(),
    updated_at: z.string(),
});

function toRecord(row: unknown): RoadmapRecord {
    const parsed = RoadmapRowSchema.safeParse(row);
    if (!parsed.success) {
        throw new StorageError("roadmaps row has an unexpected shape", {
            cause: parsed.error,
        });
    }
    const roadmap = parseRoadmapStructure(parsed.data.roadmap_data);
    if (!roadmap) {
        throw new StorageError(
            `stored roadmap for topic "${parsed.data.topic}" is malformed`
        );
    }
    return {
        userId: parsed.data.user_id,
        topic: parsed.data.topic,
        time: parsed.data.time,
        knowledgeLevel: parsed.data.knowledge_level,
        roadmap,
        isFallback: parsed.data.is_fallback,
        createdAt: parsed.data.created_at,
        updatedAt: parsed.data.updated_at,
    };
}

export class SupabaseRoadmapStore implements RoadmapStore {
    constructor(private readonly supabase: SupabaseClient) {}

    upsert(record: NewRoadmapRecord): Promise<void> {
        return this.write(record, false);
    }

    insertIfAbsent(record: NewRoadmapRecord): Promise<void> {
        return this.write(record, true);
    }

    private async write(record: NewRoadmapRecord, ignoreDuplicates: boolean): Promise<void> {
        const { error } = await this.supabase.from("roadmaps").upsert(
            {
                user_id: record.userId,
                topic: record.topic,
                time: record.time,
                knowledge_level: record.knowledgeLevel,
                roadmap_data: record.roadmap,
                is_fallback: record.isFallback,
                updated_at: new Date().toISOString(),
            },
            { onConflict: "user_id,topic", ignoreDuplicates }
        );

        if (error) {
            throw new StorageError(`roadmaps upsert failed: ${error.message}`, {
                cause: error,
            });
        }
    }

    async findByTopic(userId: string, topic: string): Promise<RoadmapRecord | null> {
        const { data, error } = await this.supabase
            .from("roadmaps")
            .select(ROADMAP_COLUMNS)
            .eq("user_id", userId)
            .eq("topic", topic)
            .maybeSingle();

        if (error) {
            throw new StorageError(`roadmaps query failed: ${error.message}`, {
                cause: error,
            });
        }
        return data ? toRecord(data) : null;
    }

    async listByUser(userId: string): Promise<RoadmapRecord[]> {
        const { data, error } = await this.supabase
            .from("roadmaps")
            .select(ROADMAP_COLUMNS)
            .eq("user_id", userId)
            .order("created_at", { ascending: false });

        if (error) {
            throw new StorageError(`roadmaps query failed: ${error.message}`, {
                cause: error,
            });
        }
        return (data ?? []).map(toRecord);
    }

    async countAll(): Promise<number> {
        const { count, error } = await this.supabase
            .from("roadmaps")
            .select("id", { count: "exact", head: true });

        if (error) {
            throw new StorageError(`roadmaps count failed: ${error.message}`, {
                cause: error,
            });
        }
        return count ?? 0;
    }
}
