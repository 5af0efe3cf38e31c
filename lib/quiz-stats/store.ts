// ============================================================
// Quiz results — score and elapsed time per attempt.
// ============================================================

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod/v4";
import { StorageError } from "@/lib/errors";

export const QuizStatBodySchema = z
    .object({
        topic: z.string().refine((value) => value.trim().length > 0, "must not be empty"),
        week_num: z.number().int().min(1),
        subtopic_num: z.number().int().min(1),
        num_correct: z.number().int().min(0),
        num_questions: z.number().int().min(1),
        time_taken: z.number().int().min(0),
    })
    .refine((body) => body.num_correct <= body.num_questions, {
        message: "num_correct cannot exceed num_questions",
        path: ["num_correct"],
    });

export type QuizStatBody = z.infer<typeof QuizStatBodySchema>;

export interface QuizStatRecord {
    id: number;
    userId: string;
    topic: string;
    weekNum: number;
    subtopicNum: number;
    numCorrect: number;
    numQuestions: number;
    /** Milliseconds. */
    timeTaken: number;
    createdAt: string;
}

export type NewQuizStat = Omit<QuizStatRecord, "id" | "createdAt">;

export interface QuizStatStore {
    record(stat: NewQuizStat): Promise<QuizStatRecord>;
    listByUser(userId: string): Promise<QuizStatRecord[]>;
    /** Every result visible to the caller; all of them for an admin. */
    countAll(): Promise<number>;
}

export function toQuizStatResponse(stat: QuizStatRecord) {
    return {
        id: stat.id,
        topic: stat.topic,
        week_num: stat.weekNum,
        subtopic_num: stat.subtopicNum,
        num_correct: stat.numCorrect,
        num_questions: stat.numQuestions,
        time_taken: stat.timeTaken,
        created_at: stat.createdAt,
    };
}

// ---- Supabase implementation ---------------------------------

const QUIZ_STAT_COLUMNS =
    "id, user_id, topic, week_num, subtopic_num, num_correct, num_questions, time_taken, created_at";

const QuizStatRowSchema = z.object({
    id: z.number().int(),
    user_id: z.string(),
    topic: z.string(),
    week_num: z.number().int(),
    subtopic_num: z.number().int(),
    num_correct: z.number().int(),
    num_questions: z.number().int(),
    time_taken: z.number().int(),
    created_at: z.string(),
});

function toRecord(row: unknown): QuizStatRecord {
    const parsed = QuizStatRowSchema.safeParse(row);
    if (!parsed.success) {
        throw new StorageError("quiz_stats row has an unexpected shape", {
            cause: parsed.error,
        });
    }
    const r = parsed.data;
    return {
        id: r.id,
        userId: r.user_id,
        topic: r.topic,
        weekNum: r.week_num,
        subtopicNum: r.subtopic_num,
        numCorrect: r.num_correct,
        numQuestions: r.num_questions,
        timeTaken: r.time_taken,
        createdAt: r.created_at,
    };
}

export class SupabaseQuizStatStore implements QuizStatStore {
    constructor(private readonly supabase: SupabaseClient) {}

    async record(stat: NewQuizStat): Promise<QuizStatRecord> {
        const { data, error } = await this.supabase
            .from("quiz_stats")
            .insert({
                user_id: stat.userId,
                topic: stat.topic,
                week_num: stat.weekNum,
                subtopic_num: stat.subtopicNum,
                num_correct: stat.numCorrect,
                num_questions: stat.numQuestions,
                time_taken: stat.timeTaken,
            })
            .select(QUIZ_STAT_COLUMNS)
            .single();

        if (error) {
            throw new StorageError(`quiz_stats insert failed: ${error.message}`, {
                cause: error,
            });
        }
        return toRecord(data);
    }

    async listByUser(userId: string): Promise<QuizStatRecord[]> {
        const { data, error } = await this.supabase
            .from("quiz_stats")
            .select(QUIZ_STAT_COLUMNS)
            .eq("user_id", userId)
            .order("created_at", { ascending: false });

        if (error) {
            throw new StorageError(`quiz_stats query failed: ${error.message}`, {
                cause: error,
            });
        }
        return (data ?? []).map(toRecord);
    }

    async countAll(): Promise<number> {
        const { count, error } = await this.supabase
            .from("quiz_stats")
            .select("id", { count: "exact", head: true });

        if (error) {
            throw new StorageError(`quiz_stats count failed: ${error.message}`, {
                cause: error,
            });
        }
        return count ?? 0;
    }
}
