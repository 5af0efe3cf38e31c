// ============================================================
// Request bodies for the generation endpoints and the
// GenerationRequest union the prompt builder consumes.
// ============================================================

import { z } from "zod/v4";

export const KNOWLEDGE_LEVELS = [
    "AbsoluteBeginner",
    "Beginner",
    "Moderate",
    "Expert",
] as const;

export type KnowledgeLevel = (typeof KNOWLEDGE_LEVELS)[number];

export const KNOWLEDGE_LEVEL_LABELS: Record<KnowledgeLevel, string> = {
    AbsoluteBeginner: "Absolute Beginner",
    Beginner: "Beginner",
    Moderate: "Moderate",
    Expert: "Expert",
};

export type DurationUnit = "Weeks" | "Months";

export interface Duration {
    amount: number;
    unit: DurationUnit;
}

export interface RoadmapRequest {
    kind: "roadmap";
    topic: string;
    duration: Duration;
    level: KnowledgeLevel;
}

export interface QuizRequest {
    kind: "quiz";
    course: string;
    topicLabel: string;
    subtopicLabel: string;
    description: string;
}

export interface ResourceRequest {
    kind: "resources";
    course: string;
    description: string;
    time: string;
}

export type GenerationRequest = RoadmapRequest | QuizRequest | ResourceRequest;

// ---- field schemas -------------------------------------------

// Values are checked, never rewritten: "Python " and "python" stay distinct.
const RequiredText = z
    .string()
    .max(500)
    .refine((value) => value.trim().length > 0, "must not be empty");

const DURATION_PATTERN = /^\s*(\d+)\s+(Weeks|Months)\s*$/;

const DurationText = z
    .string()
    .regex(DURATION_PATTERN, 'must look like "4 Weeks" or "3 Months"')
    .transform((value, ctx): Duration => {
        const match = DURATION_PATTERN.exec(value);
        const amount = match ? Number(match[1]) : 0;
        const unit: DurationUnit = match?.[2] === "Months" ? "Months" : "Weeks";
        if (!Number.isSafeInteger(amount) || amount < 1) {
            ctx.addIssue({
                code: "custom",
                message: "duration must be a positive number",
            });
            return z.NEVER;
        }
        return { amount, unit };
    });

const LEVEL_BY_LABEL = new Map<string, KnowledgeLevel>(
    KNOWLEDGE_LEVELS.map((level) => [KNOWLEDGE_LEVEL_LABELS[level], level])
);

const KnowledgeLevelText = z
    .string()
    .transform((value, ctx): KnowledgeLevel => {
        const level = LEVEL_BY_LABEL.get(value) ?? LEVEL_BY_LABEL.get(value.trim());
        if (!level) {
            ctx.addIssue({
                code: "custom",
                message: `must be one of: ${Object.values(KNOWLEDGE_LEVEL_LABELS).join(", ")}`,
            });
            return z.NEVER;
        }
        return level;
    });

// ---- request bodies ------------------------------------------

export const RoadmapCreateBodySchema = z.object({
    topic: RequiredText,
    time: DurationText,
    knowledge_level: KnowledgeLevelText,
});

export const QuizBodySchema = z.object({
    course: RequiredText,
    topic: RequiredText,
    subtopic: RequiredText,
    description: RequiredText,
});

export const ResourceBodySchema = z.object({
    course: RequiredText,
    description: RequiredText,
    time: RequiredText,
});

export function toRoadmapRequest(
    body: z.infer<typeof RoadmapCreateBodySchema>
): RoadmapRequest {
    return {
        kind: "roadmap",
        topic: body.topic,
        duration: body.time,
        level: body.knowledge_level,
    };
}

export function toQuizRequest(body: z.infer<typeof QuizBodySchema>): QuizRequest {
    return {
        kind: "quiz",
        course: body.course,
        topicLabel: body.topic,
        subtopicLabel: body.subtopic,
        description: body.description,
    };
}

export function toResourceRequest(
    body: z.infer<typeof ResourceBodySchema>
): ResourceRequest {
    return {
        kind: "resources",
        course: body.course,
        description: body.description,
        time: body.time,
    };
}

export function formatDuration(duration: Duration): string {
    return `${duration.amount} ${duration.unit}`;
}
