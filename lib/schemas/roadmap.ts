// ============================================================
// Zod schemas for roadmap generation output and stored roadmaps
// ============================================================

import { z } from "zod/v4";

export const SubtopicEntrySchema = z.object({
    subtopic: z.string().min(1),
    description: z.string(),
    time: z.string(),
});

export const WeekBodySchema = z.object({
    topic: z.string().min(1),
    subtopics: z.array(SubtopicEntrySchema).min(1),
});

// What the model is asked to return (see prompts/roadmap-generation.v1).
export const RoadmapWeekOutputSchema = WeekBodySchema.extend({
    week: z.number().int().min(1),
});

export const RoadmapOutputSchema = z.object({
    weeks: z.array(RoadmapWeekOutputSchema).min(1),
});

// Stored and wire shape: { "Week 1": {...}, "Week 2": {...} }
export const RoadmapWeekMapSchema = z.record(
    z.string().regex(/^Week \d+$/),
    WeekBodySchema
);

export type SubtopicEntry = z.infer<typeof SubtopicEntrySchema>;
export type WeekBody = z.infer<typeof WeekBodySchema>;
export type RoadmapOutput = z.infer<typeof RoadmapOutputSchema>;
