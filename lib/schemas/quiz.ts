// ============================================================
// Zod schemas for quiz generation output
// ============================================================

import { z } from "zod/v4";

export const QuizQuestionOutputSchema = z.object({
    id: z.union([z.string().min(1), z.number().int().min(0)]).optional(),
    question: z.string().min(1),
    options: z.array(z.string()).length(4),
    answer: z.string(),
});

// The prompt asks for { questions: [...] }; a bare array or a single
// question object is accepted as well.
export const QuizOutputSchema = z.union([
    z.object({ questions: z.array(QuizQuestionOutputSchema).min(1) }),
    z.array(QuizQuestionOutputSchema).min(1),
    QuizQuestionOutputSchema,
]);

export const QuizQuestionSchema = z.object({
    id: z.union([z.string(), z.number()]),
    question: z.string().min(1),
    options: z.array(z.string()).length(4),
    correctIndex: z.number().int().min(0).max(3),
});

export const QuizStructureSchema = z.object({
    questions: z.array(QuizQuestionSchema).min(1),
});

export type QuizQuestionOutput = z.infer<typeof QuizQuestionOutputSchema>;
export type QuizOutput = z.infer<typeof QuizOutputSchema>;
export type QuizQuestion = z.infer<typeof QuizQuestionSchema>;
export type QuizStructure = z.infer<typeof QuizStructureSchema>;
