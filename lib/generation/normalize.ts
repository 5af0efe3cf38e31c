// ============================================================
// Structure normalizers — sanitized model text → output contract.
// Any parse or shape problem is a MalformedGenerationOutputError;
// nothing is patched up here.
// ============================================================

import { z } from "zod/v4";
import { RoadmapOutputSchema } from "@/lib/schemas/roadmap";
import {
    QuizOutputSchema,
    type QuizQuestion,
    type QuizQuestionOutput,
    type QuizStructure,
} from "@/lib/schemas/quiz";
import {
    findWeekSequenceProblem,
    fromWeekEntries,
    type RoadmapStructure,
    type WeekEntry,
} from "@/lib/roadmap/weeks";
import { MalformedGenerationOutputError } from "./errors";
import { err, ok, type Result } from "./result";

export type ResourceBundle = string;

type Normalized<T> = Result<T, MalformedGenerationOutputError>;

function parseJson(text: string): Normalized<unknown> {
    try {
        return ok(JSON.parse(text));
    } catch (error) {
        return err(
            new MalformedGenerationOutputError("model output is not valid JSON", {
                cause: error,
            })
        );
    }
}

function shapeError(what: string, error: z.ZodError): MalformedGenerationOutputError {
    const detail = error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
    return new MalformedGenerationOutputError(`${what} has the wrong shape: ${detail}`, {
        cause: error,
    });
}

// ---- roadmap -------------------------------------------------

export function normalizeRoadmap(sanitized: string): Normalized<RoadmapStructure> {
    const json = parseJson(sanitized);
    if (!json.ok) return json;

    const parsed = RoadmapOutputSchema.safeParse(json.value);
    if (!parsed.success) {
        return err(shapeError("roadmap", parsed.error));
    }

    // Model order is not trusted; sort by the week field.
    const weeks: WeekEntry[] = parsed.data.weeks
        .map((week) => ({
            weekNumber: week.week,
            topic: week.topic,
            subtopics: week.subtopics,
        }))
        .sort((a, b) => a.weekNumber - b.weekNumber);

    const problem = findWeekSequenceProblem(weeks);
    if (problem) {
        return err(new MalformedGenerationOutputError(`roadmap weeks are invalid: ${problem}`));
    }

    return ok(fromWeekEntries(weeks));
}

// ---- quiz ----------------------------------------------------

function questionsOf(
    output: z.infer<typeof QuizOutputSchema>
): QuizQuestionOutput[] {
    if (Array.isArray(output)) return output;
    if ("questions" in output) return output.questions;
    return [output];
}

export function normalizeQuiz(sanitized: string): Normalized<QuizStructure> {
    const json = parseJson(sanitized);
    if (!json.ok) return json;

    const parsed = QuizOutputSchema.safeParse(json.value);
    if (!parsed.success) {
        return err(shapeError("quiz", parsed.error));
    }

    const questions: QuizQuestion[] = [];
    const seenIds = new Set<string>();

    for (const [index, source] of questionsOf(parsed.data).entries()) {
        const matches = source.options.flatMap((option, i) =>
            option === source.answer ? [i] : []
        );
        if (matches.length !== 1) {
            return err(
                new MalformedGenerationOutputError(
                    matches.length === 0
                        ? `question ${index + 1}: answer does not match any option`
                        : `question ${index + 1}: answer matches more than one option`
                )
            );
        }

        const id = source.id ?? index;
        const idKey = `${typeof id}:${id}`;
        if (seenIds.has(idKey)) {
            return err(
                new MalformedGenerationOutputError(`question ${index + 1}: duplicate id "${id}"`)
            );
        }
        seenIds.add(idKey);

        questions.push({
            id,
            question: source.question,
            options: source.options,
            correctIndex: matches[0],
        });
    }

    return ok({ questions });
}

// ---- resources -----------------------------------------------

export function normalizeResource(sanitized: string): Normalized<ResourceBundle> {
    if (sanitized.trim().length === 0) {
        return err(new MalformedGenerationOutputError("resource text is empty"));
    }
    return ok(sanitized);
}
