// ============================================================
// Prompt: Quiz Generation v1
// Multiple-choice questions for one roadmap subtopic.
// ============================================================

import type { QuizRequest } from "@/lib/schemas/requests";

export const PROMPT_VERSION = "quiz-generation.v1";

export function buildQuizPrompt(request: QuizRequest): string {
    return [
        `You are an expert quiz creator.`,
        `Create a multiple-choice quiz for this part of a course:`,
        `- Course: ${request.course}`,
        `- Topic: ${request.topicLabel}`,
        `- Subtopic: ${request.subtopicLabel}`,
        `- Description: ${request.description}`,
        ``,
        `Respond ONLY with valid JSON matching this exact schema:`,
        `{`,
        `  "questions": [`,
        `    {`,
        `      "question": "<question text>",`,
        `      "options": ["<option 1>", "<option 2>", "<option 3>", "<option 4>"],`,
        `      "answer": "<the correct option, copied exactly>"`,
        `    }`,
        `  ]`,
        `}`,
        ``,
        `Rules:`,
        `- Create exactly 5 questions.`,
        `- Each question must have exactly 4 distinct options.`,
        `- Exactly one option is correct; "answer" must equal that option character for character.`,
        `- Do NOT include markdown code fences or any text outside the JSON.`,
    ].join("\n");
}
