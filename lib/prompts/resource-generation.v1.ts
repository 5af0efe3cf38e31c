// ============================================================
// Prompt: Resource Generation v1
// Markdown study guide for a subtopic. Free text, no JSON.
// ============================================================

import type { ResourceRequest } from "@/lib/schemas/requests";

export const PROMPT_VERSION = "resource-generation.v1";

export function buildResourcePrompt(request: ResourceRequest): string {
    return [
        `You are a helpful tutor preparing study material.`,
        `Course: ${request.course}`,
        `Subtopic: ${request.description}`,
        `Time the learner will spend: ${request.time}`,
        ``,
        `Write the answer in Markdown with these sections:`,
        `1. **Concept explanation**: a clear explanation of the subtopic.`,
        `2. **What to search for**: recommended search queries and video topics.`,
        `3. **Practice platforms**: websites or tools for hands-on practice.`,
        `4. **Mini project**: one small project idea that applies the concept.`,
        ``,
        `Keep it concise enough to cover in the time available.`,
    ].join("\n");
}
