// ============================================================
// buildPrompt() — one prompt per GenerationRequest variant
// ============================================================

import type { GenerationRequest } from "@/lib/schemas/requests";
import { buildRoadmapPrompt, PROMPT_VERSION as ROADMAP_PROMPT_VERSION } from "./roadmap-generation.v1";
import { buildQuizPrompt, PROMPT_VERSION as QUIZ_PROMPT_VERSION } from "./quiz-generation.v1";
import { buildResourcePrompt, PROMPT_VERSION as RESOURCE_PROMPT_VERSION } from "./resource-generation.v1";

export function buildPrompt(request: GenerationRequest): string {
    switch (request.kind) {
        case "roadmap":
            return buildRoadmapPrompt(request);
        case "quiz":
            return buildQuizPrompt(request);
        case "resources":
            return buildResourcePrompt(request);
    }
}

export function promptVersionFor(request: GenerationRequest): string {
    switch (request.kind) {
        case "roadmap":
            return ROADMAP_PROMPT_VERSION;
        case "quiz":
            return QUIZ_PROMPT_VERSION;
        case "resources":
            return RESOURCE_PROMPT_VERSION;
    }
}
