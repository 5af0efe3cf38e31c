// ============================================================
// GenerationOrchestrator
//
// Per endpoint: buildPrompt → LLMClient.complete → sanitize
//   → normalize → (persist, roadmaps only).
// Generation failures never leave this class: the error variant
// is logged, recorded as an event, and the fallback is returned.
// Storage failures do propagate (StorageError).
// A fallback roadmap is stored only for a topic with no roadmap yet.
// ============================================================

import { buildPrompt, promptVersionFor } from "@/lib/prompts";
import { sanitize } from "@/lib/llm/sanitize";
import type { CompletionSource } from "@/lib/llm/types";
import type { EventSink } from "@/lib/observability/track-event";
import type { RoadmapStore } from "@/lib/roadmap/store";
import type { RoadmapStructure } from "@/lib/roadmap/weeks";
import type { QuizStructure } from "@/lib/schemas/quiz";
import {
    KNOWLEDGE_LEVEL_LABELS,
    formatDuration,
    type GenerationRequest,
    type QuizRequest,
    type ResourceRequest,
    type RoadmapRequest,
} from "@/lib/schemas/requests";
import { NotFoundError } from "@/lib/errors";
import type { GenerationError, MalformedGenerationOutputError } from "./errors";
import { fallbackQuiz, fallbackResources, fallbackRoadmap } from "./fallbacks";
import {
    normalizeQuiz,
    normalizeResource,
    normalizeRoadmap,
    type ResourceBundle,
} from "./normalize";
import { err, ok, type Result } from "./result";

export interface GenerationOutcome<T> {
    data: T;
    usedFallback: boolean;
}

export interface GenerationOrchestratorDeps {
    llm: CompletionSource;
    roadmaps: RoadmapStore;
    events?: EventSink;
}

type Normalizer<T> = (sanitized: string) => Result<T, MalformedGenerationOutputError>;

export class GenerationOrchestrator {
    constructor(private readonly deps: GenerationOrchestratorDeps) {}

    async generateRoadmap(
        userId: string,
        request: RoadmapRequest
    ): Promise<GenerationOutcome<RoadmapStructure>> {
        const outcome = await this.generate(request, normalizeRoadmap, fallbackRoadmap);
        const record = {
            userId,
            topic: request.topic,
            time: formatDuration(request.duration),
            knowledgeLevel: KNOWLEDGE_LEVEL_LABELS[request.level],
            roadmap: outcome.data,
            isFallback: outcome.usedFallback,
        };

        if (outcome.usedFallback) {
            // The stub is stored only when the topic has nothing yet; it
            // never replaces a roadmap the user already has.
            await this.deps.roadmaps.insertIfAbsent(record);
        } else {
            // Last writer wins for the same exact (userId, topic).
            await this.deps.roadmaps.upsert(record);
        }

        return outcome;
    }

    generateQuiz(request: QuizRequest): Promise<GenerationOutcome<QuizStructure>> {
        return this.generate(request, normalizeQuiz, fallbackQuiz);
    }

    generateResources(request: ResourceRequest): Promise<GenerationOutcome<ResourceBundle>> {
        return this.generate(request, normalizeResource, fallbackResources);
    }

    async fetchRoadmap(
        userId: string,
        topic: string
    ): Promise<Result<RoadmapStructure, NotFoundError>> {
        const record = await this.deps.roadmaps.findByTopic(userId, topic);
        if (!record) {
            return err(new NotFoundError(`No roadmap for topic "${topic}"`));
        }
        return ok(record.roadmap);
    }

    // ---- pipeline --------------------------------------------

    private async produce<T>(
        request: GenerationRequest,
        normalize: Normalizer<T>
    ): Promise<Result<T, GenerationError>> {
        const completion = await this.deps.llm.complete(buildPrompt(request));
        if (!completion.ok) {
            return completion;
        }
        return normalize(sanitize(completion.value));
    }

    private async generate<T>(
        request: GenerationRequest,
        normalize: Normalizer<T>,
        fallback: () => T
    ): Promise<GenerationOutcome<T>> {
        const result = await this.produce(request, normalize);
        if (result.ok) {
            return { data: result.value, usedFallback: false };
        }
        await this.reportFallback(request, result.error);
        return { data: fallback(), usedFallback: true };
    }

    private async reportFallback(
        request: GenerationRequest,
        error: GenerationError
    ): Promise<void> {
        let reason: string;
        switch (error.kind) {
            case "upstream_unavailable":
                reason = "upstream unavailable";
                break;
            case "malformed_output":
                reason = "malformed model output";
                break;
            default: {
                const unreachable: never = error;
                reason = String(unreachable);
            }
        }

        console.warn(
            `[generation] ${request.kind} fallback (${reason}):`,
            error.message
        );

        await this.deps.events?.track("generation_fallback", {
            contentType: request.kind,
            promptVersion: promptVersionFor(request),
            errorKind: error.kind,
        });
    }
}
