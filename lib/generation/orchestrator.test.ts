import { beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { NotFoundError, StorageError } from "@/lib/errors";
import type { RoadmapRequest } from "@/lib/schemas/requests";
import { InMemoryRoadmapStore, RecordingEventSink } from "@/test/helpers/memory-stores";
import { failingLLM, roadmapJson, scriptedLLM } from "@/test/helpers/fake-llm";
import { fallbackQuiz, fallbackResources, fallbackRoadmap } from "./fallbacks";
import { createCompletionSource, type CompletionSource } from "@/lib/llm";
import { GenerationOrchestrator } from "./orchestrator";

function roadmapRequest(topic: string, amount = 4): RoadmapRequest {
    return {
        kind: "roadmap",
        topic,
        duration: { amount, unit: "Weeks" },
        level: "Beginner",
    };
}

function setup(llm: CompletionSource) {
    const roadmaps = new InMemoryRoadmapStore();
    const events = new RecordingEventSink();
    const orchestrator = new GenerationOrchestrator({ llm, roadmaps, events });
    return { roadmaps, events, orchestrator };
}

describe("GenerationOrchestrator", () => {
    let warn: MockInstance<typeof console.warn>;

    beforeEach(() => {
        warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    });

    describe("generateRoadmap", () => {
        it("stores a generated roadmap under the exact topic", async () => {
            const llm = scriptedLLM("```json\n" + roadmapJson(4) + "\n```");
            const { roadmaps, orchestrator } = setup(llm);

            const outcome = await orchestrator.generateRoadmap("user-1", roadmapRequest("Go"));

            expect(outcome.usedFallback).toBe(false);
            expect(Object.keys(outcome.data)).toEqual(["Week 1", "Week 2", "Week 3", "Week 4"]);
            expect(llm.prompts[0]).toContain('for the topic "Go"');

            const stored = await roadmaps.findByTopic("user-1", "Go");
            expect(stored?.time).toBe("4 Weeks");
            expect(stored?.knowledgeLevel).toBe("Beginner");
            expect(stored?.isFallback).toBe(false);
            expect(stored?.roadmap).toEqual(outcome.data);
        });

        it("replaces the roadmap on a second request for the same topic", async () => {
            const { roadmaps, orchestrator } = setup(scriptedLLM(roadmapJson(4), roadmapJson(6)));

            await orchestrator.generateRoadmap("user-1", roadmapRequest("Go"));
            await orchestrator.generateRoadmap("user-1", roadmapRequest("Go", 6));

            expect(roadmaps.rows.size).toBe(1);
            const fetched = await orchestrator.fetchRoadmap("user-1", "Go");
            expect(fetched.ok && Object.keys(fetched.value)).toHaveLength(6);
            expect((await roadmaps.findByTopic("user-1", "Go"))?.time).toBe("6 Weeks");
        });

        it("treats topics that differ in case as different roadmaps", async () => {
            const { roadmaps, orchestrator } = setup(scriptedLLM(roadmapJson(4), roadmapJson(5)));

            await orchestrator.generateRoadmap("user-1", roadmapRequest("Rust"));
            await orchestrator.generateRoadmap("user-1", roadmapRequest("rust"));

            expect(roadmaps.rows.size).toBe(2);
            const upper = await orchestrator.fetchRoadmap("user-1", "Rust");
            const lower = await orchestrator.fetchRoadmap("user-1", "rust");
            expect(upper.ok && Object.keys(upper.value)).toHaveLength(4);
            expect(lower.ok && Object.keys(lower.value)).toHaveLength(5);
        });

        it("keeps users apart", async () => {
            const { orchestrator } = setup(scriptedLLM(roadmapJson(4)));

            await orchestrator.generateRoadmap("user-1", roadmapRequest("Go"));

            const other = await orchestrator.fetchRoadmap("user-2", "Go");
            expect(other.ok).toBe(false);
        });

        it("returns and persists the fallback when the upstream fails", async () => {
            const { roadmaps, events, orchestrator } = setup(failingLLM());

            const outcome = await orchestrator.generateRoadmap("user-1", roadmapRequest("Go"));

            expect(outcome).toEqual({ data: fallbackRoadmap(), usedFallback: true });
            expect(await orchestrator.fetchRoadmap("user-1", "Go")).toEqual({
                ok: true,
                value: fallbackRoadmap(),
            });
            expect((await roadmaps.findByTopic("user-1", "Go"))?.isFallback).toBe(true);
            expect(warn).toHaveBeenCalledWith(
                "[generation] roadmap fallback (upstream unavailable):",
                "connect ECONNREFUSED"
            );
            expect(events.events).toEqual([
                {
                    eventType: "generation_fallback",
                    payload: {
                        contentType: "roadmap",
                        promptVersion: "roadmap-generation.v1",
                        errorKind: "upstream_unavailable",
                    },
                },
            ]);
        });

        it("keeps an earlier generated roadmap when regeneration falls back", async () => {
            const roadmaps = new InMemoryRoadmapStore();
            const first = new GenerationOrchestrator({ llm: scriptedLLM(roadmapJson(4)), roadmaps });
            await first.generateRoadmap("user-1", roadmapRequest("Go"));

            const second = new GenerationOrchestrator({ llm: failingLLM(), roadmaps });
            const outcome = await second.generateRoadmap("user-1", roadmapRequest("Go", 8));

            expect(outcome).toEqual({ data: fallbackRoadmap(), usedFallback: true });
            const fetched = await second.fetchRoadmap("user-1", "Go");
            expect(fetched.ok && Object.keys(fetched.value)).toEqual([
                "Week 1",
                "Week 2",
                "Week 3",
                "Week 4",
            ]);
            const stored = await roadmaps.findByTopic("user-1", "Go");
            expect(stored?.isFallback).toBe(false);
            expect(stored?.time).toBe("4 Weeks");
        });

        it("replaces a stored fallback with the next generated roadmap", async () => {
            const roadmaps = new InMemoryRoadmapStore();
            await new GenerationOrchestrator({ llm: failingLLM(), roadmaps }).generateRoadmap(
                "user-1",
                roadmapRequest("Go")
            );

            await new GenerationOrchestrator({ llm: scriptedLLM(roadmapJson(5)), roadmaps }).generateRoadmap(
                "user-1",
                roadmapRequest("Go")
            );

            const stored = await roadmaps.findByTopic("user-1", "Go");
            expect(stored?.isFallback).toBe(false);
            expect(stored && Object.keys(stored.roadmap)).toHaveLength(5);
        });

        it("serves the fallback when the model is not configured", async () => {
            vi.spyOn(console, "error").mockImplementation(() => {});
            const { orchestrator } = setup(createCompletionSource({ LLM_PROVIDER: "acme" }));

            const outcome = await orchestrator.generateRoadmap("user-1", roadmapRequest("Go"));

            expect(outcome).toEqual({ data: fallbackRoadmap(), usedFallback: true });
            expect(warn).toHaveBeenCalledWith(
                "[generation] roadmap fallback (upstream unavailable):",
                'LLM is not configured: LLM_PROVIDER must be one of groq, openai, openrouter, got "acme"'
            );
        });

        it("falls back on output with a gap in the weeks", async () => {
            const gapped = JSON.stringify({
                weeks: [
                    { week: 1, topic: "A", subtopics: [{ subtopic: "a", description: "", time: "1h" }] },
                    { week: 3, topic: "C", subtopics: [{ subtopic: "c", description: "", time: "1h" }] },
                ],
            });
            const { events, orchestrator } = setup(scriptedLLM(gapped));

            const outcome = await orchestrator.generateRoadmap("user-1", roadmapRequest("Go"));

            expect(outcome.usedFallback).toBe(true);
            expect(events.events[0]?.payload.errorKind).toBe("malformed_output");
        });

        it("propagates storage failures", async () => {
            const { roadmaps, orchestrator } = setup(scriptedLLM(roadmapJson(4)));
            vi.spyOn(roadmaps, "upsert").mockRejectedValue(new StorageError("roadmaps upsert failed"));

            await expect(
                orchestrator.generateRoadmap("user-1", roadmapRequest("Go"))
            ).rejects.toBeInstanceOf(StorageError);
        });
    });

    describe("fetchRoadmap", () => {
        it("returns NotFoundError for an unknown topic", async () => {
            const { orchestrator } = setup(scriptedLLM(roadmapJson(4)));
            await orchestrator.generateRoadmap("user-1", roadmapRequest("Rust"));

            const result = await orchestrator.fetchRoadmap("user-1", "RUST");

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error).toBeInstanceOf(NotFoundError);
                expect(result.error.message).toBe('No roadmap for topic "RUST"');
            }
        });
    });

    describe("generateQuiz", () => {
        const request = {
            kind: "quiz",
            course: "JavaScript",
            topicLabel: "Functions",
            subtopicLabel: "Closures",
            description: "Functions that capture variables",
        } as const;

        it("returns normalized questions", async () => {
            const reply = JSON.stringify({
                questions: [{ question: "Q?", options: ["A", "B", "C", "D"], answer: "B" }],
            });
            const { orchestrator } = setup(scriptedLLM(reply));

            const outcome = await orchestrator.generateQuiz(request);

            expect(outcome).toEqual({
                data: {
                    questions: [
                        { id: 0, question: "Q?", options: ["A", "B", "C", "D"], correctIndex: 1 },
                    ],
                },
                usedFallback: false,
            });
        });

        it("falls back on a truncated JSON reply without throwing", async () => {
            const { events, orchestrator } = setup(scriptedLLM("{not json"));

            const outcome = await orchestrator.generateQuiz(request);

            expect(outcome).toEqual({ data: fallbackQuiz(), usedFallback: true });
            expect(warn).toHaveBeenCalledWith(
                "[generation] quiz fallback (malformed model output):",
                "model output is not valid JSON"
            );
            expect(events.events.map((event) => event.payload.errorKind)).toEqual([
                "malformed_output",
            ]);
        });

        it("falls back when the answer matches no option", async () => {
            const reply = JSON.stringify({
                questions: [{ question: "Q?", options: ["A", "B", "C", "D"], answer: "Z" }],
            });
            const { events, orchestrator } = setup(scriptedLLM(reply));

            const outcome = await orchestrator.generateQuiz(request);

            expect(outcome).toEqual({ data: fallbackQuiz(), usedFallback: true });
            expect(warn).toHaveBeenCalledWith(
                "[generation] quiz fallback (malformed model output):",
                "question 1: answer does not match any option"
            );
            expect(events.events[0]?.payload).toEqual({
                contentType: "quiz",
                promptVersion: "quiz-generation.v1",
                errorKind: "malformed_output",
            });
        });
    });

    describe("generateResources", () => {
        const request = {
            kind: "resources",
            course: "JavaScript",
            description: "Closures",
            time: "2 hours",
        } as const;

        it("returns the model's Markdown", async () => {
            const { orchestrator } = setup(scriptedLLM("## Concept explanation\nA closure..."));

            const outcome = await orchestrator.generateResources(request);

            expect(outcome).toEqual({
                data: "## Concept explanation\nA closure...",
                usedFallback: false,
            });
        });

        it("falls back on an empty reply", async () => {
            const { orchestrator } = setup(scriptedLLM("```\n```"));

            const outcome = await orchestrator.generateResources(request);

            expect(outcome).toEqual({ data: fallbackResources(), usedFallback: true });
        });
    });
});
