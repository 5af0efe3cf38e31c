import { describe, expect, it } from "vitest";
import { normalizeQuiz, normalizeResource, normalizeRoadmap } from "./normalize";

function subtopics(n: number) {
    return Array.from({ length: n }, (_, i) => ({
        subtopic: `S${i + 1}`,
        description: `Describe ${i + 1}`,
        time: "1 hour",
    }));
}

function errorMessage<T>(result: { ok: true; value: T } | { ok: false; error: Error }) {
    return result.ok ? null : result.error.message;
}

describe("normalizeRoadmap", () => {
    it("re-keys weeks as \"Week N\"", () => {
        const result = normalizeRoadmap(
            JSON.stringify({
                weeks: [
                    { week: 1, topic: "Syntax", subtopics: subtopics(3) },
                    { week: 2, topic: "Types", subtopics: subtopics(4) },
                ],
            })
        );
        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(Object.keys(result.value)).toEqual(["Week 1", "Week 2"]);
            expect(result.value["Week 2"].topic).toBe("Types");
            expect(result.value["Week 2"].subtopics).toHaveLength(4);
        }
    });

    it("orders weeks by number regardless of array order", () => {
        const result = normalizeRoadmap(
            JSON.stringify({
                weeks: [
                    { week: 2, topic: "Second", subtopics: subtopics(1) },
                    { week: 1, topic: "First", subtopics: subtopics(1) },
                ],
            })
        );
        expect(result.ok && Object.entries(result.value).map(([k, v]) => `${k}:${v.topic}`)).toEqual([
            "Week 1:First",
            "Week 2:Second",
        ]);
    });

    it("rejects gaps and duplicates", () => {
        const gap = normalizeRoadmap(
            JSON.stringify({
                weeks: [
                    { week: 1, topic: "A", subtopics: subtopics(1) },
                    { week: 3, topic: "C", subtopics: subtopics(1) },
                ],
            })
        );
        expect(errorMessage(gap)).toBe("roadmap weeks are invalid: expected week 2, found week 3");

        const duplicate = normalizeRoadmap(
            JSON.stringify({
                weeks: [
                    { week: 1, topic: "A", subtopics: subtopics(1) },
                    { week: 1, topic: "B", subtopics: subtopics(1) },
                ],
            })
        );
        expect(errorMessage(duplicate)).toBe(
            "roadmap weeks are invalid: expected week 2, found week 1"
        );
    });

    it("rejects text that is not JSON", () => {
        const result = normalizeRoadmap("Here is your roadmap!");
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe("malformed_output");
            expect(result.error.message).toBe("model output is not valid JSON");
        }
    });

    it("rejects the wrong shape", () => {
        expect(errorMessage(normalizeRoadmap('{"weeks":[]}'))).toMatch(
            /^roadmap has the wrong shape: /
        );
        expect(
            errorMessage(
                normalizeRoadmap(JSON.stringify({ weeks: [{ week: 1, topic: "A", subtopics: [] }] }))
            )
        ).toMatch(/^roadmap has the wrong shape: /);
        expect(errorMessage(normalizeRoadmap('{"Week 1":{}}'))).toMatch(
            /^roadmap has the wrong shape: /
        );
    });
});

describe("normalizeQuiz", () => {
    it("maps the answer to the index of the matching option", () => {
        const result = normalizeQuiz(
            JSON.stringify({
                questions: [{ question: "Q?", options: ["A", "B", "C", "D"], answer: "B" }],
            })
        );
        expect(result).toEqual({
            ok: true,
            value: {
                questions: [{ id: 0, question: "Q?", options: ["A", "B", "C", "D"], correctIndex: 1 }],
            },
        });
    });

    it("accepts a bare array and keeps provided ids", () => {
        const result = normalizeQuiz(
            JSON.stringify([
                { id: "q-a", question: "One?", options: ["1", "2", "3", "4"], answer: "4" },
                { id: "q-b", question: "Two?", options: ["1", "2", "3", "4"], answer: "1" },
            ])
        );
        expect(result.ok && result.value.questions.map((q) => [q.id, q.correctIndex])).toEqual([
            ["q-a", 3],
            ["q-b", 0],
        ]);
    });

    it("accepts a single question object", () => {
        const result = normalizeQuiz(
            JSON.stringify({ question: "Only?", options: ["w", "x", "y", "z"], answer: "y" })
        );
        expect(result.ok && result.value.questions).toEqual([
            { id: 0, question: "Only?", options: ["w", "x", "y", "z"], correctIndex: 2 },
        ]);
    });

    it("rejects a truncated JSON object", () => {
        const result = normalizeQuiz("{not json");
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe("malformed_output");
            expect(result.error.message).toBe("model output is not valid JSON");
        }
    });

    it("fails when the answer matches no option", () => {
        const result = normalizeQuiz(
            JSON.stringify({
                questions: [{ question: "Q?", options: ["A", "B", "C", "D"], answer: "E" }],
            })
        );
        expect(errorMessage(result)).toBe("question 1: answer does not match any option");
    });

    it("compares answers exactly", () => {
        const result = normalizeQuiz(
            JSON.stringify({
                questions: [{ question: "Q?", options: ["A", "B", "C", "D"], answer: "b" }],
            })
        );
        expect(errorMessage(result)).toBe("question 1: answer does not match any option");
    });

    it("fails when the answer matches several options", () => {
        const result = normalizeQuiz(
            JSON.stringify({
                questions: [
                    { question: "Ok?", options: ["A", "B", "C", "D"], answer: "A" },
                    { question: "Q?", options: ["A", "B", "B", "D"], answer: "B" },
                ],
            })
        );
        expect(errorMessage(result)).toBe("question 2: answer matches more than one option");
    });

    it("requires exactly four options", () => {
        const result = normalizeQuiz(
            JSON.stringify({ questions: [{ question: "Q?", options: ["A", "B", "C"], answer: "A" }] })
        );
        expect(errorMessage(result)).toMatch(/^quiz has the wrong shape: /);
    });

    it("rejects duplicate ids", () => {
        const result = normalizeQuiz(
            JSON.stringify([
                { id: 1, question: "One?", options: ["1", "2", "3", "4"], answer: "1" },
                { question: "Two?", options: ["1", "2", "3", "4"], answer: "2" },
            ])
        );
        expect(errorMessage(result)).toBe('question 2: duplicate id "1"');
    });
});

describe("normalizeResource", () => {
    it("passes Markdown through", () => {
        expect(normalizeResource("## Concept\nText")).toEqual({ ok: true, value: "## Concept\nText" });
    });

    it("rejects empty text", () => {
        expect(errorMessage(normalizeResource(""))).toBe("resource text is empty");
    });
});
