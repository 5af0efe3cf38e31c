// ============================================================
// Fallback content — returned whenever generation fails.
// Same invariants as generated content; callers get copies.
// ============================================================

import type { QuizStructure } from "@/lib/schemas/quiz";
import type { RoadmapStructure } from "@/lib/roadmap/weeks";
import type { ResourceBundle } from "./normalize";

const FALLBACK_ROADMAP: RoadmapStructure = {
    "Week 1": {
        topic: "Introduction",
        subtopics: [
            {
                subtopic: "Basics",
                description: "Learn the fundamentals",
                time: "2 hours",
            },
        ],
    },
};

const FALLBACK_QUIZ: QuizStructure = {
    questions: [
        {
            id: 0,
            question: "Which study habit helps you remember new material the longest?",
            options: [
                "Reading the notes once",
                "Practising recall over several days",
                "Highlighting every line",
                "Studying only the night before",
            ],
            correctIndex: 1,
        },
        {
            id: 1,
            question: "What is a good first step when starting a new topic?",
            options: [
                "Jump straight to advanced problems",
                "Skip the basics",
                "Get an overview of the core concepts",
                "Memorise definitions without examples",
            ],
            correctIndex: 2,
        },
        {
            id: 2,
            question: "How do you best check that you understood a concept?",
            options: [
                "Explain it in your own words",
                "Re-read the same paragraph",
                "Copy the textbook definition",
                "Move on to the next chapter",
            ],
            correctIndex: 0,
        },
    ],
};

const FALLBACK_RESOURCES: ResourceBundle = [
    "## Concept explanation",
    "Start with an overview of the subtopic and the problems it solves, then work through one small example step by step.",
    "",
    "## What to search for",
    "- \"<subtopic> introduction\"",
    "- \"<subtopic> tutorial for beginners\"",
    "- \"<subtopic> explained with examples\" (video)",
    "",
    "## Practice platforms",
    "- Official documentation and its exercises",
    "- freeCodeCamp, Exercism or Khan Academy, depending on the subject",
    "",
    "## Mini project",
    "Build something small that uses the concept end to end, then write a short note on what you would improve.",
].join("\n");

export function fallbackRoadmap(): RoadmapStructure {
    return structuredClone(FALLBACK_ROADMAP);
}

export function fallbackQuiz(): QuizStructure {
    return structuredClone(FALLBACK_QUIZ);
}

export function fallbackResources(): ResourceBundle {
    return FALLBACK_RESOURCES;
}
