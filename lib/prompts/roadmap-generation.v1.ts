// ============================================================
// Prompt: Roadmap Generation v1
// Week-by-week plan for a topic. The model must answer with JSON
// matching RoadmapOutputSchema.
// ============================================================

import {
    KNOWLEDGE_LEVEL_LABELS,
    formatDuration,
    type RoadmapRequest,
} from "@/lib/schemas/requests";

export const PROMPT_VERSION = "roadmap-generation.v1";

export function buildRoadmapPrompt(request: RoadmapRequest): string {
    return [
        `You are an expert curriculum designer.`,
        `Create a week-by-week learning roadmap for the topic "${request.topic}".`,
        ``,
        `Learner:`,
        `- Knowledge level: ${KNOWLEDGE_LEVEL_LABELS[request.level]}`,
        `- Time available: ${formatDuration(request.duration)}`,
        ``,
        `Respond ONLY with valid JSON matching this exact schema:`,
        `{`,
        `  "weeks": [`,
        `    {`,
        `      "week": <week number, starting at 1>,`,
        `      "topic": "<main topic of the week>",`,
        `      "subtopics": [`,
        `        {`,
        `          "subtopic": "<name>",`,
        `          "description": "<what to learn>",`,
        `          "time": "<estimated time, e.g. 3 hours>"`,
        `        }`,
        `      ]`,
        `    }`,
        `  ]`,
        `}`,
        ``,
        `Rules:`,
        `- Create at least 4 weeks, numbered 1, 2, 3, ... without gaps.`,
        `- Each week must have between 3 and 5 subtopics.`,
        `- Fit the plan to the time available and start at the learner's level.`,
        `- Do NOT include markdown code fences or any text outside the JSON.`,
    ].join("\n");
}
