// ============================================================
// sanitize() — strip Markdown code fences around model output.
// ============================================================

const LEADING_FENCE = /^```[ \t]*(?:json)?[ \t]*(?:\r?\n)?/i;
const TRAILING_FENCE = /(?:\r?\n)?[ \t]*```$/;

/**
 * Removes a leading ``` / ```json fence and a trailing ``` fence, then
 * trims. Repeats while the text still opens with a fence, so the result
 * is a fixed point: sanitize(sanitize(x)) === sanitize(x).
 */
export function sanitize(raw: string): string {
    let text = raw.trim();
    while (text.startsWith("```")) {
        text = text.replace(LEADING_FENCE, "").replace(TRAILING_FENCE, "").trim();
    }
    return text;
}
