// ============================================================
// Generation failures. Both variants are recovered by the
// orchestrator through fallback substitution.
// ============================================================

export class UpstreamUnavailableError extends Error {
    readonly kind = "upstream_unavailable" as const;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "UpstreamUnavailableError";
    }
}

export class MalformedGenerationOutputError extends Error {
    readonly kind = "malformed_output" as const;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "MalformedGenerationOutputError";
    }
}

export type GenerationError =
    | UpstreamUnavailableError
    | MalformedGenerationOutputError;
