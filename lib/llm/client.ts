// ============================================================
// LLMClient.complete() — one prompt in, trimmed completion out
//
// Flow: build single user message → attempt (bounded by timeout)
//       → optional retries with exponential backoff.
// Default is a single attempt (maxRetries = 0).
// Every failure comes back as UpstreamUnavailableError.
// ============================================================

import { err, ok, type Result } from "@/lib/generation/result";
import { UpstreamUnavailableError } from "@/lib/generation/errors";
import { createOpenAITransport } from "./providers";
import type { ChatTransport, LLMConfig, RawLLMResponse } from "./types";

// ---- helpers -------------------------------------------------

function sleep(ms: number) {
    return new Promise((r) => setTimeout(r, ms));
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

class TimeoutError extends Error {
    constructor(ms: number) {
        super(`LLM request timed out after ${ms}ms`);
        this.name = "TimeoutError";
    }
}

function rejectOnAbort(signal: AbortSignal, ms: number): Promise<never> {
    return new Promise((_, reject) => {
        signal.addEventListener("abort", () => reject(new TimeoutError(ms)), {
            once: true,
        });
    });
}

// ---- client --------------------------------------------------

export class LLMClient {
    private readonly transport: ChatTransport;

    constructor(
        private readonly config: LLMConfig,
        transport?: ChatTransport
    ) {
        this.transport = transport ?? createOpenAITransport(config);
    }

    async complete(prompt: string): Promise<Result<string, UpstreamUnavailableError>> {
        const attempts = this.config.maxRetries + 1;
        let lastError: unknown = null;

        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                const raw = await this.attempt(prompt);
                return ok(raw.content.trim());
            } catch (error) {
                lastError = error;
                console.error(
                    `[LLM] ${this.config.provider}/${this.config.model} attempt ${attempt}/${attempts}:`,
                    describe(error)
                );
                if (attempt < attempts) {
                    await sleep(Math.pow(2, attempt) * this.config.retryBaseDelayMs);
                }
            }
        }

        return err(
            new UpstreamUnavailableError(
                `LLM provider "${this.config.provider}" failed after ${attempts} attempt(s): ${describe(lastError)}`,
                { cause: lastError }
            )
        );
    }

    private async attempt(prompt: string): Promise<RawLLMResponse> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
        try {
            return await Promise.race([
                this.transport.send(
                    {
                        model: this.config.model,
                        messages: [{ role: "user", content: prompt }],
                        temperature: this.config.temperature,
                        maxTokens: this.config.maxTokens,
                    },
                    controller.signal
                ),
                rejectOnAbort(controller.signal, this.config.timeoutMs),
            ]);
        } finally {
            clearTimeout(timer);
        }
    }
}
