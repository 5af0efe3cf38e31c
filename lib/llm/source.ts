// ============================================================
// createCompletionSource() — the model behind the generation
// endpoints, built once from the environment.
//
// An invalid LLM configuration does not fail the process or the
// routes that never call the model: every complete() reports it
// as UpstreamUnavailableError and the caller serves its fallback.
// ============================================================

import { UpstreamUnavailableError } from "@/lib/generation/errors";
import { err } from "@/lib/generation/result";
import { LLMClient } from "./client";
import { loadLLMConfig } from "./config";
import type { ChatTransport, CompletionSource } from "./types";

type Env = Record<string, string | undefined>;

class UnconfiguredCompletionSource implements CompletionSource {
    constructor(private readonly reason: Error) {}

    async complete() {
        return err(
            new UpstreamUnavailableError(`LLM is not configured: ${this.reason.message}`, {
                cause: this.reason,
            })
        );
    }
}

export function createCompletionSource(env: Env, transport?: ChatTransport): CompletionSource {
    try {
        return new LLMClient(loadLLMConfig(env), transport);
    } catch (error) {
        const reason = error instanceof Error ? error : new Error(String(error));
        console.error("[LLM] invalid configuration:", reason.message);
        return new UnconfiguredCompletionSource(reason);
    }
}
