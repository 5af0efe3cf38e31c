// ============================================================
// LLM Service Layer — Types
// ============================================================

import type { UpstreamUnavailableError } from "@/lib/generation/errors";
import type { Result } from "@/lib/generation/result";

export type LLMProvider = "groq" | "openai" | "openrouter";

export const LLM_PROVIDERS: readonly LLMProvider[] = ["groq", "openai", "openrouter"];

export interface LLMConfig {
    provider: LLMProvider;
    model: string;
    baseURL: string;
    /** null until configured; reported on first use, not at startup. */
    apiKey: string | null;
    temperature: number;
    maxTokens: number;
    /** Bound on each upstream attempt. */
    timeoutMs: number;
    /** 0 means a single attempt. */
    maxRetries: number;
    retryBaseDelayMs: number;
}

export interface LLMMessage {
    role: "system" | "user" | "assistant";
    content: string;
}

export interface ChatRequest {
    model: string;
    messages: LLMMessage[];
    temperature: number;
    maxTokens: number;
}

/** Raw response from a provider call */
export interface RawLLMResponse {
    content: string;
    model: string;
    provider: LLMProvider;
    inputTokens: number;
    outputTokens: number;
    latencyMs: number;
}

/** Sends one chat completion. Throws on any transport or HTTP failure. */
export interface ChatTransport {
    send(request: ChatRequest, signal: AbortSignal): Promise<RawLLMResponse>;
}

/** What the generation pipeline needs from a model: one prompt, one reply. */
export interface CompletionSource {
    complete(prompt: string): Promise<Result<string, UpstreamUnavailableError>>;
}
