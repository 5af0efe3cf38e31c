// ============================================================
// LLM Provider Client — OpenAI-compatible chat completions
// Groq, OpenAI and OpenRouter all speak the same API; only the
// base URL, default model and headers differ.
// ============================================================

import OpenAI from "openai";
import type { ChatRequest, ChatTransport, LLMConfig, LLMProvider, RawLLMResponse } from "./types";

interface ProviderPreset {
    baseURL: string;
    defaultModel: string;
    defaultHeaders?: Record<string, string>;
}

export const PROVIDER_PRESETS: Record<LLMProvider, ProviderPreset> = {
    groq: {
        baseURL: "https://api.groq.com/openai/v1",
        defaultModel: "llama-3.3-70b-versatile",
    },
    openai: {
        baseURL: "https://api.openai.com/v1",
        defaultModel: "gpt-4.1-mini",
    },
    openrouter: {
        baseURL: "https://openrouter.ai/api/v1",
        defaultModel: "google/gemini-2.5-flash",
        defaultHeaders: { "X-Title": "Learning Paths" },
    },
};

export class MissingApiKeyError extends Error {
    constructor(provider: LLMProvider) {
        super(`No API key configured for provider "${provider}" (set LLM_API_KEY)`);
        this.name = "MissingApiKeyError";
    }
}

/**
 * Transport backed by the openai SDK. The SDK client is created on the
 * first send so that a missing key fails the request, not the boot.
 * SDK-level retries are off; LLMClient owns the retry policy.
 */
export function createOpenAITransport(config: LLMConfig): ChatTransport {
    let client: OpenAI | null = null;

    function getClient(): OpenAI {
        if (!client) {
            if (!config.apiKey) {
                throw new MissingApiKeyError(config.provider);
            }
            client = new OpenAI({
                apiKey: config.apiKey,
                baseURL: config.baseURL,
                defaultHeaders: PROVIDER_PRESETS[config.provider].defaultHeaders,
                maxRetries: 0,
                timeout: config.timeoutMs,
            });
        }
        return client;
    }

    return {
        async send(request: ChatRequest, signal: AbortSignal): Promise<RawLLMResponse> {
            const openai = getClient();
            const start = Date.now();

            const completion = await openai.chat.completions.create(
                {
                    model: request.model,
                    messages: request.messages,
                    temperature: request.temperature,
                    max_tokens: request.maxTokens,
                },
                { signal }
            );

            return {
                content: completion.choices[0]?.message?.content ?? "",
                model: request.model,
                provider: config.provider,
                inputTokens: completion.usage?.prompt_tokens ?? 0,
                outputTokens: completion.usage?.completion_tokens ?? 0,
                latencyMs: Date.now() - start,
            };
        },
    };
}
