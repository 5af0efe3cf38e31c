// ============================================================
// lib/llm barrel export
// ============================================================

export { LLMClient } from "./client";
export { createCompletionSource } from "./source";
export { loadLLMConfig, LLMConfigError } from "./config";
export { createOpenAITransport, PROVIDER_PRESETS, MissingApiKeyError } from "./providers";
export { sanitize } from "./sanitize";
export type {
    ChatRequest,
    ChatTransport,
    CompletionSource,
    LLMConfig,
    LLMMessage,
    LLMProvider,
    RawLLMResponse,
} from "./types";
export { LLM_PROVIDERS } from "./types";
