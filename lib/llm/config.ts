// ============================================================
// LLM configuration — read once from the environment and passed
// explicitly to the client.
// ============================================================

import { z } from "zod/v4";
import { LLM_PROVIDERS, type LLMConfig, type LLMProvider } from "./types";
import { PROVIDER_PRESETS } from "./providers";

export class LLMConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "LLMConfigError";
    }
}

type Env = Record<string, string | undefined>;

const PROVIDER_KEY_VARS: Record<LLMProvider, string> = {
    groq: "GROQ_API_KEY",
    openai: "OPENAI_API_KEY",
    openrouter: "OPENROUTER_API_KEY",
};

const NumericSettingsSchema = z.object({
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(0),
    LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
});

function readEnv(env: Env, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

function isProvider(value: string): value is LLMProvider {
    return LLM_PROVIDERS.some((provider) => provider === value);
}

export function loadLLMConfig(env: Env = process.env): LLMConfig {
    const providerName = readEnv(env, "LLM_PROVIDER") ?? "groq";
    if (!isProvider(providerName)) {
        throw new LLMConfigError(
            `LLM_PROVIDER must be one of ${LLM_PROVIDERS.join(", ")}, got "${providerName}"`
        );
    }
    const preset = PROVIDER_PRESETS[providerName];

    const numeric = NumericSettingsSchema.safeParse({
        LLM_TIMEOUT_MS: readEnv(env, "LLM_TIMEOUT_MS"),
        LLM_MAX_RETRIES: readEnv(env, "LLM_MAX_RETRIES"),
        LLM_RETRY_BASE_DELAY_MS: readEnv(env, "LLM_RETRY_BASE_DELAY_MS"),
        LLM_TEMPERATURE: readEnv(env, "LLM_TEMPERATURE"),
        LLM_MAX_TOKENS: readEnv(env, "LLM_MAX_TOKENS"),
    });
    if (!numeric.success) {
        const detail = numeric.error.issues
            .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
            .join("; ");
        throw new LLMConfigError(`Invalid LLM settings: ${detail}`);
    }

    const baseURL = readEnv(env, "LLM_BASE_URL") ?? preset.baseURL;
    if (!z.url().safeParse(baseURL).success) {
        throw new LLMConfigError(`LLM_BASE_URL is not a valid URL: "${baseURL}"`);
    }

    return {
        provider: providerName,
        model: readEnv(env, "LLM_MODEL") ?? preset.defaultModel,
        baseURL,
        apiKey:
            readEnv(env, "LLM_API_KEY") ??
            readEnv(env, PROVIDER_KEY_VARS[providerName]) ??
            null,
        temperature: numeric.data.LLM_TEMPERATURE,
        maxTokens: numeric.data.LLM_MAX_TOKENS,
        timeoutMs: numeric.data.LLM_TIMEOUT_MS,
        maxRetries: numeric.data.LLM_MAX_RETRIES,
        retryBaseDelayMs: numeric.data.LLM_RETRY_BASE_DELAY_MS,
    };
}
