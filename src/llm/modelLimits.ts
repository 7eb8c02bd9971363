import type { ChatModelConfig, ContextUnit } from "../config/types";

const DEFAULT_CHAT_CONTEXT_WINDOW = 8_192;
const DEFAULT_OUTPUT_RESERVE = 1_500;
/** Room kept for the system preamble and the question around the context block. */
const PROMPT_OVERHEAD_TOKENS = 1_000;
const APPROX_CHARACTERS_PER_TOKEN = 4;

const CHAT_MODEL_CONTEXT_WINDOWS: Record<string, number> = {
    "gpt-4o": 128_000,
    "gpt-4o-mini": 128_000,
    "gpt-4.1": 1_047_576,
    "gpt-4.1-mini": 1_047_576,
    "gpt-4-turbo": 128_000,
    "gpt-4": 8_192,
    "gpt-3.5-turbo": 16_385,
    "gemini-1.5-pro": 2_097_152,
    "gemini-1.5-flash": 1_048_576,
    "gemini-2.0-flash": 1_048_576,
    "gemini-2.5-flash": 1_048_576,
    "gemini-2.5-pro": 1_048_576,
    "claude-3-5-sonnet": 200_000,
    "claude-3-5-haiku": 200_000,
    "claude-3-7-sonnet": 200_000,
    "claude-sonnet-4": 200_000,
    "claude-opus-4": 200_000,
};

function normalizeModelName(name?: string): string | undefined {
    const normalized = name?.trim().toLowerCase();
    return normalized && normalized.length > 0 ? normalized : undefined;
}

export function resolveChatContextWindow(model: string): number {
    const normalizedModel = normalizeModelName(model);
    if (!normalizedModel) {
        return DEFAULT_CHAT_CONTEXT_WINDOW;
    }

    if (CHAT_MODEL_CONTEXT_WINDOWS[normalizedModel]) {
        return CHAT_MODEL_CONTEXT_WINDOWS[normalizedModel];
    }

    // longest prefix wins so "gpt-4o-mini-2024-07-18" maps to gpt-4o-mini, not gpt-4
    const matched = Object.entries(CHAT_MODEL_CONTEXT_WINDOWS)
        .filter(([key]) => normalizedModel.startsWith(key))
        .sort((a, b) => b[0].length - a[0].length)[0];

    return matched ? matched[1] : DEFAULT_CHAT_CONTEXT_WINDOW;
}

/**
 * Largest context budget, in `unit`, the chat model can take next to the preamble,
 * the question and its own answer. Character budgets are approximated from tokens.
 */
export function resolveMaxContextLimit(config: ChatModelConfig, unit: ContextUnit): number {
    const reserve = (config.maxOutputTokens ?? DEFAULT_OUTPUT_RESERVE) + PROMPT_OVERHEAD_TOKENS;
    const tokens = Math.max(0, resolveChatContextWindow(config.model) - reserve);
    return unit === "tokens" ? tokens : tokens * APPROX_CHARACTERS_PER_TOKEN;
}

export function clampMaxContextSize(requested: number, config: ChatModelConfig, unit: ContextUnit): number {
    return Math.min(requested, resolveMaxContextLimit(config, unit));
}
