import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig, LLMConfig } from "../config/types";
import { ConfigError } from "../errors";
import { childLogger } from "../utils/logger";
import type { ChatProvider, EmbeddingProvider, LLMClientBundle } from "./types";
import { AnthropicChatProvider } from "./providers/anthropic";
import { GoogleChatProvider, GoogleEmbeddingProvider } from "./providers/google";
import { OpenAIChatProvider, OpenAIEmbeddingProvider } from "./providers/openai";

function providerLogger(logger: Logger | undefined, scope: "chat" | "embedding", provider: string): Logger | undefined {
    return logger ? childLogger(logger, { module: "llm", scope, provider }) : undefined;
}

export function createEmbeddingProvider(config: EmbeddingModelConfig, logger?: Logger): EmbeddingProvider {
    const scopedLogger = providerLogger(logger, "embedding", config.provider);

    switch (config.provider) {
        case "openai":
            return new OpenAIEmbeddingProvider(config, scopedLogger);
        case "google":
            return new GoogleEmbeddingProvider(config, scopedLogger);
        default:
            throw new ConfigError(`Embedding provider "${config.provider}" is not supported.`);
    }
}

export function createChatProvider(config: ChatModelConfig, logger?: Logger): ChatProvider {
    const scopedLogger = providerLogger(logger, "chat", config.provider);

    switch (config.provider) {
        case "openai":
            return new OpenAIChatProvider(config, scopedLogger);
        case "google":
            return new GoogleChatProvider(config, scopedLogger);
        case "anthropic":
            return new AnthropicChatProvider(config, scopedLogger);
        default:
            throw new ConfigError(`Chat provider "${config.provider}" is not supported.`);
    }
}

export function createLLMClient(config: LLMConfig, logger?: Logger): LLMClientBundle {
    return {
        embedding: createEmbeddingProvider(config.embedding, logger),
        chat: createChatProvider(config.chat, logger),
    };
}
