import type { Logger } from "pino";
import { createOpenAI } from "@ai-sdk/openai";
import { embedMany, generateObject } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import { ConfigError } from "../../errors";
import type { EmbedOptions, GenerateAnswerOptions, GeneratedAnswer, Prompt } from "../types";
import { answerSchema } from "../prompt";
import { resolveBaseUrl, mergeLimits } from "../../utils/providerUtils";

const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com/v1/";

export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("OpenAI API key is required for embeddings (MANUALQA_LLM_EMBEDDING_API_KEY).");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 100,
                    concurrency: 4,
                    maxRequestsPerMinute: 1_500,
                    maxTokensPerMinute: 1_000_000,
                    retries: 6,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, OPENAI_DEFAULT_BASE_URL),
        });
    }

    protected async sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        const { embeddings } = await embedMany({
            model: this.sdk.textEmbeddingModel(this.config.model),
            values: texts,
            abortSignal: options?.signal,
            maxRetries: 0,
        });

        return embeddings;
    }
}

export class OpenAIChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("OpenAI API key is required for chat completions (MANUALQA_LLM_CHAT_API_KEY).");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 3,
                    maxRequestsPerMinute: 500,
                    maxTokensPerMinute: 90_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, OPENAI_DEFAULT_BASE_URL),
        });
    }

    protected async complete(prompt: Prompt, options: GenerateAnswerOptions): Promise<GeneratedAnswer> {
        const { object } = await generateObject({
            model: this.sdk(this.config.model),
            system: prompt.system,
            prompt: prompt.user,
            schema: answerSchema,
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxOutputTokens,
            abortSignal: options.signal,
            maxRetries: 0,
        });

        return { answer: object.answer, citedMarkers: object.citations };
    }
}
