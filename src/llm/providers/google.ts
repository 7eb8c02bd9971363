import type { Logger } from "pino";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { embedMany, generateObject } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import { ConfigError } from "../../errors";
import type { EmbedOptions, GenerateAnswerOptions, GeneratedAnswer, Prompt } from "../types";
import { answerSchema } from "../prompt";
import { resolveBaseUrl, mergeLimits } from "../../utils/providerUtils";

const GEMINI_DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/";

export class GoogleEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("Google Generative AI API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 16,
                    concurrency: 3,
                    maxRequestsPerMinute: 300,
                    maxTokensPerMinute: 1_000_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GEMINI_DEFAULT_BASE_URL),
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

export class GoogleChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("Google Generative AI API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 3,
                    maxRequestsPerMinute: 300,
                    maxTokensPerMinute: 1_000_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GEMINI_DEFAULT_BASE_URL),
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
