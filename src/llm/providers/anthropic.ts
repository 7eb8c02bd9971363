import type { Logger } from "pino";
import { createAnthropic } from "@ai-sdk/anthropic";
import { generateObject } from "ai";
import { BaseChatProvider } from "../base";
import type { ChatModelConfig } from "../../config/types";
import { ConfigError } from "../../errors";
import type { GenerateAnswerOptions, GeneratedAnswer, Prompt } from "../types";
import { answerSchema } from "../prompt";
import { resolveBaseUrl, mergeLimits } from "../../utils/providerUtils";

const ANTHROPIC_DEFAULT_BASE_URL = "https://api.anthropic.com/v1/";

// Anthropic has no embedding models; pair it with another embedding provider.
export class AnthropicChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createAnthropic>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("Anthropic API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 4,
                    maxRequestsPerMinute: 200,
                    maxTokensPerMinute: 200_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createAnthropic({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, ANTHROPIC_DEFAULT_BASE_URL),
        });
    }

    protected async complete(prompt: Prompt, options: GenerateAnswerOptions): Promise<GeneratedAnswer> {
        const { object } = await generateObject({
            model: this.sdk(this.config.model),
            system: prompt.system,
            prompt: prompt.user,
            schema: answerSchema,
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxOutputTokens ?? 1_024,
            abortSignal: options.signal,
            maxRetries: 0,
        });

        return { answer: object.answer, citedMarkers: object.citations };
    }
}
