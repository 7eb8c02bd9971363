import type Bottleneck from "bottleneck";
import pLimit from "p-limit";
import pRetry, { type FailedAttemptError } from "p-retry";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { EmbeddingError, GenerationError, ManualQaError, errorMessage } from "../errors";
import { createRateLimiter, createTokenLimiter, reserveWeight } from "../utils/rateLimiter";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import type {
    ChatProvider,
    EmbedOptions,
    EmbeddingProvider,
    GenerateAnswerOptions,
    GeneratedAnswer,
    Prompt,
} from "./types";

export interface ProviderRateLimits {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface ScheduleOptions {
    logPrefix: string;
    signal?: AbortSignal;
}

/**
 * Request and token limiters shared by both provider kinds. Every request first reserves
 * its estimated token weight, then runs under the request limiter with retries.
 */
class RequestScheduler {
    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;

    constructor(
        concurrency: number,
        limits: ProviderRateLimits,
        private readonly retries: number,
        private readonly logger?: Logger
    ) {
        this.requestLimiter = createRateLimiter(concurrency, limits.maxRequestsPerMinute);
        this.tokenLimiter = createTokenLimiter(concurrency, limits.maxTokensPerMinute);
    }

    async schedule<T>(tokens: number, task: () => Promise<T>, { logPrefix, signal }: ScheduleOptions): Promise<T> {
        await reserveWeight(this.tokenLimiter, tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(task, {
                retries: this.retries,
                signal,
                onFailedAttempt: (error: FailedAttemptError) => {
                    this.logger?.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        `${logPrefix} failed attempt`
                    );
                },
            })
        );
    }
}

function toBatches<T>(items: T[], batchSize: number): T[][] {
    const batches: T[][] = [];
    for (let start = 0; start < items.length; start += batchSize) {
        batches.push(items.slice(start, start + batchSize));
    }
    return batches;
}

function wrapError(error: unknown, wrap: (message: string, cause: unknown) => ManualQaError): ManualQaError {
    return error instanceof ManualQaError ? error : wrap(errorMessage(error), error);
}

export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
    protected readonly concurrencyLimit: number;
    protected readonly batchSize: number;
    protected readonly retries: number;

    private readonly scheduler: RequestScheduler;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.batchSize = Math.max(1, limits.batchSize ?? 50);
        this.retries = Math.max(0, limits.retries ?? 5);
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 5);
        this.scheduler = new RequestScheduler(this.concurrencyLimit, limits, this.retries, logger);
    }

    /** Embeds `texts` in batches; the result is index-aligned with the input. */
    async embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const batches = toBatches(texts, this.batchSize).map((batch, idx) => ({
            idx,
            batch,
            tokens: countTokensInBatch(batch, this.config.model),
        }));

        const limit = pLimit(this.concurrencyLimit);
        const logPrefix = `${this.config.provider}:embed`;

        try {
            const results = await Promise.all(
                batches.map(({ batch, idx, tokens }) =>
                    limit(async () => {
                        const embeddings = await this.scheduler.schedule(
                            tokens,
                            () => this.sendEmbeddingRequest(batch, options),
                            { logPrefix, signal: options?.signal }
                        );
                        if (embeddings.length !== batch.length) {
                            throw new EmbeddingError(
                                `${this.config.provider} returned ${embeddings.length} embeddings for ${batch.length} inputs.`
                            );
                        }
                        return { idx, embeddings };
                    })
                )
            );

            const ordered = results.sort((a, b) => a.idx - b.idx);
            return ordered.flatMap((entry) => entry.embeddings);
        } catch (error) {
            throw wrapError(error, (message, cause) =>
                new EmbeddingError(`${this.config.provider} embedding request failed: ${message}`, cause)
            );
        }
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedDocuments([query], options);
        if (!embedding || embedding.length === 0) {
            throw new EmbeddingError(`${this.config.provider} returned an empty query embedding.`);
        }
        return embedding;
    }

    protected abstract sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

export abstract class BaseChatProvider implements ChatProvider {
    protected readonly concurrencyLimit: number;
    protected readonly retries: number;

    private readonly scheduler: RequestScheduler;

    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.retries = Math.max(0, limits.retries ?? 5);
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 5);
        this.scheduler = new RequestScheduler(this.concurrencyLimit, limits, this.retries, logger);
    }

    async generateAnswer(prompt: Prompt, options: GenerateAnswerOptions = {}): Promise<GeneratedAnswer> {
        const tokens = this.estimateChatTokens(prompt, options);

        let generated: GeneratedAnswer;
        try {
            generated = await this.scheduler.schedule(tokens, () => this.complete(prompt, options), {
                logPrefix: `${this.config.provider}:chat`,
                signal: options.signal,
            });
        } catch (error) {
            throw wrapError(error, (message, cause) =>
                new GenerationError(`${this.config.provider} chat completion failed: ${message}`, cause)
            );
        }

        const answer = generated.answer.trim();
        if (!answer) {
            throw new GenerationError(`${this.config.provider} returned an empty answer.`);
        }

        return { answer, citedMarkers: generated.citedMarkers };
    }

    protected estimateChatTokens(prompt: Prompt, options: GenerateAnswerOptions): number {
        const model = this.config.model;
        const promptTokens = countTokens(prompt.system, model) + countTokens(prompt.user, model);
        return promptTokens + (options.maxTokens ?? this.config.maxOutputTokens ?? 2000);
    }

    protected abstract complete(prompt: Prompt, options: GenerateAnswerOptions): Promise<GeneratedAnswer>;
}
