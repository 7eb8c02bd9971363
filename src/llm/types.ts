import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import type { RetrievalHit } from "../vectorIndex/types";

export interface EmbedOptions {
    signal?: AbortSignal;
}

export interface PromptContextEntry {
    /** 1-based number the model cites the excerpt by. */
    marker: number;
    hit: RetrievalHit;
    label: string;
}

export interface Prompt {
    system: string;
    user: string;
    query: string;
    context: PromptContextEntry[];
    /** Retrieved hits left out because they did not fit the context budget. */
    droppedHits: number;
    noSupportingContext: boolean;
}

export interface GenerateAnswerOptions {
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface GeneratedAnswer {
    answer: string;
    citedMarkers: number[];
}

export interface EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]>;
    embedQuery(query: string, options?: EmbedOptions): Promise<number[]>;
}

export interface ChatProvider {
    readonly config: ChatModelConfig;
    generateAnswer(prompt: Prompt, options?: GenerateAnswerOptions): Promise<GeneratedAnswer>;
}

export interface LLMClientBundle {
    embedding: EmbeddingProvider;
    chat: ChatProvider;
}
