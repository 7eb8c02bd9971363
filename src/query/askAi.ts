import type { Logger } from "pino";
import type { AppConfig } from "../config/types";
import { clampMaxContextSize } from "../llm/modelLimits";
import { assemblePrompt } from "../llm/prompt";
import type { LLMClientBundle, Prompt, PromptContextEntry } from "../llm/types";
import { getLogger } from "../utils/logger";
import { createTextMeasure } from "../utils/tokenEncoder";
import type { VectorIndex } from "../vectorIndex/types";
import { Retriever } from "./retriever";

export interface AskOptions {
    question: string;
    topK?: number;
    maxContextSize?: number;
    signal?: AbortSignal;
}

export interface Citation {
    marker: number;
    chunkId: string;
    documentId: string;
    pages: number[];
    section?: string;
    label: string;
    score: number;
}

export interface Answer {
    answer: string;
    citations: Citation[];
    noSupportingContext: boolean;
}

interface AskContextOptions {
    config: Pick<AppConfig, "retrieval">;
    logger?: Logger;
}

function toCitation({ marker, hit, label }: PromptContextEntry): Citation {
    const citation: Citation = {
        marker,
        chunkId: hit.chunk.id,
        documentId: hit.chunk.documentId,
        pages: hit.chunk.pages,
        label,
        score: hit.score,
    };
    if (hit.chunk.section) {
        citation.section = hit.chunk.section;
    }
    return citation;
}

/**
 * Context entries the model cited, in prompt order. Markers outside the prompt are
 * ignored; when nothing valid was cited every context entry is returned.
 */
export function selectCitations(prompt: Prompt, citedMarkers: number[]): Citation[] {
    const cited = new Set(citedMarkers);
    const matching = prompt.context.filter((entry) => cited.has(entry.marker));
    return (matching.length > 0 ? matching : prompt.context).map(toCitation);
}

export async function askQuestion(
    llm: LLMClientBundle,
    index: VectorIndex,
    options: AskOptions,
    context: AskContextOptions
): Promise<Answer> {
    const activeLogger = context.logger ?? getLogger();
    const { retrieval } = context.config;
    const question = options.question.trim();
    const topK = options.topK ?? retrieval.topK;

    activeLogger.info({ question, topK }, "Retrieving context for question.");
    const retriever = new Retriever(llm.embedding, index, activeLogger);
    const hits = await retriever.retrieve(question, topK, { signal: options.signal });

    const maxContextSize = clampMaxContextSize(
        options.maxContextSize ?? retrieval.maxContextSize,
        llm.chat.config,
        retrieval.contextUnit
    );
    const prompt = assemblePrompt(question, hits, maxContextSize, {
        measure: createTextMeasure(retrieval.contextUnit, llm.chat.config.model),
    });

    if (prompt.noSupportingContext) {
        activeLogger.warn({ hits: hits.length, maxContextSize }, "No supporting context fits the prompt; answering from the question alone.");
    } else {
        activeLogger.info(
            { contextChunks: prompt.context.length, droppedHits: prompt.droppedHits },
            "Generating answer with retrieved context."
        );
    }

    const generated = await llm.chat.generateAnswer(prompt, { signal: options.signal });

    return {
        answer: generated.answer,
        citations: selectCitations(prompt, generated.citedMarkers),
        noSupportingContext: prompt.noSupportingContext,
    };
}
