import type { Logger } from "pino";
import type { AppConfig } from "../config/types";
import {
    ConfigError,
    EmbeddingError,
    LoadError,
    ManualQaError,
    PersistError,
    errorMessage,
    type PipelineStage,
} from "../errors";
import type { EmbeddingProvider } from "../llm/types";
import { childLogger, getLogger } from "../utils/logger";
import { createVectorIndex } from "../vectorIndex/localIndex";
import type { VectorIndex } from "../vectorIndex/types";
import { chunkDocuments } from "./chunker";
import { loadDocuments } from "./loader";

export interface IngestionPipelineStats {
    documents: number;
    pages: number;
    chunks: number;
    dimensions: number | undefined;
    durationMs: number;
}

export interface IngestionPipelineResult {
    index: VectorIndex;
    indexPath: string;
    stats: IngestionPipelineStats;
}

export interface IngestionPipelineOptions {
    /** Builds the empty index the chunks are upserted into. */
    createIndex?: (embeddingModel: string) => VectorIndex;
    signal?: AbortSignal;
}

const STAGE_ERRORS: Record<PipelineStage, (message: string, cause: unknown) => ManualQaError> = {
    load: (message, cause) => new LoadError(message, cause),
    chunk: (message, cause) => new ConfigError(message, cause),
    embed: (message, cause) => new EmbeddingError(message, cause),
    upsert: (message, cause) => new ConfigError(message, cause),
    persist: (message, cause) => new PersistError(message, cause),
};

async function runStage<T>(stage: PipelineStage, logger: Logger, task: () => T | Promise<T>): Promise<T> {
    logger.info({ stage }, `Ingestion stage "${stage}" started.`);
    try {
        return await task();
    } catch (error) {
        const tagged = error instanceof ManualQaError ? error : STAGE_ERRORS[stage](errorMessage(error), error);
        tagged.stage = stage;
        throw tagged;
    }
}

/**
 * Load → chunk → embed → upsert → persist. The run is all or nothing: any failure
 * aborts it, tagged with the stage that failed, and the index on disk is untouched.
 */
export async function runIngestionPipeline(
    appConfig: Pick<AppConfig, "ingestion">,
    embedding: EmbeddingProvider,
    logger?: Logger,
    options: IngestionPipelineOptions = {}
): Promise<IngestionPipelineResult> {
    const ingestionLogger = childLogger(logger ?? getLogger(), { module: "ingest" });
    const { sourcePath, indexPath, chunkSize, chunkOverlap } = appConfig.ingestion;
    const startedAt = Date.now();

    const documents = await runStage("load", ingestionLogger, () => loadDocuments(sourcePath));
    const pages = documents.reduce((sum, document) => sum + document.units.length, 0);
    ingestionLogger.info({ documents: documents.length, pages }, "Loaded source documents.");

    const chunks = await runStage("chunk", ingestionLogger, () => chunkDocuments(documents, { chunkSize, chunkOverlap }));
    if (chunks.length === 0) {
        ingestionLogger.warn({ sourcePath }, "Source documents contain no text; the index will be empty.");
    }

    const vectors = await runStage("embed", ingestionLogger, () =>
        embedding.embedDocuments(
            chunks.map((chunk) => chunk.text),
            { signal: options.signal }
        )
    );

    const index = await runStage("upsert", ingestionLogger, () => {
        if (vectors.length !== chunks.length) {
            throw new EmbeddingError(`Expected ${chunks.length} embeddings, received ${vectors.length}.`);
        }
        const target = (options.createIndex ?? createVectorIndex)(embedding.config.model);
        chunks.forEach((chunk, position) => target.upsert(chunk.id, vectors[position], chunk));
        return target;
    });

    await runStage("persist", ingestionLogger, () => index.persist(indexPath));

    const stats: IngestionPipelineStats = {
        documents: documents.length,
        pages,
        chunks: chunks.length,
        dimensions: index.dimensions,
        durationMs: Date.now() - startedAt,
    };
    ingestionLogger.info({ ...stats, indexPath }, "Ingestion pipeline completed.");

    return { index, indexPath, stats };
}
