import type { Request, Response } from "express";
import type { Logger } from "pino";
import type { AppConfig } from "../../config/types";
import type { EmbeddingProvider } from "../../llm/types";
import { runIngestionPipeline } from "../../ingest/pipeline";
import type { VectorIndex } from "../../vectorIndex/types";
import { sendError } from "../utils/errorResponse";

export interface IngestRouteContext {
    config: AppConfig;
    embedding: EmbeddingProvider;
    ingestionBusy: boolean;
    setIngestionBusy: (busy: boolean) => void;
    replaceIndex: (index: VectorIndex) => void;
}

/**
 * Rebuilds the index from the configured source. The new index is served only
 * once it has been persisted; until then queries keep using the previous one.
 */
export async function handleIngestRequest(
    _req: Request,
    res: Response,
    context: IngestRouteContext,
    logger: Logger
): Promise<void> {
    if (context.ingestionBusy) {
        res.status(409).json({ status: "error", code: "INGESTION_BUSY", message: "Ingestion already running." });
        return;
    }

    context.setIngestionBusy(true);

    try {
        logger.info({ sourcePath: context.config.ingestion.sourcePath }, "Starting ingestion.");
        const result = await runIngestionPipeline(context.config, context.embedding, logger);
        context.replaceIndex(result.index);

        res.json({
            status: "ok",
            indexPath: result.indexPath,
            stats: result.stats,
        });
    } catch (error) {
        logger.error({ err: error }, "Ingestion failed.");
        sendError(res, error);
    } finally {
        context.setIngestionBusy(false);
    }
}
