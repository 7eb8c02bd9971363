import { Router } from "express";
import type { Logger } from "pino";
import { handleAskRequest } from "../routes/ask";
import { handleHealthRequest } from "../routes/health";
import { handleIngestRequest } from "../routes/ingest";
import type { RouterContext } from "../utils/context";

export function createApiRouter(context: RouterContext, logger: Logger): Router {
    const router = Router();

    router.get("/health", (req, res) => {
        handleHealthRequest(req, res, {
            ingestionBusy: context.ingestionBusy,
            index: context.peekIndex(),
        });
    });

    router.post("/ask", async (req, res) => {
        await handleAskRequest(req, res, {
            config: context.config,
            llm: context.llm,
            getIndex: context.getIndex,
        }, logger);
    });

    router.post("/ingest", async (req, res) => {
        await handleIngestRequest(req, res, {
            config: context.config,
            embedding: context.llm.embedding,
            ingestionBusy: context.ingestionBusy,
            setIngestionBusy: context.setIngestionBusy,
            replaceIndex: context.replaceIndex,
        }, logger);
    });

    return router;
}
