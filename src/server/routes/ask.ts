import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { AppConfig } from "../../config/types";
import type { LLMClientBundle } from "../../llm/types";
import { askQuestion } from "../../query/askAi";
import type { VectorIndex } from "../../vectorIndex/types";
import { sendError } from "../utils/errorResponse";

export interface AskRouteContext {
    config: AppConfig;
    llm: LLMClientBundle;
    getIndex: () => Promise<VectorIndex>;
}

const askRequestSchema = z.object({
    question: z.string().trim().min(1, "Request body must include a non-empty 'question' field."),
    topK: z.number().int().positive().optional(),
    maxContextSize: z.number().nonnegative().optional(),
});

export async function handleAskRequest(
    req: Request,
    res: Response,
    context: AskRouteContext,
    logger: Logger
): Promise<void> {
    const parsed = askRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        res.status(400).json({
            status: "error",
            code: "CONFIG_ERROR",
            message: issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid request body.",
        });
        return;
    }

    const abortController = new AbortController();
    const closeHandler = (): void => {
        if (!res.writableEnded) {
            abortController.abort();
        }
    };
    res.on("close", closeHandler);

    try {
        const index = await context.getIndex();
        const response = await askQuestion(
            context.llm,
            index,
            { ...parsed.data, signal: abortController.signal },
            { logger, config: context.config }
        );

        res.json({
            status: "ok",
            answer: response.answer,
            citations: response.citations,
            noSupportingContext: response.noSupportingContext,
        });
    } catch (error) {
        if (abortController.signal.aborted) {
            logger.warn("Ask request aborted by client.");
            return;
        }
        logger.error({ err: error }, "Ask endpoint failed.");
        sendError(res, error);
    } finally {
        res.off("close", closeHandler);
    }
}
