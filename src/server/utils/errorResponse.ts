import type { Response } from "express";
import {
    ConfigError,
    EmbeddingError,
    GenerationError,
    IndexNotFoundError,
    ManualQaError,
    describeError,
} from "../../errors";

export function errorStatus(error: unknown): number {
    if (error instanceof ConfigError) return 400;
    if (error instanceof IndexNotFoundError) return 503;
    if (error instanceof EmbeddingError || error instanceof GenerationError) return 502;
    return 500;
}

export function sendError(res: Response, error: unknown): void {
    res.status(errorStatus(error)).json({
        status: "error",
        code: error instanceof ManualQaError ? error.code : "INTERNAL_ERROR",
        message: describeError(error),
    });
}
