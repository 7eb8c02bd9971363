import type { Request, Response } from "express";
import type { VectorIndex } from "../../vectorIndex/types";

export interface HealthRouteContext {
    ingestionBusy: boolean;
    index?: VectorIndex;
}

export function handleHealthRequest(_req: Request, res: Response, context: HealthRouteContext): void {
    res.json({
        status: "ok",
        ingestionBusy: context.ingestionBusy,
        indexedChunks: context.index?.size ?? null,
    });
}
