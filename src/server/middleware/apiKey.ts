import { timingSafeEqual } from "node:crypto";
import type { Request, Response, NextFunction } from "express";

export interface ApiKeyMiddlewareOptions {
    /** Request paths served without a key. */
    exemptPaths?: string[];
}

function readProvidedKey(req: Request): string | undefined {
    const headerKey = req.get("x-api-key")?.trim();
    if (headerKey) {
        return headerKey;
    }

    const authorization = req.get("authorization")?.trim();
    const match = authorization ? /^bearer\s+(.+)$/i.exec(authorization) : null;
    return match ? match[1].trim() : undefined;
}

function keysMatch(provided: string, expected: string): boolean {
    const providedBuffer = Buffer.from(provided, "utf8");
    const expectedBuffer = Buffer.from(expected, "utf8");
    return providedBuffer.length === expectedBuffer.length && timingSafeEqual(providedBuffer, expectedBuffer);
}

/** Accepts the key from `x-api-key` or an `Authorization: Bearer` header. */
export function createApiKeyMiddleware(expectedKey: string, options: ApiKeyMiddlewareOptions = {}) {
    const exempt = new Set(options.exemptPaths ?? []);

    return (req: Request, res: Response, next: NextFunction): void => {
        if (exempt.has(req.path)) {
            next();
            return;
        }

        const providedKey = readProvidedKey(req);
        if (!providedKey || !keysMatch(providedKey, expectedKey)) {
            res.status(401).json({ status: "error", code: "UNAUTHORIZED", message: "Invalid or missing API key." });
            return;
        }

        next();
    };
}
