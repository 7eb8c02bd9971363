import type { Server } from "node:http";
import express from "express";
import type { Logger } from "pino";
import { loadAppConfig } from "../config/loadConfig";
import type { AppConfig } from "../config/types";
import { IndexNotFoundError } from "../errors";
import { createLLMClient } from "../llm/factory";
import type { LLMClientBundle } from "../llm/types";
import { configureLogger, getLogger } from "../utils/logger";
import { loadVectorIndex } from "../vectorIndex/localIndex";
import { createApiKeyMiddleware } from "./middleware/apiKey";
import { createApiRouter } from "./routers/api";
import { type IndexLoader, type ServerContext, createRouterContext } from "./utils/context";

export interface ServerOptions {
    configPath?: string;
    port?: number;
    /** Prebuilt configuration; skips reading the .env file. */
    config?: AppConfig;
    llm?: LLMClientBundle;
    loadIndex?: IndexLoader;
    logger?: Logger;
}

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    port: number;
    close(): Promise<void>;
}

async function createContext(options: ServerOptions): Promise<{ context: ServerContext; logger: Logger }> {
    let config = options.config;
    let logger = options.logger;
    if (!config) {
        config = await loadAppConfig(options.configPath);
        logger ??= configureLogger(config.logging);
    }
    logger ??= getLogger();
    logger.info("Loaded server configuration.");

    const context: ServerContext = {
        config,
        llm: options.llm ?? createLLMClient(config.llm, logger),
        loadIndex: options.loadIndex ?? loadVectorIndex,
        ingestionBusy: false,
    };

    try {
        context.index = await context.loadIndex(config.ingestion.indexPath);
        logger.info({ indexPath: config.ingestion.indexPath, chunks: context.index.size }, "Loaded vector index.");
        if (context.index.embeddingModel !== config.llm.embedding.model) {
            logger.warn(
                { indexModel: context.index.embeddingModel, configuredModel: config.llm.embedding.model },
                "Vector index was built with a different embedding model than the one configured."
            );
        }
    } catch (error) {
        if (!(error instanceof IndexNotFoundError)) {
            throw error;
        }
        logger.warn({ indexPath: config.ingestion.indexPath }, "No vector index yet; POST /ingest to build one.");
    }

    return { context, logger };
}

export async function createServer(options: ServerOptions = {}): Promise<{ app: ExpressApp; context: ServerContext }> {
    const { context, logger } = await createContext(options);

    const app = express();
    app.use(express.json({ limit: "1mb" }));

    const apiKey = context.config.server.apiKey;
    if (apiKey) {
        app.use(createApiKeyMiddleware(apiKey, { exemptPaths: ["/health"] }));
    } else {
        logger.warn("MANUALQA_SERVER_API_KEY is not set; /ask and /ingest are unauthenticated.");
    }

    app.use(createApiRouter(createRouterContext(context), logger));

    return { app, context };
}

export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
    const { app, context } = await createServer(options);
    const logger = options.logger ?? getLogger();
    const requestedPort = options.port ?? context.config.server.port;

    const server: Server = await new Promise((resolve, reject) => {
        const listener = app
            .listen(requestedPort, () => {
                listener.off("error", reject);
                resolve(listener);
            })
            .on("error", reject);
    });

    const address = server.address();
    const port = typeof address === "object" && address !== null ? address.port : requestedPort;
    logger.info({ port }, "Server listening.");

    return {
        app,
        port,
        close: () =>
            new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    if (error) {
                        reject(error);
                    } else {
                        resolve();
                    }
                });
            }),
    };
}
