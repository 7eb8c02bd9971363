import { configureLogger, getLogger } from "../utils/logger";
import { createEmbeddingProvider } from "../llm/factory";
import { runIngestionPipeline, type IngestionPipelineStats } from "../ingest/pipeline";
import { loadAppConfig } from "../config/loadConfig";
import type { AppConfig } from "../config/types";
import { ConfigError, ManualQaError, describeError } from "../errors";
import { parseInteger, requireValue } from "./args";

interface CliOptions {
    configPath?: string;
    sourcePath?: string;
    indexPath?: string;
    chunkSize?: number;
    chunkOverlap?: number;
}

function printHelp(): void {
    const lines = [
        "Usage: ingest [--config <path-to-env>] [--source <path>] [--index <dir>]",
        "",
        "Options:",
        "  -c, --config          Path to the .env configuration file (defaults to .env in the working directory).",
        "  -s, --source          Manual to ingest: a .pdf, .txt or .md file, or a directory of them.",
        "  -i, --index           Directory the vector index is written to.",
        "      --chunk-size      Chunk length in characters.",
        "      --chunk-overlap   Characters shared by consecutive chunks.",
        "  -h, --help            Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {};

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        switch (arg) {
            case "-h":
            case "--help":
                printHelp();
                process.exit(0);
            case "-c":
            case "--config":
                options.configPath = requireValue(argv, i, arg);
                i += 1;
                break;
            case "-s":
            case "--source":
                options.sourcePath = requireValue(argv, i, arg);
                i += 1;
                break;
            case "-i":
            case "--index":
                options.indexPath = requireValue(argv, i, arg);
                i += 1;
                break;
            case "--chunk-size":
                options.chunkSize = parseInteger(requireValue(argv, i, arg), arg);
                i += 1;
                break;
            case "--chunk-overlap":
                options.chunkOverlap = parseInteger(requireValue(argv, i, arg), arg);
                i += 1;
                break;
            default:
                throw new ConfigError(`Unknown argument: ${arg}`);
        }
    }

    return options;
}

function applyOverrides(config: AppConfig, options: CliOptions): AppConfig {
    return {
        ...config,
        ingestion: {
            sourcePath: options.sourcePath ?? config.ingestion.sourcePath,
            indexPath: options.indexPath ?? config.ingestion.indexPath,
            chunkSize: options.chunkSize ?? config.ingestion.chunkSize,
            chunkOverlap: options.chunkOverlap ?? config.ingestion.chunkOverlap,
        },
    };
}

function logStats(stats: IngestionPipelineStats): void {
    const logger = getLogger();
    logger.info(`Documents loaded: ${stats.documents}`);
    logger.info(`Pages read: ${stats.pages}`);
    logger.info(`Chunks indexed: ${stats.chunks}`);
    logger.info(`Embedding dimensions: ${stats.dimensions ?? "n/a"}`);
    logger.info(`Duration: ${(stats.durationMs / 1000).toFixed(1)}s`);
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    const config = applyOverrides(await loadAppConfig(options.configPath), options);

    configureLogger(config.logging);
    const logger = getLogger();

    logger.info({ sourcePath: config.ingestion.sourcePath, indexPath: config.ingestion.indexPath }, "Starting ingestion pipeline.");

    const embedding = createEmbeddingProvider(config.llm.embedding, logger);
    const result = await runIngestionPipeline(config, embedding, logger);

    logStats(result.stats);
    logger.info(`Vector index written to ${result.indexPath}`);
}

main().catch((error) => {
    const logger = getLogger();
    const stage = error instanceof ManualQaError ? error.stage : undefined;
    logger.error({ err: error, stage }, `Ingestion pipeline failed. ${describeError(error)}`);
    process.exitCode = 1;
});
