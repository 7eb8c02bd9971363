import { configureLogger, getLogger } from "../utils/logger";
import { createLLMClient } from "../llm/factory";
import { loadAppConfig } from "../config/loadConfig";
import { askQuestion, type Answer } from "../query/askAi";
import { loadVectorIndex } from "../vectorIndex/localIndex";
import { ConfigError, describeError } from "../errors";
import { parseInteger, requireValue } from "./args";
import { formatSourceLines } from "./sources";

interface CliOptions {
    configPath?: string;
    topK?: number;
    question: string;
}

function printHelp(): void {
    const lines = [
        "Usage: ask [--config <path-to-env>] [--top-k <n>] <question...>",
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in the working directory).",
        "  -k, --top-k    Number of chunks to retrieve.",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions {
    let configPath: string | undefined;
    let topK: number | undefined;
    const words: string[] = [];

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (arg === "-h" || arg === "--help") {
            printHelp();
            process.exit(0);
        }

        if (arg === "-c" || arg === "--config") {
            configPath = requireValue(argv, i, arg);
            i += 1;
            continue;
        }

        if (arg === "-k" || arg === "--top-k") {
            topK = parseInteger(requireValue(argv, i, arg), arg);
            i += 1;
            continue;
        }

        words.push(arg);
    }

    const question = words.join(" ").trim();
    if (!question) {
        printHelp();
        throw new ConfigError("A question is required.");
    }

    return { configPath, topK, question };
}

function printAnswer(result: Answer): void {
    const lines = [result.answer, ""];

    if (result.noSupportingContext) {
        lines.push("(No supporting context was found in the indexed documentation.)");
    } else {
        lines.push("Sources:");
        lines.push(...formatSourceLines(result.citations));
    }

    console.log(lines.join("\n"));
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();

    const index = await loadVectorIndex(config.ingestion.indexPath);
    logger.debug({ indexPath: config.ingestion.indexPath, chunks: index.size }, "Loaded vector index.");
    if (index.embeddingModel !== config.llm.embedding.model) {
        logger.warn(
            { indexModel: index.embeddingModel, configuredModel: config.llm.embedding.model },
            "Vector index was built with a different embedding model than the one configured."
        );
    }

    const llm = createLLMClient(config.llm, logger);
    const result = await askQuestion(
        llm,
        index,
        { question: options.question, topK: options.topK },
        { config, logger }
    );

    printAnswer(result);
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, describeError(error));
    process.exitCode = 1;
});
