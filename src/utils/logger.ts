import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig } from "../config/types";

const DEFAULT_LOGGING: LoggingConfig = { level: "info", pretty: false };

// API keys travel inside config objects; never let them reach the output.
const REDACTED_PATHS = ["apiKey", "*.apiKey", "config.llm.*.apiKey", "headers.authorization", 'headers["x-api-key"]'];

let loggerInstance: Logger | null = null;

function buildOptions({ level, pretty }: LoggingConfig): LoggerOptions {
    return {
        name: "manual-qa",
        level,
        base: undefined,
        redact: REDACTED_PATHS,
        transport: pretty
            ?   {
                    target: "pino-pretty",
                    options: {
                        colorize: true,
                        translateTime: "SYS:standard",
                        ignore: "name",
                    }
                }
            : undefined,
    };
}

export function configureLogger(config: LoggingConfig): Logger {
    loggerInstance = pino(buildOptions(config));
    return loggerInstance;
}

export function getLogger(): Logger {
    if(!loggerInstance) {
        loggerInstance = pino(buildOptions(DEFAULT_LOGGING));
    }
    return loggerInstance;
}

export function childLogger(logger: Logger, bindings: Record<string, unknown>): Logger {
    return typeof logger.child === "function" ? logger.child(bindings) : logger;
}
