import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseDotenv } from "dotenv";
import { ConfigError, errorMessage } from "../errors";
import type { AppConfig, ContextUnit, LLMProviderName, LoggingConfig } from "./types";

const DEFAULT_ENV_FILENAME = ".env";

const PROVIDERS: readonly LLMProviderName[] = ["openai", "google", "anthropic"];
const LOG_LEVELS: ReadonlyArray<LoggingConfig["level"]> = ["fatal", "error", "warn", "info", "debug", "trace"];
const CONTEXT_UNITS: readonly ContextUnit[] = ["characters", "tokens"];

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number;
function getEnvNumber(env: Env, key: string): number | undefined;
function getEnvNumber(env: Env, key: string, defaultValue?: number): number | undefined {
    const value = getEnv(env, key);
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new ConfigError(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue = false): boolean {
    const value = getEnv(env, key);
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getEnvChoice<T extends string>(env: Env, key: string, choices: readonly T[], defaultValue: T): T {
    const value = getEnv(env, key);
    if (!value) {
        return defaultValue;
    }
    const match = choices.find((choice) => choice === value.toLowerCase());
    if (!match) {
        throw new ConfigError(`Environment variable ${key} must be one of ${choices.join(", ")}, got: ${value}`);
    }
    return match;
}

export function resolveConfigPath(providedPath?: string, env: Env = process.env): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    const fromEnv = getEnv(env, "MANUALQA_CONFIG_PATH");
    if (fromEnv) {
        return path.resolve(process.cwd(), fromEnv);
    }

    return path.resolve(process.cwd(), DEFAULT_ENV_FILENAME);
}

async function readEnvFile(envPath: string, required: boolean): Promise<Env> {
    try {
        const raw = await fs.readFile(envPath, "utf8");
        return parseDotenv(raw);
    } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code === "ENOENT" && !required) {
            return {};
        }
        throw new ConfigError(`Failed to load environment file from "${envPath}": ${errorMessage(error)}`, error);
    }
}

/**
 * Builds the application configuration from an optional `.env` file and the process environment.
 * Variables already present in `env` win over the file, as with `dotenv`.
 */
export async function loadAppConfig(configPath?: string, env: Env = process.env): Promise<AppConfig> {
    const envPath = resolveConfigPath(configPath, env);
    const fileValues = await readEnvFile(envPath, Boolean(configPath));
    const merged: Env = { ...fileValues, ...env };

    const config: AppConfig = {
        logging: {
            level: getEnvChoice(merged, "MANUALQA_LOGGING_LEVEL", LOG_LEVELS, "info"),
            pretty: getEnvBoolean(merged, "MANUALQA_LOGGING_PRETTY", false),
        },
        server: {
            apiKey: getEnv(merged, "MANUALQA_SERVER_API_KEY"),
            port: getEnvNumber(merged, "PORT", 3000),
        },
        ingestion: {
            sourcePath: getEnv(merged, "MANUALQA_SOURCE_PATH") ?? "docs",
            indexPath: getEnv(merged, "MANUALQA_INDEX_PATH") ?? path.join("data", "vector_index"),
            chunkSize: getEnvNumber(merged, "MANUALQA_CHUNK_SIZE", 1000),
            chunkOverlap: getEnvNumber(merged, "MANUALQA_CHUNK_OVERLAP", 200),
        },
        retrieval: {
            topK: getEnvNumber(merged, "MANUALQA_TOP_K", 4),
            maxContextSize: getEnvNumber(merged, "MANUALQA_MAX_CONTEXT_SIZE", 12_000),
            contextUnit: getEnvChoice(merged, "MANUALQA_CONTEXT_UNIT", CONTEXT_UNITS, "characters"),
        },
        llm: {
            embedding: {
                provider: getEnvChoice(merged, "MANUALQA_LLM_EMBEDDING_PROVIDER", PROVIDERS, "openai"),
                model: getEnv(merged, "MANUALQA_LLM_EMBEDDING_MODEL") ?? "text-embedding-3-small",
                apiKey: getEnv(merged, "MANUALQA_LLM_EMBEDDING_API_KEY"),
                baseUrl: getEnv(merged, "MANUALQA_LLM_EMBEDDING_BASE_URL"),
                limits: {
                    batchSize: getEnvNumber(merged, "MANUALQA_LLM_EMBEDDING_LIMITS_BATCH_SIZE"),
                    concurrency: getEnvNumber(merged, "MANUALQA_LLM_EMBEDDING_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getEnvNumber(merged, "MANUALQA_LLM_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber(merged, "MANUALQA_LLM_EMBEDDING_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber(merged, "MANUALQA_LLM_EMBEDDING_LIMITS_RETRIES"),
                },
            },
            chat: {
                provider: getEnvChoice(merged, "MANUALQA_LLM_CHAT_PROVIDER", PROVIDERS, "openai"),
                model: getEnv(merged, "MANUALQA_LLM_CHAT_MODEL") ?? "gpt-4o-mini",
                apiKey: getEnv(merged, "MANUALQA_LLM_CHAT_API_KEY"),
                baseUrl: getEnv(merged, "MANUALQA_LLM_CHAT_BASE_URL"),
                temperature: getEnvNumber(merged, "MANUALQA_LLM_CHAT_TEMPERATURE", 0),
                maxOutputTokens: getEnvNumber(merged, "MANUALQA_LLM_CHAT_MAX_OUTPUT_TOKENS", 1_500),
                limits: {
                    concurrency: getEnvNumber(merged, "MANUALQA_LLM_CHAT_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getEnvNumber(merged, "MANUALQA_LLM_CHAT_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber(merged, "MANUALQA_LLM_CHAT_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber(merged, "MANUALQA_LLM_CHAT_LIMITS_RETRIES"),
                },
            },
        },
    };

    return config;
}
