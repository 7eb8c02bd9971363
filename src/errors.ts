export type ErrorCode =
    | "LOAD_ERROR"
    | "CONFIG_ERROR"
    | "EMBEDDING_ERROR"
    | "INDEX_NOT_FOUND"
    | "GENERATION_ERROR"
    | "PERSIST_ERROR";

export type PipelineStage = "load" | "chunk" | "embed" | "upsert" | "persist";

export class ManualQaError extends Error {
    /** Set by the ingestion pipeline to the stage that was running when the error was raised. */
    stage?: PipelineStage;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        cause?: unknown
    ) {
        super(message);
        this.name = "ManualQaError";
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}

/** Missing, unreadable or unsupported source document, or a corrupt persisted index. */
export class LoadError extends ManualQaError {
    constructor(message: string, cause?: unknown) {
        super("LOAD_ERROR", message, cause);
        this.name = "LoadError";
    }
}

export class ConfigError extends ManualQaError {
    constructor(message: string, cause?: unknown) {
        super("CONFIG_ERROR", message, cause);
        this.name = "ConfigError";
    }
}

export class EmbeddingError extends ManualQaError {
    constructor(message: string, cause?: unknown) {
        super("EMBEDDING_ERROR", message, cause);
        this.name = "EmbeddingError";
    }
}

/** A query or load was attempted against a path where no index has been persisted. */
export class IndexNotFoundError extends ManualQaError {
    constructor(public readonly indexPath: string) {
        super("INDEX_NOT_FOUND", `No vector index found at "${indexPath}". Run the ingestion first.`);
        this.name = "IndexNotFoundError";
    }
}

export class GenerationError extends ManualQaError {
    constructor(message: string, cause?: unknown) {
        super("GENERATION_ERROR", message, cause);
        this.name = "GenerationError";
    }
}

/** Writing the vector index to disk failed; the previous index, if any, is left in place. */
export class PersistError extends ManualQaError {
    constructor(message: string, cause?: unknown) {
        super("PERSIST_ERROR", message, cause);
        this.name = "PersistError";
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

export function describeError(error: unknown): string {
    if (error instanceof ManualQaError) {
        const stage = error.stage ? ` (stage: ${error.stage})` : "";
        return `${error.name}${stage}: ${error.message}`;
    }
    return `Error: ${errorMessage(error)}`;
}
