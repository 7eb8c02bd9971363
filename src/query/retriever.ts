import type { Logger } from "pino";
import { ConfigError } from "../errors";
import type { EmbedOptions, EmbeddingProvider } from "../llm/types";
import type { RetrievalResult, VectorIndex } from "../vectorIndex/types";

/** Embeds a query and returns the index's top-k hits for it, unchanged. */
export class Retriever {
    constructor(
        private readonly embedding: EmbeddingProvider,
        private readonly index: VectorIndex,
        private readonly logger?: Logger
    ) {}

    async retrieve(query: string, k: number, options?: EmbedOptions): Promise<RetrievalResult> {
        if (!Number.isInteger(k) || k <= 0) {
            throw new ConfigError(`k must be a positive integer, got ${k}.`);
        }

        const trimmedQuery = query.trim();
        if (!trimmedQuery) {
            throw new ConfigError("Question cannot be empty.");
        }

        this.logger?.debug({ k, indexSize: this.index.size }, "Embedding query.");
        const queryVector = await this.embedding.embedQuery(trimmedQuery, options);
        const hits = this.index.query(queryVector, k);
        this.logger?.debug({ hits: hits.length, topScore: hits[0]?.score }, "Retrieved chunks.");

        return hits;
    }
}
