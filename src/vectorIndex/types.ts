import type { Chunk } from "../ingest/types";

export interface RetrievalHit {
    chunk: Chunk;
    /** Cosine similarity, higher is closer. */
    score: number;
}

export type RetrievalResult = RetrievalHit[];

export interface IndexedEntry {
    id: string;
    vector: number[];
    chunk: Chunk;
}

export interface VectorIndex {
    readonly size: number;
    /** Fixed by the first stored vector; undefined while the index is empty. */
    readonly dimensions: number | undefined;
    readonly embeddingModel: string;
    upsert(id: string, vector: number[], chunk: Chunk): void;
    query(vector: number[], k: number): RetrievalResult;
    persist(indexPath: string): Promise<void>;
}
