import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigError, IndexNotFoundError, LoadError, PersistError, errorMessage } from "../errors";
import type { Chunk } from "../ingest/types";
import type { IndexedEntry, RetrievalHit, RetrievalResult, VectorIndex } from "./types";

const INDEX_VERSION = 1;
export const INDEX_FILENAME = "index.json";

const chunkSchema = z.object({
    id: z.string(),
    documentId: z.string(),
    index: z.number().int().nonnegative(),
    text: z.string(),
    pages: z.array(z.number().int().positive()),
    section: z.string().optional(),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    checksum: z.string(),
});

const serializedIndexSchema = z.object({
    version: z.literal(INDEX_VERSION),
    embeddingModel: z.string(),
    dimensions: z.number().int().positive().nullable(),
    metric: z.literal("cosine"),
    createdAt: z.string(),
    entries: z.array(
        z.object({
            id: z.string(),
            vector: z.array(z.number()),
            chunk: chunkSchema,
        })
    ),
});

export type SerializedIndex = z.infer<typeof serializedIndexSchema>;

export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new ConfigError(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
        dotProduct += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
    if (magnitude === 0) return 0;

    return dotProduct / magnitude;
}

async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.access(target);
        return true;
    } catch {
        return false;
    }
}

/**
 * Exact nearest-neighbour index over cosine similarity.
 * Entries keep their first insertion position, which breaks score ties.
 */
export class LocalVectorIndex implements VectorIndex {
    private readonly entries: IndexedEntry[] = [];
    private readonly positions = new Map<string, number>();
    private vectorDimensions: number | undefined;

    constructor(readonly embeddingModel: string, dimensions?: number) {
        this.vectorDimensions = dimensions;
    }

    get size(): number {
        return this.entries.length;
    }

    get dimensions(): number | undefined {
        return this.vectorDimensions;
    }

    upsert(id: string, vector: number[], chunk: Chunk): void {
        if (vector.length === 0 || vector.some((value) => !Number.isFinite(value))) {
            throw new ConfigError(`Vector for "${id}" must be a non-empty array of finite numbers.`);
        }
        this.validateDimensions(vector);
        this.vectorDimensions = vector.length;

        const entry: IndexedEntry = { id, vector: [...vector], chunk };
        const position = this.positions.get(id);
        if (position === undefined) {
            this.positions.set(id, this.entries.length);
            this.entries.push(entry);
        } else {
            this.entries[position] = entry;
        }
    }

    query(vector: number[], k: number): RetrievalResult {
        if (!Number.isInteger(k) || k <= 0) {
            throw new ConfigError(`k must be a positive integer, got ${k}.`);
        }
        if (this.entries.length === 0) {
            return [];
        }
        this.validateDimensions(vector);

        const scored = this.entries.map((entry, position) => ({
            position,
            hit: { chunk: entry.chunk, score: cosineSimilarity(vector, entry.vector) } satisfies RetrievalHit,
        }));

        scored.sort((a, b) => b.hit.score - a.hit.score || a.position - b.position);
        return scored.slice(0, k).map(({ hit }) => hit);
    }

    serialize(): SerializedIndex {
        return {
            version: INDEX_VERSION,
            embeddingModel: this.embeddingModel,
            dimensions: this.vectorDimensions ?? null,
            metric: "cosine",
            createdAt: new Date().toISOString(),
            entries: this.entries.map((entry) => ({ id: entry.id, vector: entry.vector, chunk: entry.chunk })),
        };
    }

    /**
     * Writes the index into a staging directory next to `indexPath` and swaps it in,
     * so a reader never observes a partially written index.
     */
    async persist(indexPath: string): Promise<void> {
        const target = path.resolve(indexPath);
        const suffix = `${process.pid}-${Date.now()}`;
        const staging = `${target}.staging-${suffix}`;
        const previous = `${target}.previous-${suffix}`;
        let movedPrevious = false;

        try {
            await fs.mkdir(staging, { recursive: true });
            await fs.writeFile(path.join(staging, INDEX_FILENAME), JSON.stringify(this.serialize()), "utf8");

            if (await pathExists(target)) {
                await fs.rename(target, previous);
                movedPrevious = true;
            }
            await fs.rename(staging, target);
        } catch (error) {
            await fs.rm(staging, { recursive: true, force: true });
            if (movedPrevious && !(await pathExists(target))) {
                try {
                    await fs.rename(previous, target);
                } catch (restoreError) {
                    throw new PersistError(
                        `Failed to persist vector index to "${target}" (${errorMessage(error)}) and to restore the previous index from "${previous}": ${errorMessage(restoreError)}`,
                        restoreError
                    );
                }
            }
            throw new PersistError(`Failed to persist vector index to "${target}": ${errorMessage(error)}`, error);
        }

        if (movedPrevious) {
            await fs.rm(previous, { recursive: true, force: true });
        }
    }

    static fromSerialized(data: SerializedIndex): LocalVectorIndex {
        const index = new LocalVectorIndex(data.embeddingModel, data.dimensions ?? undefined);
        for (const entry of data.entries) {
            index.upsert(entry.id, entry.vector, entry.chunk);
        }
        return index;
    }

    static async load(indexPath: string): Promise<LocalVectorIndex> {
        const file = path.join(path.resolve(indexPath), INDEX_FILENAME);

        let raw: string;
        try {
            raw = await fs.readFile(file, "utf8");
        } catch (error) {
            const err = error as NodeJS.ErrnoException;
            if (err.code === "ENOENT" || err.code === "ENOTDIR") {
                throw new IndexNotFoundError(indexPath);
            }
            throw new LoadError(`Failed to read vector index "${file}": ${errorMessage(error)}`, error);
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new LoadError(`Vector index "${file}" is not valid JSON.`, error);
        }

        const parsed = serializedIndexSchema.safeParse(json);
        if (!parsed.success) {
            throw new LoadError(`Vector index "${file}" has an unexpected format: ${parsed.error.message}`, parsed.error);
        }

        try {
            return LocalVectorIndex.fromSerialized(parsed.data);
        } catch (error) {
            throw new LoadError(`Vector index "${file}" is inconsistent: ${errorMessage(error)}`, error);
        }
    }

    private validateDimensions(vector: number[]): void {
        if (this.vectorDimensions !== undefined && vector.length !== this.vectorDimensions) {
            throw new ConfigError(
                `Embedding dimension mismatch: expected ${this.vectorDimensions}, got ${vector.length}`
            );
        }
    }
}

export function createVectorIndex(embeddingModel: string): VectorIndex {
    return new LocalVectorIndex(embeddingModel);
}

export function loadVectorIndex(indexPath: string): Promise<VectorIndex> {
    return LocalVectorIndex.load(indexPath);
}
