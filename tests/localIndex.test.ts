import fs from "node:fs/promises";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { INDEX_FILENAME, LocalVectorIndex, cosineSimilarity, loadVectorIndex } from "../src/vectorIndex/localIndex";
import { ConfigError, IndexNotFoundError, LoadError, PersistError } from "../src/errors";
import { makeChunk, makeTempDir, removeDir } from "./helpers/fakes";

describe("cosineSimilarity", () => {
    it("should score identical directions 1 and orthogonal vectors 0", () => {
        expect(cosineSimilarity([1, 0], [2, 0])).toBeCloseTo(1);
        expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
        expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1);
    });

    it("should score a zero vector 0", () => {
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it("should reject vectors of different lengths", () => {
        expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(ConfigError);
    });
});

describe("LocalVectorIndex", () => {
    let index: LocalVectorIndex;

    beforeEach(() => {
        index = new LocalVectorIndex("fake-embedding");
        index.upsert("doc#0", [1, 0, 0], makeChunk("doc#0", "zero"));
        index.upsert("doc#1", [0, 1, 0], makeChunk("doc#1", "one"));
        index.upsert("doc#2", [1, 1, 0], makeChunk("doc#2", "two"));
    });

    it("should report size and dimensions", () => {
        expect(index.size).toBe(3);
        expect(index.dimensions).toBe(3);
        expect(new LocalVectorIndex("fake-embedding").dimensions).toBeUndefined();
    });

    it("should rank by descending cosine similarity", () => {
        const hits = index.query([1, 0.1, 0], 3);

        expect(hits.map((hit) => hit.chunk.id)).toEqual(["doc#0", "doc#2", "doc#1"]);
        expect(hits[0].score).toBeGreaterThan(hits[1].score);
    });

    it("should return at most k hits", () => {
        expect(index.query([1, 0, 0], 2)).toHaveLength(2);
        expect(index.query([1, 0, 0], 10)).toHaveLength(3);
    });

    it("should break score ties by insertion order", () => {
        index.upsert("doc#3", [0, 1, 0], makeChunk("doc#3", "three"));

        const hits = index.query([0, 1, 0], 2);

        expect(hits.map((hit) => hit.chunk.id)).toEqual(["doc#1", "doc#3"]);
        expect(hits[0].score).toBe(hits[1].score);
    });

    it("should replace an existing id in place", () => {
        index.upsert("doc#3", [0, 0, 1], makeChunk("doc#3", "three"));
        index.upsert("doc#1", [0, 0, 1], makeChunk("doc#1", "one, revised"));

        const hits = index.query([0, 0, 1], 2);

        expect(index.size).toBe(4);
        expect(hits.map((hit) => hit.chunk.text)).toEqual(["one, revised", "three"]);
    });

    it("should reject vectors of another dimension", () => {
        expect(() => index.upsert("doc#9", [1, 0], makeChunk("doc#9", "nine"))).toThrow(
            "Embedding dimension mismatch: expected 3, got 2"
        );
        expect(() => index.query([1, 0], 1)).toThrow(ConfigError);
    });

    it("should reject empty or non-finite vectors", () => {
        expect(() => index.upsert("doc#9", [], makeChunk("doc#9", "nine"))).toThrow(ConfigError);
        expect(() => index.upsert("doc#9", [1, Number.NaN, 0], makeChunk("doc#9", "nine"))).toThrow(ConfigError);
    });

    it("should reject a k that is not a positive integer", () => {
        expect(() => index.query([1, 0, 0], 0)).toThrow("k must be a positive integer, got 0.");
        expect(() => index.query([1, 0, 0], 1.5)).toThrow(ConfigError);
    });

    it("should return nothing from an empty index", () => {
        expect(new LocalVectorIndex("fake-embedding").query([1, 0], 3)).toEqual([]);
    });

    describe("persistence", () => {
        let dir: string;

        beforeEach(async () => {
            dir = await makeTempDir();
        });

        afterEach(async () => {
            await removeDir(dir);
        });

        it("should reload an index whose entries are their own nearest neighbours", async () => {
            const indexPath = path.join(dir, "vector_index");
            await index.persist(indexPath);

            const loaded = await loadVectorIndex(indexPath);

            expect(loaded.size).toBe(3);
            expect(loaded.dimensions).toBe(3);
            expect(loaded.embeddingModel).toBe("fake-embedding");
            for (const [id, vector] of [
                ["doc#0", [1, 0, 0]],
                ["doc#1", [0, 1, 0]],
                ["doc#2", [1, 1, 0]],
            ] as const) {
                expect(loaded.query([...vector], 1)[0].chunk.id).toBe(id);
            }
        });

        it("should replace a previous index and leave no staging directories", async () => {
            const indexPath = path.join(dir, "vector_index");
            await new LocalVectorIndex("fake-embedding").persist(indexPath);
            await index.persist(indexPath);

            expect(await fs.readdir(dir)).toEqual(["vector_index"]);
            expect(await fs.readdir(indexPath)).toEqual([INDEX_FILENAME]);
            expect((await loadVectorIndex(indexPath)).size).toBe(3);
        });

        it("should keep the previous index when swapping in the new one fails", async () => {
            const indexPath = path.join(dir, "vector_index");
            await index.persist(indexPath);

            const replacement = new LocalVectorIndex("fake-embedding");
            replacement.upsert("other#0", [0, 0, 1], makeChunk("other#0", "replacement"));

            const rename = fs.rename;
            const renameSpy = vi
                .spyOn(fs, "rename")
                .mockImplementationOnce((from, to) => rename(from, to))
                .mockImplementationOnce(async () => {
                    throw new Error("disk full");
                });

            try {
                await expect(replacement.persist(indexPath)).rejects.toBeInstanceOf(PersistError);
            } finally {
                renameSpy.mockRestore();
            }

            const loaded = await loadVectorIndex(indexPath);
            expect(await fs.readdir(dir)).toEqual(["vector_index"]);
            expect(loaded.size).toBe(3);
            expect(loaded.query([1, 0, 0], 1)[0].chunk.id).toBe("doc#0");
        });

        it("should raise IndexNotFoundError when nothing was persisted", async () => {
            const indexPath = path.join(dir, "missing");

            await expect(loadVectorIndex(indexPath)).rejects.toBeInstanceOf(IndexNotFoundError);
            await expect(loadVectorIndex(indexPath)).rejects.toThrow(
                `No vector index found at "${indexPath}". Run the ingestion first.`
            );
        });

        it("should raise LoadError for a corrupt index file", async () => {
            await fs.writeFile(path.join(dir, INDEX_FILENAME), "{ not json");

            await expect(loadVectorIndex(dir)).rejects.toBeInstanceOf(LoadError);
        });

        it("should raise LoadError for an index in an unknown format", async () => {
            await fs.writeFile(path.join(dir, INDEX_FILENAME), JSON.stringify({ version: 2, entries: [] }));

            await expect(loadVectorIndex(dir)).rejects.toThrow(/has an unexpected format/);
        });

        it("should raise LoadError for entries of mixed dimensions", async () => {
            const data = index.serialize();
            data.entries[1].vector = [0, 1];
            await fs.writeFile(path.join(dir, INDEX_FILENAME), JSON.stringify(data));

            await expect(loadVectorIndex(dir)).rejects.toThrow(/is inconsistent/);
        });
    });
});
