import { describe, it, expect, beforeEach } from "vitest";
import { askQuestion, selectCitations } from "../src/query/askAi";
import { LocalVectorIndex } from "../src/vectorIndex/localIndex";
import { ConfigError, GenerationError } from "../src/errors";
import { assemblePrompt } from "../src/llm/prompt";
import { FakeChatProvider, FakeEmbeddingProvider, makeChunk, silentLogger, testConfig } from "./helpers/fakes";

const QUESTION = "How do I reset the router?";

describe("askQuestion", () => {
    let index: LocalVectorIndex;
    let embedding: FakeEmbeddingProvider;
    const config = testConfig({ retrieval: { topK: 3 } });

    beforeEach(() => {
        index = new LocalVectorIndex("fake-embedding");
        index.upsert("manual.pdf#0", [1, 0], makeChunk("manual.pdf#0", "Hold the reset button for ten seconds.", { pages: [4], section: "Reset" }));
        index.upsert("manual.pdf#1", [0.8, 0.6], makeChunk("manual.pdf#1", "Unplug the router first.", { pages: [5] }));
        index.upsert("manual.pdf#2", [0, 1], makeChunk("manual.pdf#2", "Warranty terms.", { pages: [9] }));
        embedding = new FakeEmbeddingProvider(2, new Map([[QUESTION, [1, 0]]]));
    });

    it("should cite the context entries the model referenced", async () => {
        const chat = new FakeChatProvider(() => ({ answer: "Hold the reset button.", citedMarkers: [2, 9, 1, 2] }));

        const answer = await askQuestion({ embedding, chat }, index, { question: QUESTION }, { config, logger: silentLogger });

        expect(answer).toEqual({
            answer: "Hold the reset button.",
            noSupportingContext: false,
            citations: [
                {
                    marker: 1,
                    chunkId: "manual.pdf#0",
                    documentId: "manual.pdf",
                    pages: [4],
                    section: "Reset",
                    label: "Section: Reset (Page 4)",
                    score: expect.closeTo(1, 10),
                },
                {
                    marker: 2,
                    chunkId: "manual.pdf#1",
                    documentId: "manual.pdf",
                    pages: [5],
                    label: "Page 5",
                    score: expect.closeTo(0.8, 10),
                },
            ],
        });
        expect(chat.prompts[0].context.map((entry) => entry.hit.chunk.id)).toEqual([
            "manual.pdf#0",
            "manual.pdf#1",
            "manual.pdf#2",
        ]);
    });

    it("should cite every context entry when the model cites none", async () => {
        const chat = new FakeChatProvider(() => ({ answer: "Unplug it.", citedMarkers: [] }));

        const answer = await askQuestion({ embedding, chat }, index, { question: QUESTION, topK: 2 }, { config, logger: silentLogger });

        expect(answer.citations.map((citation) => citation.marker)).toEqual([1, 2]);
    });

    it("should still answer, flagged, when no context fits", async () => {
        const chat = new FakeChatProvider(() => ({ answer: "I do not know.", citedMarkers: [1] }));

        const answer = await askQuestion(
            { embedding, chat },
            index,
            { question: QUESTION, maxContextSize: 0 },
            { config, logger: silentLogger }
        );

        expect(answer).toEqual({ answer: "I do not know.", citations: [], noSupportingContext: true });
        expect(chat.prompts).toHaveLength(1);
        expect(chat.prompts[0].noSupportingContext).toBe(true);
    });

    it("should reject an empty question without calling the model", async () => {
        const chat = new FakeChatProvider();

        await expect(
            askQuestion({ embedding, chat }, index, { question: "  " }, { config, logger: silentLogger })
        ).rejects.toBeInstanceOf(ConfigError);
        expect(chat.prompts).toEqual([]);
    });

    it("should propagate generation failures", async () => {
        const chat = new FakeChatProvider(() => {
            throw new GenerationError("openai chat completion failed: timeout");
        });

        await expect(
            askQuestion({ embedding, chat }, index, { question: QUESTION }, { config, logger: silentLogger })
        ).rejects.toThrow("openai chat completion failed: timeout");
    });
});

describe("selectCitations", () => {
    const prompt = assemblePrompt("q", [
        { chunk: makeChunk("manual.pdf#0", "one", { pages: [1] }), score: 0.5 },
        { chunk: makeChunk("manual.pdf#1", "two", { pages: [2] }), score: 0.4 },
    ], 1_000);

    it("should keep prompt order and drop duplicates", () => {
        expect(selectCitations(prompt, [2, 1, 2]).map((citation) => citation.chunkId)).toEqual([
            "manual.pdf#0",
            "manual.pdf#1",
        ]);
    });

    it("should fall back to all entries when only unknown markers are cited", () => {
        expect(selectCitations(prompt, [7]).map((citation) => citation.marker)).toEqual([1, 2]);
    });
});
