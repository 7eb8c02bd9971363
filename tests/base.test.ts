import { describe, it, expect } from "vitest";
import { BaseChatProvider, BaseEmbeddingProvider, type ProviderRateLimits } from "../src/llm/base";
import { assemblePrompt } from "../src/llm/prompt";
import type { GeneratedAnswer, Prompt } from "../src/llm/types";
import { EmbeddingError, GenerationError } from "../src/errors";
import { mergeLimits } from "../src/utils/providerUtils";
import { silentLogger } from "./helpers/fakes";

type EmbedHandler = (texts: string[], call: number) => Promise<number[][]>;

class ScriptedEmbeddingProvider extends BaseEmbeddingProvider {
    readonly batches: string[][] = [];

    constructor(private readonly handler: EmbedHandler, limits: ProviderRateLimits) {
        super({ provider: "openai", model: "fake-embedding" }, limits, silentLogger);
    }

    protected async sendEmbeddingRequest(texts: string[]): Promise<number[][]> {
        this.batches.push(texts);
        return this.handler(texts, this.batches.length);
    }
}

class ScriptedChatProvider extends BaseChatProvider {
    constructor(private readonly handler: (prompt: Prompt) => Promise<GeneratedAnswer>) {
        super({ provider: "openai", model: "gpt-4o-mini", temperature: 0 }, { retries: 0 }, silentLogger);
    }

    protected complete(prompt: Prompt): Promise<GeneratedAnswer> {
        return this.handler(prompt);
    }
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("BaseEmbeddingProvider", () => {
    it("should return vectors in input order when batches finish out of order", async () => {
        const provider = new ScriptedEmbeddingProvider(async (texts, call) => {
            await delay(call === 1 ? 30 : 0);
            return texts.map((text) => [text.length, call]);
        }, { batchSize: 2, concurrency: 3, retries: 0 });

        const vectors = await provider.embedDocuments(["a", "bb", "ccc", "dddd", "eeeee"]);

        expect(vectors.map(([length]) => length)).toEqual([1, 2, 3, 4, 5]);
        expect(provider.batches).toEqual([["a", "bb"], ["ccc", "dddd"], ["eeeee"]]);
    });

    it("should not call the provider for an empty input", async () => {
        const provider = new ScriptedEmbeddingProvider(async () => [], { retries: 0 });

        expect(await provider.embedDocuments([])).toEqual([]);
        expect(provider.batches).toEqual([]);
    });

    it("should embed a single query", async () => {
        const provider = new ScriptedEmbeddingProvider(async (texts) => texts.map(() => [0.5, 0.5]), { retries: 0 });

        expect(await provider.embedQuery("reset")).toEqual([0.5, 0.5]);
    });

    it("should wrap provider failures in EmbeddingError", async () => {
        const cause = new Error("quota exceeded");
        const provider = new ScriptedEmbeddingProvider(async () => {
            throw cause;
        }, { retries: 0 });

        const error = await provider.embedDocuments(["a"]).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(EmbeddingError);
        expect(error).toHaveProperty("message", "openai embedding request failed: quota exceeded");
        expect(error).toHaveProperty("cause", cause);
    });

    it("should reject a response with the wrong number of vectors", async () => {
        const provider = new ScriptedEmbeddingProvider(async () => [[1, 2]], { retries: 0 });

        await expect(provider.embedDocuments(["a", "b"])).rejects.toThrow("openai returned 1 embeddings for 2 inputs.");
    });

    it("should retry a failed request", async () => {
        const provider = new ScriptedEmbeddingProvider(async (texts, call) => {
            if (call === 1) {
                throw new Error("temporarily unavailable");
            }
            return texts.map(() => [1]);
        }, { retries: 1 });

        expect(await provider.embedDocuments(["a"])).toEqual([[1]]);
        expect(provider.batches).toHaveLength(2);
    });
});

describe("BaseChatProvider", () => {
    const prompt = assemblePrompt("How do I reset it?", [], 1_000);

    it("should trim the generated answer", async () => {
        const provider = new ScriptedChatProvider(async () => ({ answer: "  Hold the button.\n", citedMarkers: [1] }));

        expect(await provider.generateAnswer(prompt)).toEqual({ answer: "Hold the button.", citedMarkers: [1] });
    });

    it("should reject an empty answer", async () => {
        const provider = new ScriptedChatProvider(async () => ({ answer: "   ", citedMarkers: [] }));

        await expect(provider.generateAnswer(prompt)).rejects.toThrow("openai returned an empty answer.");
    });

    it("should wrap provider failures in GenerationError", async () => {
        const provider = new ScriptedChatProvider(async () => {
            throw new Error("model overloaded");
        });

        const error = await provider.generateAnswer(prompt).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(GenerationError);
        expect(error).toHaveProperty("message", "openai chat completion failed: model overloaded");
    });
});

describe("mergeLimits", () => {
    it("should keep defaults for limits that are not configured", () => {
        expect(mergeLimits({ batchSize: 100, retries: 6 }, { batchSize: undefined, retries: 2 })).toEqual({
            batchSize: 100,
            retries: 2,
        });
    });

    it("should return the defaults without overrides", () => {
        expect(mergeLimits({ concurrency: 3 })).toEqual({ concurrency: 3 });
    });
});
