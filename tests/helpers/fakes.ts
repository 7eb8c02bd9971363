import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { AppConfig, ChatModelConfig, EmbeddingModelConfig } from "../../src/config/types";
import type { Chunk } from "../../src/ingest/types";
import type {
    ChatProvider,
    EmbeddingProvider,
    GenerateAnswerOptions,
    GeneratedAnswer,
    Prompt,
} from "../../src/llm/types";

export const silentLogger = pino({ level: "silent" });

function hashCode(text: string): number {
    let hash = 0;
    for (let i = 0; i < text.length; i++) {
        hash = (hash * 31 + text.charCodeAt(i)) | 0;
    }
    return hash & 0x7fffffff;
}

/**
 * Deterministic embeddings: fixed vectors for known texts, otherwise a
 * pseudo-random unit vector seeded by the text.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
    readonly config: EmbeddingModelConfig = { provider: "openai", model: "fake-embedding" };
    readonly documentCalls: string[][] = [];
    readonly queries: string[] = [];

    constructor(
        private readonly dimensions = 16,
        private readonly fixed: Map<string, number[]> = new Map()
    ) {}

    async embedDocuments(texts: string[]): Promise<number[][]> {
        this.documentCalls.push([...texts]);
        return texts.map((text) => this.vectorFor(text));
    }

    async embedQuery(query: string): Promise<number[]> {
        this.queries.push(query);
        return this.vectorFor(query);
    }

    vectorFor(text: string): number[] {
        const fixed = this.fixed.get(text);
        if (fixed) {
            return fixed;
        }

        let seed = hashCode(text);
        const vector: number[] = [];
        for (let i = 0; i < this.dimensions; i++) {
            seed = (seed * 1103515245 + 12345) & 0x7fffffff;
            vector.push((seed / 0x7fffffff) * 2 - 1);
        }
        const magnitude = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
        return vector.map((value) => value / magnitude);
    }
}

export type ChatReply = (prompt: Prompt) => GeneratedAnswer | Promise<GeneratedAnswer>;

export class FakeChatProvider implements ChatProvider {
    readonly config: ChatModelConfig = {
        provider: "openai",
        model: "gpt-4o-mini",
        temperature: 0,
        maxOutputTokens: 500,
    };
    readonly prompts: Prompt[] = [];

    constructor(private readonly reply: ChatReply = () => ({ answer: "Fake answer.", citedMarkers: [1] })) {}

    async generateAnswer(prompt: Prompt, _options?: GenerateAnswerOptions): Promise<GeneratedAnswer> {
        this.prompts.push(prompt);
        return this.reply(prompt);
    }
}

export function makeChunk(id: string, text: string, overrides: Partial<Chunk> = {}): Chunk {
    const [documentId = id, index = "0"] = id.split("#");
    return {
        id,
        documentId,
        index: Number(index),
        text,
        pages: [1],
        start: 0,
        end: text.length,
        checksum: `checksum-${id}`,
        ...overrides,
    };
}

export function testConfig(overrides: {
    ingestion?: Partial<AppConfig["ingestion"]>;
    retrieval?: Partial<AppConfig["retrieval"]>;
    server?: Partial<AppConfig["server"]>;
} = {}): AppConfig {
    return {
        server: { port: 0, ...overrides.server },
        logging: { level: "info", pretty: false },
        ingestion: {
            sourcePath: "docs",
            indexPath: "data/vector_index",
            chunkSize: 1000,
            chunkOverlap: 200,
            ...overrides.ingestion,
        },
        retrieval: {
            topK: 4,
            maxContextSize: 12_000,
            contextUnit: "characters",
            ...overrides.retrieval,
        },
        llm: {
            embedding: { provider: "openai", model: "fake-embedding", apiKey: "test-secret" },
            chat: { provider: "openai", model: "gpt-4o-mini", apiKey: "test-secret", temperature: 0, maxOutputTokens: 500 },
        },
    };
}

export async function makeTempDir(prefix = "manual-qa-"): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}
