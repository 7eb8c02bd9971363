import { z } from "zod";
import { ConfigError } from "../errors";
import type { Chunk } from "../ingest/types";
import { measureCharacters, type TextMeasure } from "../utils/tokenEncoder";
import type { RetrievalResult } from "../vectorIndex/types";
import type { Prompt, PromptContextEntry } from "./types";

const CONTEXT_BLOCK_SEPARATOR = "\n\n";

export const DEFAULT_SYSTEM_PROMPT = [
    "You are a documentation assistant. Answer the user's question using only the numbered context excerpts taken from the manual.",
    "Cite every excerpt you rely on by its number.",
    "If the context does not contain the answer, say that you do not know. Do not invent commands, options, values or steps that are not in the context.",
    "Format commands, code and configuration as markdown code blocks.",
    "Do not add closing remarks or suggest reading further documentation; sources are listed separately.",
].join(" ");

export const answerSchema = z.object({
    citations: z
        .array(z.number().int())
        .describe("Numbers of the context excerpts the answer relies on. Provide this FIRST."),
    answer: z.string().describe("The answer to the user's question"),
});

export type AnswerPayload = z.infer<typeof answerSchema>;

export interface AssemblePromptOptions {
    /** Size function for the context budget; characters unless given. */
    measure?: TextMeasure;
    systemPrompt?: string;
}

function formatPages(pages: number[]): string {
    if (pages.length === 0) {
        return "";
    }
    const first = pages[0];
    const last = pages[pages.length - 1];
    return first === last ? `Page ${first}` : `Pages ${first}-${last}`;
}

/**
 * Human-readable locator of a chunk, e.g. `Section: Installation (Page 3)`.
 * The document id is prepended when answers can draw on several documents.
 */
export function formatCitationLabel(chunk: Chunk, includeDocument = false): string {
    const pages = formatPages(chunk.pages);
    let label: string;
    if (chunk.section) {
        label = pages ? `Section: ${chunk.section} (${pages})` : `Section: ${chunk.section}`;
    } else {
        label = pages || chunk.id;
    }
    return includeDocument ? `${chunk.documentId}, ${label}` : label;
}

function formatContextBlock(entry: PromptContextEntry): string {
    return `[${entry.marker}] ${entry.label}\n${entry.hit.chunk.text.trim()}`;
}

export function formatContext(entries: PromptContextEntry[]): string {
    return entries.map(formatContextBlock).join(CONTEXT_BLOCK_SEPARATOR);
}

export function buildPromptMessages(
    query: string,
    context: PromptContextEntry[],
    systemPrompt: string = DEFAULT_SYSTEM_PROMPT
): { system: string; user: string } {
    const userSections: string[] = [];

    if (context.length > 0) {
        userSections.push("Context:", formatContext(context));
    } else {
        userSections.push("No supporting context was found in the documentation.");
    }

    userSections.push(`Question: ${query.trim()}`, "Answer:");

    return { system: systemPrompt, user: userSections.join("\n\n") };
}

/**
 * Packs retrieved hits into the prompt in rank order while the joined context stays
 * within `maxContextSize`. Packing stops at the first hit that does not fit.
 */
export function assemblePrompt(
    query: string,
    results: RetrievalResult,
    maxContextSize: number,
    options: AssemblePromptOptions = {}
): Prompt {
    if (!Number.isFinite(maxContextSize) || maxContextSize < 0) {
        throw new ConfigError(`maxContextSize must be a non-negative number, got ${maxContextSize}.`);
    }

    const measure = options.measure ?? measureCharacters;
    const includeDocument = new Set(results.map((hit) => hit.chunk.documentId)).size > 1;

    const context: PromptContextEntry[] = [];
    const blocks: string[] = [];

    for (const hit of results) {
        const entry: PromptContextEntry = {
            marker: context.length + 1,
            hit,
            label: formatCitationLabel(hit.chunk, includeDocument),
        };
        const block = formatContextBlock(entry);
        if (measure([...blocks, block].join(CONTEXT_BLOCK_SEPARATOR)) > maxContextSize) {
            break;
        }
        blocks.push(block);
        context.push(entry);
    }

    const { system, user } = buildPromptMessages(query, context, options.systemPrompt);

    return {
        system,
        user,
        query,
        context,
        droppedHits: results.length - context.length,
        noSupportingContext: context.length === 0,
    };
}
