import { createHash } from "node:crypto";
import { ConfigError } from "../errors";
import type { Chunk, ChunkOptions, SourceDocument, TextUnit } from "./types";

export const UNIT_SEPARATOR = "\n\n";

interface UnitSpan {
    unit: TextUnit;
    start: number;
    end: number;
}

interface JoinedDocument {
    text: string;
    spans: UnitSpan[];
}

export function validateChunkOptions(options: ChunkOptions): void {
    const { chunkSize, chunkOverlap } = options;

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new ConfigError(`chunkSize must be a positive integer, got ${chunkSize}.`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
        throw new ConfigError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}.`);
    }
    if (chunkOverlap >= chunkSize) {
        throw new ConfigError(`chunkOverlap (${chunkOverlap}) must be less than chunkSize (${chunkSize}).`);
    }
}

function joinUnits(units: TextUnit[]): JoinedDocument {
    const spans: UnitSpan[] = [];
    let text = "";

    units.forEach((unit, index) => {
        if (index > 0) {
            text += UNIT_SEPARATOR;
        }
        const start = text.length;
        text += unit.text;
        spans.push({ unit, start, end: text.length });
    });

    return { text, spans };
}

/**
 * Units overlapping [start, end). A window that only covers separator text is
 * attributed to the closest preceding unit with text.
 */
function overlappingUnits(spans: UnitSpan[], start: number, end: number): TextUnit[] {
    const overlapping = spans
        .filter((span) => span.end > span.start && span.start < end && start < span.end)
        .map((span) => span.unit);

    if (overlapping.length > 0) {
        return overlapping;
    }

    const preceding = spans.filter((span) => span.end > span.start && span.end <= start).pop();
    return preceding ? [preceding.unit] : [];
}

function windowStarts(length: number, options: ChunkOptions): number[] {
    if (length <= options.chunkSize) {
        return [0];
    }

    const step = options.chunkSize - options.chunkOverlap;
    const starts: number[] = [];
    for (let start = 0; ; start += step) {
        starts.push(start);
        if (start + options.chunkSize >= length) {
            break;
        }
    }
    return starts;
}

/**
 * Splits a document into fixed-size sliding windows of `chunkSize` characters,
 * advancing by `chunkSize - chunkOverlap`. Page boundaries are not chunk boundaries;
 * each chunk lists the pages it overlaps.
 */
export function chunkDocument(document: SourceDocument, options: ChunkOptions): Chunk[] {
    validateChunkOptions(options);

    const { text, spans } = joinUnits(document.units);
    if (text.trim().length === 0) {
        return [];
    }

    return windowStarts(text.length, options).map((start, index) => {
        const end = Math.min(start + options.chunkSize, text.length);
        const chunkText = text.slice(start, end);
        const units = overlappingUnits(spans, start, end);
        const section = units.find((unit) => unit.section)?.section;

        const chunk: Chunk = {
            id: `${document.id}#${index}`,
            documentId: document.id,
            index,
            text: chunkText,
            pages: units.map((unit) => unit.page),
            start,
            end,
            checksum: createHash("sha256").update(chunkText, "utf8").digest("hex"),
        };
        if (section) {
            chunk.section = section;
        }
        return chunk;
    });
}

export function chunkDocuments(documents: SourceDocument[], options: ChunkOptions): Chunk[] {
    validateChunkOptions(options);
    return documents.flatMap((document) => chunkDocument(document, options));
}
