export type DocumentFormat = "pdf" | "text";

/** One page (or form-feed separated section) of a source document. */
export interface TextUnit {
    /** 1-based page number. */
    page: number;
    text: string;
    section?: string;
}

export interface SourceDocument {
    /** Path relative to the ingestion root, used as the citation prefix. */
    id: string;
    path: string;
    format: DocumentFormat;
    units: TextUnit[];
}

export interface Chunk {
    /** `<documentId>#<index>` */
    id: string;
    documentId: string;
    index: number;
    text: string;
    /** Pages whose text overlaps this chunk, ascending. */
    pages: number[];
    section?: string;
    /** Character offsets into the document's joined text. */
    start: number;
    end: number;
    checksum: string;
}

export interface ChunkOptions {
    chunkSize: number;
    chunkOverlap: number;
}
