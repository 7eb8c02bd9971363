import fs from "node:fs/promises";
import path from "node:path";
import { LoadError, errorMessage } from "../errors";
import { extractSectionTitle } from "../utils/extractTitle";
import type { DocumentFormat, SourceDocument, TextUnit } from "./types";

const PDF_EXTENSIONS = new Set([".pdf"]);
const TEXT_EXTENSIONS = new Set([".txt", ".md"]);
const FORM_FEED = "\f";

export function documentFormatFor(filePath: string): DocumentFormat | undefined {
    const extension = path.extname(filePath).toLowerCase();
    if (PDF_EXTENSIONS.has(extension)) {
        return "pdf";
    }
    if (TEXT_EXTENSIONS.has(extension)) {
        return "text";
    }
    return undefined;
}

async function statPath(targetPath: string) {
    try {
        return await fs.stat(targetPath);
    } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code === "ENOENT") {
            throw new LoadError(`Source document not found at "${targetPath}".`, error);
        }
        throw new LoadError(`Cannot access "${targetPath}": ${errorMessage(error)}`, error);
    }
}

async function extractPdfPages(data: Uint8Array, filePath: string): Promise<string[]> {
    const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
    const loadingTask = pdfjs.getDocument({ data, isEvalSupported: false, useSystemFonts: true });

    try {
        const pdf = await loadingTask.promise;
        const pages: string[] = [];

        for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
            const page = await pdf.getPage(pageNumber);
            const content = await page.getTextContent();
            const text = content.items
                .map((item) => ("str" in item ? `${item.str}${item.hasEOL ? "\n" : ""}` : ""))
                .join("");
            pages.push(text.trim());
        }

        return pages;
    } catch (error) {
        throw new LoadError(`Failed to parse PDF "${filePath}": ${errorMessage(error)}`, error);
    } finally {
        await loadingTask.destroy();
    }
}

function splitTextPages(content: string): string[] {
    return content.replace(/^\uFEFF/, "").split(FORM_FEED);
}

/** Empty pages stay in place so page numbers match the source. */
function toUnits(pages: string[]): TextUnit[] {
    let currentSection: string | undefined;

    return pages.map((text, index) => {
        currentSection = extractSectionTitle(text) ?? currentSection;
        const unit: TextUnit = { page: index + 1, text };
        if (currentSection) {
            unit.section = currentSection;
        }
        return unit;
    });
}

export async function loadDocument(filePath: string, documentId: string = path.basename(filePath)): Promise<SourceDocument> {
    const stats = await statPath(filePath);
    if (!stats.isFile()) {
        throw new LoadError(`"${filePath}" is not a file.`);
    }

    const format = documentFormatFor(filePath);
    if (!format) {
        throw new LoadError(`Unsupported document format "${path.extname(filePath) || "(none)"}" for "${filePath}". Expected .pdf, .txt or .md.`);
    }

    let buffer: Buffer;
    try {
        buffer = await fs.readFile(filePath);
    } catch (error) {
        throw new LoadError(`Failed to read "${filePath}": ${errorMessage(error)}`, error);
    }

    const pages = format === "pdf"
        ? await extractPdfPages(new Uint8Array(buffer), filePath)
        : splitTextPages(buffer.toString("utf8"));

    return {
        id: documentId,
        path: filePath,
        format,
        units: toUnits(pages),
    };
}

async function findSupportedFiles(directory: string): Promise<string[]> {
    const files: string[] = [];

    async function walk(current: string): Promise<void> {
        const entries = await fs.readdir(current, { withFileTypes: true });
        for (const entry of entries) {
            const fullPath = path.join(current, entry.name);
            if (entry.isDirectory()) {
                if (!entry.name.startsWith(".") && entry.name !== "node_modules") {
                    await walk(fullPath);
                }
            } else if (entry.isFile() && documentFormatFor(entry.name)) {
                files.push(fullPath);
            }
        }
    }

    try {
        await walk(directory);
    } catch (error) {
        throw new LoadError(`Failed to scan "${directory}": ${errorMessage(error)}`, error);
    }

    return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

function toDocumentId(root: string, filePath: string): string {
    return path.relative(root, filePath).split(path.sep).join("/");
}

/**
 * Loads a single document, or every supported document under a directory in path order.
 */
export async function loadDocuments(inputPath: string): Promise<SourceDocument[]> {
    const stats = await statPath(inputPath);

    if (stats.isFile()) {
        return [await loadDocument(inputPath)];
    }

    const files = await findSupportedFiles(inputPath);
    if (files.length === 0) {
        throw new LoadError(`No .pdf, .txt or .md documents found under "${inputPath}".`);
    }

    const documents: SourceDocument[] = [];
    for (const file of files) {
        documents.push(await loadDocument(file, toDocumentId(inputPath, file)));
    }
    return documents;
}
