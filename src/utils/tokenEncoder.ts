import { encoding_for_model, get_encoding, type Tiktoken, type TiktokenModel } from "tiktoken";
import type { ContextUnit } from "../config/types";

const TOKENIZER_FALLBACK = "cl100k_base";
const encoderCache = new Map<string, Tiktoken>();

export function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    try {
        encoder = encoding_for_model(key as TiktokenModel);
    } catch {
        encoder = get_encoding(TOKENIZER_FALLBACK);
    }

    encoderCache.set(key, encoder);
    return encoder;
}

export function countTokens(text: string, model?: string): number {
    if (!text) return 0;
    try {
        // special tokens such as <|endoftext|> are counted as plain text
        return getEncoder(model).encode(text, [], []).length;
    } catch {
        return Math.ceil(text.length / 4);
    }
}

export function countTokensInBatch(texts: string[], model?: string): number {
    return texts.reduce((sum, current) => sum + countTokens(current, model), 0);
}

export type TextMeasure = (text: string) => number;

export const measureCharacters: TextMeasure = (text) => text.length;

export function createTextMeasure(unit: ContextUnit, model?: string): TextMeasure {
    return unit === "tokens" ? (text) => countTokens(text, model) : measureCharacters;
}
