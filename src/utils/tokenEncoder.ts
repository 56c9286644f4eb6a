import { get_encoding, encoding_for_model, type Tiktoken, type TiktokenEncoding, type TiktokenModel } from "tiktoken";

const TOKENIZER_FALLBACK: TiktokenEncoding = "cl100k_base";
export const TIKTOKEN_ENCODINGS: readonly TiktokenEncoding[] = ["gpt2", "r50k_base", "p50k_base", "p50k_edit", "cl100k_base", "o200k_base"];

const encoderCache = new Map<string, Tiktoken>();
const utf8 = new TextDecoder();

/** Subword tokenizer used to bound chunk sizes. */
export interface Tokenizer {
    readonly name: string;
    encode(text: string): number[];
    decode(tokens: readonly number[]): string;
}

export function isEncodingName(value: string): value is TiktokenEncoding {
    return TIKTOKEN_ENCODINGS.some((encoding) => encoding === value);
}

function cached(key: string, create: () => Tiktoken): Tiktoken {
    const existing = encoderCache.get(key);
    if (existing) {
        return existing;
    }
    const encoder = create();
    encoderCache.set(key, encoder);
    return encoder;
}

/** Encoder for a model name, falling back to cl100k_base for models tiktoken does not know. */
export function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLocaleLowerCase();
    return cached(key, () => {
        if (isEncodingName(key)) {
            return get_encoding(key);
        }
        try {
            // encoding_for_model throws for names outside its table.
            return encoding_for_model(key as TiktokenModel);
        } catch {
            return get_encoding(TOKENIZER_FALLBACK);
        }
    });
}

export function createTokenizer(encoding: string = TOKENIZER_FALLBACK): Tokenizer {
    const encoder = getEncoder(encoding);
    return {
        name: encoding,
        // Special-token markers in publication text are encoded as plain text.
        encode: (text) => Array.from(encoder.encode(text, [], [])),
        decode: (tokens) => utf8.decode(encoder.decode(Uint32Array.from(tokens))),
    };
}

export function countTokens(chunk: string, model?: string): number {
    if (!chunk) return 0;
    return getEncoder(model).encode(chunk, [], []).length;
}

export function countTokensInBatch(chunks: string[], model?: string): number {
    return chunks.reduce((sum, current) => sum + countTokens(current, model), 0);
}
