import { ConfigError } from "../utils/errors";
import type { Tokenizer } from "../utils/tokenEncoder";

export interface ChunkingOptions {
    /** Window length in tokens. */
    chunkSize: number;
    /** Tokens shared by consecutive windows. Must be smaller than `chunkSize`. */
    overlap: number;
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
    chunkSize: 512,
    overlap: 50,
};

export function validateChunkingOptions({ chunkSize, overlap }: ChunkingOptions): void {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
        throw new ConfigError(`Chunk size must be a positive integer, got: ${chunkSize}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
        throw new ConfigError(`Chunk overlap must be a non-negative integer, got: ${overlap}`);
    }
    if (overlap >= chunkSize) {
        throw new ConfigError(`Chunk overlap (${overlap}) must be smaller than the chunk size (${chunkSize}).`);
    }
}

/**
 * Sliding windows of `chunkSize` tokens advancing by `chunkSize - overlap`.
 * Stops after the first window that reaches the end of the sequence.
 */
export function windowTokens(tokens: readonly number[], options: ChunkingOptions): number[][] {
    validateChunkingOptions(options);
    const { chunkSize, overlap } = options;
    const step = chunkSize - overlap;
    const windows: number[][] = [];

    for (let start = 0; start < tokens.length; start += step) {
        windows.push(tokens.slice(start, start + chunkSize));
        if (start + chunkSize >= tokens.length) {
            break;
        }
    }

    return windows;
}

export class TokenChunker {
    readonly options: ChunkingOptions;

    constructor(
        private readonly tokenizer: Tokenizer,
        options: Partial<ChunkingOptions> = {}
    ) {
        this.options = { ...DEFAULT_CHUNKING_OPTIONS, ...options };
        validateChunkingOptions(this.options);
    }

    chunk(text: string): string[] {
        const tokens = this.tokenizer.encode(text);

        if (tokens.length === 0) {
            return [];
        }
        if (tokens.length <= this.options.chunkSize) {
            return [text];
        }

        return windowTokens(tokens, this.options).map((window) => this.tokenizer.decode(window));
    }
}
