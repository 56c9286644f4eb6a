import type { SearchResult } from "../store/types";

export type RagErrorKind = "config" | "load" | "embedding" | "index" | "retrieval" | "generation";

export abstract class RagError extends Error {
    abstract readonly kind: RagErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigError extends RagError {
    readonly kind = "config";
}

export class LoadError extends RagError {
    readonly kind = "load";

    constructor(
        message: string,
        readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class EmbeddingError extends RagError {
    readonly kind = "embedding";
}

export class VectorIndexError extends RagError {
    readonly kind = "index";
}

/** Search could not run: the query could not be embedded or the index failed. */
export class RetrievalError extends RagError {
    readonly kind = "retrieval";
}

/** The model call failed after retries. Carries the context that had been retrieved. */
export class GenerationError extends RagError {
    readonly kind = "generation";

    constructor(
        message: string,
        readonly results: SearchResult[],
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class RequestTimeoutError extends Error {
    constructor(readonly timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms`);
        this.name = "RequestTimeoutError";
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
