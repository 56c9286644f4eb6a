import pino, { type Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import type { ChatProvider, EmbedOptions, EmbeddingProvider, GenerateAnswerOptions } from "../llm/types";
import type { ChunkMetadata, SearchResult } from "../store/types";
import type { Tokenizer } from "../utils/tokenEncoder";

export function silentLogger(): Logger {
    return pino({ level: "silent" });
}

/** One token per whitespace-separated word; decoding joins words with single spaces. */
export class WordTokenizer implements Tokenizer {
    readonly name = "words";
    private readonly vocabulary: string[] = [];
    private readonly ids = new Map<string, number>();

    encode(text: string): number[] {
        return text
            .split(/\s+/)
            .filter(Boolean)
            .map((word) => {
                const known = this.ids.get(word);
                if (known !== undefined) {
                    return known;
                }
                this.vocabulary.push(word);
                this.ids.set(word, this.vocabulary.length - 1);
                return this.vocabulary.length - 1;
            });
    }

    decode(tokens: readonly number[]): string {
        return tokens.map((token) => this.vocabulary[token] ?? "").join(" ");
    }
}

/**
 * Embeds text as `[1, count(keyword_1), count(keyword_2), ...]`, so texts that
 * share keywords with a query score closer to it.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
    readonly config: EmbeddingModelConfig = { provider: "openai", model: "keyword-counter" };
    readonly calls: string[][] = [];
    failure?: Error;

    constructor(private readonly keywords: string[]) {}

    async embedDocuments(chunks: string[], _options?: EmbedOptions): Promise<number[][]> {
        this.calls.push(chunks);
        if (this.failure) {
            throw this.failure;
        }
        return chunks.map((chunk) => this.vectorFor(chunk));
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const [vector] = await this.embedDocuments([query], options);
        return vector ?? [];
    }

    private vectorFor(text: string): number[] {
        const words = text.toLowerCase().split(/\W+/);
        return [1, ...this.keywords.map((keyword) => words.filter((word) => word === keyword).length)];
    }
}

export class ScriptedChatProvider implements ChatProvider {
    readonly config: ChatModelConfig = {
        provider: "groq",
        model: "scripted",
        temperature: 0.3,
        maxOutputTokens: 1000,
    };
    readonly calls: GenerateAnswerOptions[] = [];
    failure?: Error;

    constructor(private readonly answer = "Scripted answer.") {}

    async generateAnswer(options: GenerateAnswerOptions): Promise<string> {
        this.calls.push(options);
        if (this.failure) {
            throw this.failure;
        }
        return this.answer;
    }
}

export function searchResult(title: string, username: string, distance: number, content = `${title} body`): SearchResult {
    const metadata: ChunkMetadata = {
        publication_id: title.toLowerCase().replace(/\s+/g, "-"),
        title,
        username,
        source: "json",
        chunk_index: 0,
        total_chunks: 1,
    };
    return { content, metadata, distance };
}
