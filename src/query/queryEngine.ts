import type { Logger } from "pino";
import type { ChatProvider } from "../llm/types";
import { DEFAULT_SYSTEM_MESSAGE, buildRagPrompt, formatContext } from "../llm/prompt";
import type { SearchResult } from "../store/types";
import { GenerationError, RagError, RetrievalError, errorMessage } from "../utils/errors";
import { getLogger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";

/** The part of the vector index the engine depends on. */
export interface SearchableIndex {
    search(query: string, nResults: number, options?: { signal?: AbortSignal }): Promise<SearchResult[]>;
}

export type QueryStage = "searching" | "formatting-context" | "building-prompt" | "awaiting-model" | "done";

export interface QueryOptions {
    nResults?: number;
    signal?: AbortSignal;
    onStage?: (stage: QueryStage) => void;
}

export interface RagAnswer {
    answer: string;
    results: SearchResult[];
}

export type QueryError = RetrievalError | GenerationError;

export type QueryResult = Result<RagAnswer, QueryError>;

export interface RagQueryEngineOptions {
    /** Chunks retrieved per question unless the call overrides it. */
    matchCount?: number;
    systemMessage?: string;
    temperature?: number;
    maxTokens?: number;
    logger?: Logger;
}

export class RagQueryEngine {
    private readonly matchCount: number;
    private readonly systemMessage: string;
    private readonly logger: Logger;

    constructor(
        private readonly index: SearchableIndex,
        private readonly chat: ChatProvider,
        private readonly options: RagQueryEngineOptions = {}
    ) {
        this.matchCount = options.matchCount ?? 3;
        this.systemMessage = options.systemMessage ?? DEFAULT_SYSTEM_MESSAGE;
        this.logger = (options.logger ?? getLogger()).child({ module: "query" });
    }

    async query(question: string, options: QueryOptions = {}): Promise<QueryResult> {
        const trimmedQuestion = question.trim();
        const nResults = options.nResults ?? this.matchCount;
        const enter = (stage: QueryStage) => {
            this.logger.debug({ stage }, "Query stage.");
            options.onStage?.(stage);
        };

        if (!trimmedQuestion) {
            return err(new RetrievalError("Question cannot be empty."));
        }

        enter("searching");
        let results: SearchResult[];
        try {
            results = await this.index.search(trimmedQuestion, nResults, { signal: options.signal });
        } catch (error) {
            this.logger.error({ err: error }, "Retrieval failed.");
            const detail = error instanceof RagError ? `${error.kind}: ${error.message}` : errorMessage(error);
            return err(new RetrievalError(`Search failed (${detail})`, { cause: error }));
        }

        if (results.length === 0) {
            this.logger.warn("No similar chunks found for query; answering from general knowledge.");
        }

        enter("formatting-context");
        const context = formatContext(results);

        enter("building-prompt");
        const prompt = buildRagPrompt(trimmedQuestion, context);

        enter("awaiting-model");
        let answer: string;
        try {
            answer = await this.chat.generateAnswer({
                prompt,
                systemPrompt: this.systemMessage,
                temperature: this.options.temperature,
                maxTokens: this.options.maxTokens,
                signal: options.signal,
            });
        } catch (error) {
            this.logger.error({ err: error }, "Answer generation failed.");
            return err(
                new GenerationError(`Error generating response: ${errorMessage(error)}`, results, { cause: error })
            );
        }

        enter("done");
        this.logger.info({ matchCount: results.length }, "Answer generated from retrieved context.");
        return ok({ answer, results });
    }
}
