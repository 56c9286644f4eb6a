import pLimit from "p-limit";
import pRetry, { type FailedAttemptError } from "p-retry";
import type Bottleneck from "bottleneck";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { withTimeout } from "../utils/abort";
import { batchChunks } from "../utils/batchChunks";
import { createRateLimiter } from "../utils/rateLimiter";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import type { ChatProvider, EmbedOptions, EmbeddingProvider, GenerateAnswerOptions } from "./types";

export interface ProviderRateLimits {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
    retryDelayMs?: number;
    timeoutMs?: number;
}

interface ScheduleOptions {
    logPrefix: string;
    signal?: AbortSignal;
}

/**
 * Runs provider requests under a request-rate limiter, an optional token-rate
 * limiter, exponential-backoff retries and a per-attempt timeout.
 */
export class RequestScheduler {
    readonly concurrency: number;
    readonly retries: number;
    readonly retryDelayMs: number;
    readonly timeoutMs: number;

    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;
    private readonly tokensPerMinute?: number;

    constructor(
        limits: ProviderRateLimits,
        private readonly logger?: Logger
    ) {
        this.concurrency = Math.max(1, limits.concurrency ?? 1);
        this.retries = Math.max(0, limits.retries ?? 3);
        this.retryDelayMs = Math.max(0, limits.retryDelayMs ?? 1000);
        this.timeoutMs = Math.max(0, limits.timeoutMs ?? 0);

        this.requestLimiter = createRateLimiter(this.concurrency, limits.maxRequestsPerMinute);

        if (limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            this.tokensPerMinute = Math.max(1, Math.floor(limits.maxTokensPerMinute));
            const tokenConcurrency = Math.max(this.concurrency, this.tokensPerMinute);
            this.tokenLimiter = createRateLimiter(tokenConcurrency, this.tokensPerMinute);
        }
    }

    async schedule<T>(
        tokens: number,
        task: (signal: AbortSignal) => Promise<T>,
        { logPrefix, signal }: ScheduleOptions
    ): Promise<T> {
        await this.reserveTokens(tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(() => withTimeout(task, { timeoutMs: this.timeoutMs, signal }), {
                retries: this.retries,
                minTimeout: this.retryDelayMs,
                signal,
                onFailedAttempt: (error: FailedAttemptError) => {
                    this.logger?.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        `${logPrefix} failed attempt`
                    );
                },
            })
        );
    }

    private async reserveTokens(tokens: number): Promise<void> {
        if (!this.tokenLimiter || !this.tokensPerMinute || tokens <= 0) {
            return;
        }

        // A request larger than the whole per-minute budget would otherwise wait forever.
        const weight = Math.min(this.tokensPerMinute, Math.max(1, Math.ceil(tokens)));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
    readonly batchSize: number;
    protected readonly scheduler: RequestScheduler;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.batchSize = Math.max(1, limits.batchSize ?? 50);
        this.scheduler = new RequestScheduler(limits, logger);
    }

    async embedDocuments(chunks: string[], options?: EmbedOptions): Promise<number[][]> {
        if (chunks.length === 0) {
            return [];
        }

        const batches = batchChunks(chunks, this.batchSize).map((batch, idx) => ({
            idx,
            batch,
            tokens: countTokensInBatch(batch, this.config.model),
        }));

        const limit = pLimit(this.scheduler.concurrency);
        const logPrefix = `${this.config.provider}:embed`;
        const results = await Promise.all(
            batches.map(({ batch, idx, tokens }) =>
                limit(async () => {
                    const embeddings = await this.scheduler.schedule(
                        tokens,
                        (signal) => this.sendEmbeddingRequest(batch, signal),
                        { logPrefix, signal: options?.signal }
                    );
                    if (embeddings.length !== batch.length) {
                        throw new Error(
                            `${logPrefix} returned ${embeddings.length} embeddings for ${batch.length} inputs`
                        );
                    }
                    return { idx, embeddings };
                })
            )
        );

        const ordered = results.sort((a, b) => a.idx - b.idx);
        return ordered.flatMap((entry) => entry.embeddings);
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedDocuments([query], options);
        if (!embedding) {
            throw new Error(`${this.config.provider}:embed returned no embedding for the query`);
        }
        return embedding;
    }

    protected abstract sendEmbeddingRequest(chunks: string[], signal: AbortSignal): Promise<number[][]>;
}

export abstract class BaseChatProvider implements ChatProvider {
    protected readonly scheduler: RequestScheduler;

    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.scheduler = new RequestScheduler(limits, logger);
    }

    async generateAnswer(options: GenerateAnswerOptions): Promise<string> {
        const tokens = this.estimateTokens(options);
        return this.scheduler.schedule(tokens, (signal) => this.complete(options, signal), {
            logPrefix: `${this.config.provider}:chat`,
            signal: options.signal,
        });
    }

    protected estimateTokens(options: GenerateAnswerOptions): number {
        const model = this.config.model;
        let tokens = countTokens(options.systemPrompt, model);
        tokens += countTokens(options.prompt, model);
        tokens += options.maxTokens ?? this.config.maxOutputTokens ?? 1000;
        return tokens;
    }

    protected abstract complete(options: GenerateAnswerOptions, signal: AbortSignal): Promise<string>;
}
