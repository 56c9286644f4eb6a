import type { Logger } from "pino";
import { createOpenAI } from "@ai-sdk/openai";
import type { EmbeddingModel, LanguageModel } from "ai";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import { ConfigError } from "../../utils/errors";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";
import { AiSdkChatProvider, AiSdkEmbeddingProvider } from "./aiSdk";

const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com/v1/";

export class OpenAIEmbeddingProvider extends AiSdkEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("OpenAI API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 100,
                    concurrency: 1,
                    maxRequestsPerMinute: 1_500,
                    maxTokensPerMinute: 1_000_000,
                    retries: 3,
                    timeoutMs: 30_000,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, OPENAI_DEFAULT_BASE_URL),
        });
    }

    protected embeddingModel(): EmbeddingModel<string> {
        return this.sdk.embedding(this.config.model);
    }
}

export class OpenAIChatProvider extends AiSdkChatProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("OpenAI API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 1,
                    maxRequestsPerMinute: 500,
                    maxTokensPerMinute: 90_000,
                    retries: 3,
                    timeoutMs: 60_000,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, OPENAI_DEFAULT_BASE_URL),
        });
    }

    protected languageModel(): LanguageModel {
        return this.sdk(this.config.model);
    }
}
