import type { Logger } from "pino";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import type { EmbeddingModel, LanguageModel } from "ai";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import { ConfigError } from "../../utils/errors";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";
import { AiSdkChatProvider, AiSdkEmbeddingProvider } from "./aiSdk";

const GOOGLE_DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/";

export class GoogleEmbeddingProvider extends AiSdkEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("Google API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    // The batch embedding endpoint accepts at most 100 inputs per call.
                    batchSize: 100,
                    concurrency: 1,
                    maxRequestsPerMinute: 1_500,
                    retries: 3,
                    timeoutMs: 30_000,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GOOGLE_DEFAULT_BASE_URL),
        });
    }

    protected embeddingModel(): EmbeddingModel<string> {
        return this.sdk.textEmbeddingModel(this.config.model);
    }
}

export class GoogleChatProvider extends AiSdkChatProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("Google API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 1,
                    maxRequestsPerMinute: 60,
                    maxTokensPerMinute: 1_000_000,
                    retries: 3,
                    timeoutMs: 60_000,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GOOGLE_DEFAULT_BASE_URL),
        });
    }

    protected languageModel(): LanguageModel {
        return this.sdk(this.config.model);
    }
}
