import type { Logger } from "pino";
import { createMistral } from "@ai-sdk/mistral";
import type { EmbeddingModel, LanguageModel } from "ai";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import { ConfigError } from "../../utils/errors";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";
import { AiSdkChatProvider, AiSdkEmbeddingProvider } from "./aiSdk";

const MISTRAL_DEFAULT_BASE_URL = "https://api.mistral.ai/v1/";

export class MistralEmbeddingProvider extends AiSdkEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createMistral>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("Mistral API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 32,
                    concurrency: 1,
                    maxRequestsPerMinute: 300,
                    maxTokensPerMinute: 500_000,
                    retries: 3,
                    timeoutMs: 30_000,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createMistral({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, MISTRAL_DEFAULT_BASE_URL),
        });
    }

    protected embeddingModel(): EmbeddingModel<string> {
        return this.sdk.textEmbeddingModel(this.config.model);
    }
}

export class MistralChatProvider extends AiSdkChatProvider {
    private readonly sdk: ReturnType<typeof createMistral>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("Mistral API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 1,
                    maxRequestsPerMinute: 300,
                    maxTokensPerMinute: 500_000,
                    retries: 3,
                    timeoutMs: 60_000,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createMistral({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, MISTRAL_DEFAULT_BASE_URL),
        });
    }

    protected languageModel(): LanguageModel {
        return this.sdk(this.config.model);
    }
}
