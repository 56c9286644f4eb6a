import type { Logger } from "pino";
import { createAnthropic } from "@ai-sdk/anthropic";
import type { LanguageModel } from "ai";
import type { ChatModelConfig } from "../../config/types";
import { ConfigError } from "../../utils/errors";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";
import { AiSdkChatProvider } from "./aiSdk";

const ANTHROPIC_DEFAULT_BASE_URL = "https://api.anthropic.com/v1/";

export class AnthropicChatProvider extends AiSdkChatProvider {
    private readonly sdk: ReturnType<typeof createAnthropic>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("Anthropic API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 1,
                    maxRequestsPerMinute: 50,
                    maxTokensPerMinute: 40_000,
                    retries: 3,
                    timeoutMs: 60_000,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createAnthropic({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, ANTHROPIC_DEFAULT_BASE_URL),
        });
    }

    protected languageModel(): LanguageModel {
        return this.sdk(this.config.model);
    }
}
