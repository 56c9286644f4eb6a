import type { Logger } from "pino";
import { createGroq } from "@ai-sdk/groq";
import type { LanguageModel } from "ai";
import type { ChatModelConfig } from "../../config/types";
import { ConfigError } from "../../utils/errors";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";
import { AiSdkChatProvider } from "./aiSdk";

const GROQ_DEFAULT_BASE_URL = "https://api.groq.com/openai/v1/";

/** Groq hosts open-weight models (Llama, Mixtral) behind a fast chat endpoint; it offers no embeddings. */
export class GroqChatProvider extends AiSdkChatProvider {
    private readonly sdk: ReturnType<typeof createGroq>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new ConfigError("Groq API key is required for chat completions. Create one at https://console.groq.com/");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 1,
                    maxRequestsPerMinute: 30,
                    maxTokensPerMinute: 6_000,
                    retries: 3,
                    timeoutMs: 60_000,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGroq({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GROQ_DEFAULT_BASE_URL),
        });
    }

    protected languageModel(): LanguageModel {
        return this.sdk(this.config.model);
    }
}
