import { embedMany, generateText, type EmbeddingModel, type LanguageModel } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider } from "../base";
import type { GenerateAnswerOptions } from "../types";

// Retries are owned by RequestScheduler; the SDK's own retry loop is disabled.
const SDK_MAX_RETRIES = 0;

export abstract class AiSdkEmbeddingProvider extends BaseEmbeddingProvider {
    protected abstract embeddingModel(): EmbeddingModel<string>;

    protected async sendEmbeddingRequest(chunks: string[], signal: AbortSignal): Promise<number[][]> {
        const { embeddings } = await embedMany({
            model: this.embeddingModel(),
            values: chunks,
            abortSignal: signal,
            maxRetries: SDK_MAX_RETRIES,
        });

        return embeddings;
    }
}

export abstract class AiSdkChatProvider extends BaseChatProvider {
    protected abstract languageModel(): LanguageModel;

    protected async complete(options: GenerateAnswerOptions, signal: AbortSignal): Promise<string> {
        const { text } = await generateText({
            model: this.languageModel(),
            system: options.systemPrompt,
            prompt: options.prompt,
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxOutputTokens,
            abortSignal: signal,
            maxRetries: SDK_MAX_RETRIES,
        });

        return text;
    }
}
