import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../utils/errors";
import { buildAppConfig, resolveConfigPath } from "./loadConfig";

describe("buildAppConfig", () => {
    it("applies the documented defaults", () => {
        const config = buildAppConfig({});

        expect(config.logging).toEqual({ level: "info", pretty: true });
        expect(config.data).toEqual({
            publicationsPath: path.resolve(process.cwd(), "documents/publications.json"),
            minContentLength: 100,
        });
        expect(config.chunking).toEqual({ chunkSize: 512, overlap: 50, encoding: "cl100k_base" });
        expect(config.index).toEqual({
            directory: path.resolve(process.cwd(), ".vector-index"),
            collection: "publications",
        });
        expect(config.retrieval.matchCount).toBe(3);
        expect(config.llm.embedding.provider).toBe("openai");
        expect(config.llm.embedding.model).toBe("text-embedding-3-small");
        expect(config.llm.chat).toMatchObject({
            provider: "groq",
            model: "llama-3.1-8b-instant",
            temperature: 0.3,
            maxOutputTokens: 1000,
        });
        expect(config.llm.chat.limits?.timeoutMs).toBeUndefined();
        expect(config.llm.embedding.limits?.batchSize).toBeUndefined();
    });

    it("falls back to vendor API key variables", () => {
        const config = buildAppConfig({ GROQ_API_KEY: "test-secret", OPENAI_API_KEY: "test-embed-secret" });

        expect(config.llm.chat.apiKey).toBe("test-secret");
        expect(config.llm.embedding.apiKey).toBe("test-embed-secret");
    });

    it("prefers scoped API keys over vendor ones", () => {
        const config = buildAppConfig({ GROQ_API_KEY: "test-secret", PUBRAG_LLM_CHAT_API_KEY: "test-scoped-secret" });

        expect(config.llm.chat.apiKey).toBe("test-scoped-secret");
    });

    it("uses the Google generative AI key name for google", () => {
        const config = buildAppConfig({
            PUBRAG_LLM_CHAT_PROVIDER: "Google",
            GOOGLE_GENERATIVE_AI_API_KEY: "test-secret",
        });

        expect(config.llm.chat.provider).toBe("google");
        expect(config.llm.chat.apiKey).toBe("test-secret");
    });

    it("reads overrides", () => {
        const config = buildAppConfig({
            PUBRAG_LOGGING_LEVEL: "DEBUG",
            PUBRAG_LOGGING_PRETTY: "no",
            PUBRAG_CHUNK_SIZE: "256",
            PUBRAG_CHUNK_OVERLAP: "0",
            PUBRAG_RETRIEVAL_MATCH_COUNT: "5",
            PUBRAG_LLM_CHAT_TEMPERATURE: "0.7",
            PUBRAG_LLM_CHAT_LIMITS_RETRIES: "1",
        });

        expect(config.logging).toEqual({ level: "debug", pretty: false });
        expect(config.chunking.chunkSize).toBe(256);
        expect(config.chunking.overlap).toBe(0);
        expect(config.retrieval.matchCount).toBe(5);
        expect(config.llm.chat.temperature).toBe(0.7);
        expect(config.llm.chat.limits?.retries).toBe(1);
    });

    it("rejects an overlap that is not smaller than the chunk size", () => {
        expect(() => buildAppConfig({ PUBRAG_CHUNK_SIZE: "100", PUBRAG_CHUNK_OVERLAP: "100" })).toThrow(ConfigError);
    });

    it("rejects unknown tokenizer encodings", () => {
        expect(() => buildAppConfig({ PUBRAG_CHUNK_ENCODING: "cl200k_base" })).toThrow(ConfigError);
        expect(buildAppConfig({ PUBRAG_CHUNK_ENCODING: "o200k_base" }).chunking.encoding).toBe("o200k_base");
    });

    it("rejects invalid values", () => {
        expect(() => buildAppConfig({ PUBRAG_CHUNK_SIZE: "large" })).toThrow(ConfigError);
        expect(() => buildAppConfig({ PUBRAG_LLM_CHAT_PROVIDER: "cohere" })).toThrow(ConfigError);
        expect(() => buildAppConfig({ PUBRAG_LOGGING_LEVEL: "verbose" })).toThrow(ConfigError);
        expect(() => buildAppConfig({ PUBRAG_RETRIEVAL_MATCH_COUNT: "0" })).toThrow(ConfigError);
        expect(() => buildAppConfig({ PUBRAG_LLM_CHAT_LIMITS_RETRIES: "many" })).toThrow(ConfigError);
    });
});

describe("resolveConfigPath", () => {
    it("resolves an explicit path against the working directory", () => {
        expect(resolveConfigPath("config/dev.env")).toBe(path.resolve(process.cwd(), "config/dev.env"));
    });
});
