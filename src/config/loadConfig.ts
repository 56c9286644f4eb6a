import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { ConfigError } from "../utils/errors";
import { validateChunkingOptions } from "../ingest/chunker";
import { TIKTOKEN_ENCODINGS, isEncodingName } from "../utils/tokenEncoder";
import {
    LLM_PROVIDER_NAMES,
    LOG_LEVELS,
    type AppConfig,
    type LLMProviderName,
    type LogLevel,
} from "./types";

const DEFAULT_ENV_FILENAME = ".env";

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
    const value = getEnv(env, key);
    if (!value) {
        return defaultValue;
    }
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
        throw new ConfigError(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getOptionalEnvNumber(env: Env, key: string): number | undefined {
    return getEnv(env, key) === undefined ? undefined : getEnvNumber(env, key, 0);
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
    const value = getEnv(env, key);
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function isProviderName(value: string): value is LLMProviderName {
    return LLM_PROVIDER_NAMES.some((name) => name === value);
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function getProvider(env: Env, key: string, defaultValue: LLMProviderName): LLMProviderName {
    const value = getEnv(env, key)?.toLowerCase() ?? defaultValue;
    if (!isProviderName(value)) {
        throw new ConfigError(
            `Environment variable ${key} must be one of ${LLM_PROVIDER_NAMES.join(", ")}, got: ${value}`
        );
    }
    return value;
}

function getLogLevel(env: Env, key: string): LogLevel {
    const value = getEnv(env, key)?.toLowerCase() ?? "info";
    if (!isLogLevel(value)) {
        throw new ConfigError(`Environment variable ${key} must be one of ${LOG_LEVELS.join(", ")}, got: ${value}`);
    }
    return value;
}

/** Provider key from the scoped variable, falling back to the vendor's usual name (e.g. GROQ_API_KEY). */
function getApiKey(env: Env, scopedKey: string, provider: LLMProviderName): string | undefined {
    const vendorKey = provider === "google" ? "GOOGLE_GENERATIVE_AI_API_KEY" : `${provider.toUpperCase()}_API_KEY`;
    return getEnv(env, scopedKey) ?? getEnv(env, vendorKey);
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.PUBRAG_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.PUBRAG_CONFIG_PATH);
    }

    return path.resolve(process.cwd(), DEFAULT_ENV_FILENAME);
}

/** Builds the application configuration from a set of environment variables. */
export function buildAppConfig(env: Env): AppConfig {
    const embeddingProvider = getProvider(env, "PUBRAG_LLM_EMBEDDING_PROVIDER", "openai");
    const chatProvider = getProvider(env, "PUBRAG_LLM_CHAT_PROVIDER", "groq");

    const chunking = {
        chunkSize: getEnvNumber(env, "PUBRAG_CHUNK_SIZE", 512),
        overlap: getEnvNumber(env, "PUBRAG_CHUNK_OVERLAP", 50),
        encoding: getEnv(env, "PUBRAG_CHUNK_ENCODING") ?? "cl100k_base",
    };
    validateChunkingOptions(chunking);
    if (!isEncodingName(chunking.encoding)) {
        throw new ConfigError(
            `PUBRAG_CHUNK_ENCODING must be one of ${TIKTOKEN_ENCODINGS.join(", ")}, got: ${chunking.encoding}`
        );
    }

    const matchCount = getEnvNumber(env, "PUBRAG_RETRIEVAL_MATCH_COUNT", 3);
    if (!Number.isInteger(matchCount) || matchCount < 1) {
        throw new ConfigError(`PUBRAG_RETRIEVAL_MATCH_COUNT must be a positive integer, got: ${matchCount}`);
    }

    return {
        logging: {
            level: getLogLevel(env, "PUBRAG_LOGGING_LEVEL"),
            pretty: getEnvBoolean(env, "PUBRAG_LOGGING_PRETTY", true),
        },
        data: {
            publicationsPath: path.resolve(
                process.cwd(),
                getEnv(env, "PUBRAG_DATA_FILE") ?? "documents/publications.json"
            ),
            minContentLength: getEnvNumber(env, "PUBRAG_DATA_MIN_CONTENT_LENGTH", 100),
        },
        chunking,
        index: {
            directory: path.resolve(process.cwd(), getEnv(env, "PUBRAG_INDEX_DIR") ?? ".vector-index"),
            collection: getEnv(env, "PUBRAG_INDEX_COLLECTION") ?? "publications",
        },
        retrieval: {
            matchCount,
        },
        llm: {
            embedding: {
                provider: embeddingProvider,
                model: getEnv(env, "PUBRAG_LLM_EMBEDDING_MODEL") ?? "text-embedding-3-small",
                apiKey: getApiKey(env, "PUBRAG_LLM_EMBEDDING_API_KEY", embeddingProvider),
                baseUrl: getEnv(env, "PUBRAG_LLM_EMBEDDING_BASE_URL"),
                limits: {
                    batchSize: getOptionalEnvNumber(env, "PUBRAG_LLM_EMBEDDING_LIMITS_BATCH_SIZE"),
                    concurrency: getOptionalEnvNumber(env, "PUBRAG_LLM_EMBEDDING_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getOptionalEnvNumber(env, "PUBRAG_LLM_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getOptionalEnvNumber(env, "PUBRAG_LLM_EMBEDDING_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getOptionalEnvNumber(env, "PUBRAG_LLM_EMBEDDING_LIMITS_RETRIES"),
                    retryDelayMs: getOptionalEnvNumber(env, "PUBRAG_LLM_EMBEDDING_LIMITS_RETRY_DELAY_MS"),
                    timeoutMs: getOptionalEnvNumber(env, "PUBRAG_LLM_EMBEDDING_LIMITS_TIMEOUT_MS"),
                },
            },
            chat: {
                provider: chatProvider,
                model: getEnv(env, "PUBRAG_LLM_CHAT_MODEL") ?? "llama-3.1-8b-instant",
                apiKey: getApiKey(env, "PUBRAG_LLM_CHAT_API_KEY", chatProvider),
                baseUrl: getEnv(env, "PUBRAG_LLM_CHAT_BASE_URL"),
                temperature: getEnvNumber(env, "PUBRAG_LLM_CHAT_TEMPERATURE", 0.3),
                maxOutputTokens: getEnvNumber(env, "PUBRAG_LLM_CHAT_MAX_OUTPUT_TOKENS", 1000),
                limits: {
                    concurrency: getOptionalEnvNumber(env, "PUBRAG_LLM_CHAT_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getOptionalEnvNumber(env, "PUBRAG_LLM_CHAT_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getOptionalEnvNumber(env, "PUBRAG_LLM_CHAT_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getOptionalEnvNumber(env, "PUBRAG_LLM_CHAT_LIMITS_RETRIES"),
                    retryDelayMs: getOptionalEnvNumber(env, "PUBRAG_LLM_CHAT_LIMITS_RETRY_DELAY_MS"),
                    timeoutMs: getOptionalEnvNumber(env, "PUBRAG_LLM_CHAT_LIMITS_TIMEOUT_MS"),
                },
            },
        },
    };
}

export function loadAppConfig(configPath?: string): AppConfig {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    if (result.error && configPath) {
        // Without an explicit path the variables may already be set in the environment.
        throw new ConfigError(`Failed to load environment file from "${configPath}": ${result.error.message}`, {
            cause: result.error,
        });
    }

    return buildAppConfig(process.env);
}
