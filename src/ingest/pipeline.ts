import type { Logger } from "pino";
import type { AppConfig } from "../config/types";
import { getLogger } from "../utils/logger";
import { formatPublicationStats, loadPublications, summarizePublications, type Document } from "./publications";

/** The part of the vector index ingestion writes to. */
export interface IndexWriter {
    add(documents: Document[], options?: { signal?: AbortSignal }): Promise<number>;
}

export interface IngestionPipelineOptions {
    /** Overrides `config.data.publicationsPath`. */
    file?: string;
    signal?: AbortSignal;
}

export interface IngestionPipelineStats {
    loadedPublications: number;
    totalCharacters: number;
    totalWords: number;
    indexedChunks: number;
    durationMs: number;
}

export interface IngestionPipelineResult {
    stats: IngestionPipelineStats;
}

export async function runIngestionPipeline(
    appConfig: AppConfig,
    index: IndexWriter,
    logger?: Logger,
    options: IngestionPipelineOptions = {}
): Promise<IngestionPipelineResult> {
    const ingestionLogger = (logger ?? getLogger()).child({ module: "ingest" });
    const startTime = Date.now();
    const filePath = options.file ?? appConfig.data.publicationsPath;

    const documents = await loadPublications(filePath, {
        minContentLength: appConfig.data.minContentLength,
        logger: ingestionLogger,
    });

    const summary = summarizePublications(documents);
    for (const line of formatPublicationStats(summary)) {
        ingestionLogger.info(line);
    }

    if (documents.length === 0) {
        ingestionLogger.warn(`No publications to index from ${filePath}.`);
    }

    const indexedChunks = documents.length > 0 ? await index.add(documents, { signal: options.signal }) : 0;

    return {
        stats: {
            loadedPublications: documents.length,
            totalCharacters: summary.totalCharacters,
            totalWords: summary.totalWords,
            indexedChunks,
            durationMs: Date.now() - startTime,
        },
    };
}
