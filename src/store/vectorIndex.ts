import path from "node:path";
import type { Logger } from "pino";
import { LocalIndex } from "vectra";
import { z } from "zod";
import type { Document } from "../ingest/publications";
import type { TokenChunker } from "../ingest/chunker";
import type { EmbeddingProvider } from "../llm/types";
import { EmbeddingError, VectorIndexError, errorMessage } from "../utils/errors";
import { getLogger } from "../utils/logger";
import type { ChunkMetadata, IndexedRecord, SearchResult } from "./types";

export interface VectorIndexOptions {
    directory: string;
    collection: string;
    /** Drop any existing collection before opening. */
    reset?: boolean;
}

export interface IndexOperationOptions {
    signal?: AbortSignal;
}

const INDEX_VERSION = 1;

const storedMetadataSchema = z.object({
    text: z.string(),
    publication_id: z.string(),
    title: z.string(),
    username: z.string(),
    source: z.string(),
    chunk_index: z.number(),
    total_chunks: z.number(),
});

export function recordId(publicationId: string, chunkIndex: number): string {
    return `${publicationId}_${chunkIndex}`;
}

/** Chunks every document and tags each chunk with its composite id and metadata. */
export function buildRecords(documents: Document[], chunker: TokenChunker): IndexedRecord[] {
    const records: IndexedRecord[] = [];

    for (const doc of documents) {
        const chunks = chunker.chunk(doc.content);
        chunks.forEach((text, chunkIndex) => {
            records.push({
                id: recordId(doc.id, chunkIndex),
                text,
                metadata: {
                    publication_id: doc.id,
                    title: doc.title,
                    username: doc.username,
                    source: doc.source,
                    chunk_index: chunkIndex,
                    total_chunks: chunks.length,
                },
            });
        });
    }

    return records;
}

/**
 * Persistent collection of embedded publication chunks. Holds the embedding
 * provider, the chunker and the on-disk vectra index for the life of the process.
 */
export class PublicationVectorIndex {
    private constructor(
        private readonly index: LocalIndex,
        private readonly embedding: EmbeddingProvider,
        private readonly chunker: TokenChunker,
        private readonly logger: Logger
    ) {}

    static async open(
        options: VectorIndexOptions,
        embedding: EmbeddingProvider,
        chunker: TokenChunker,
        logger?: Logger
    ): Promise<PublicationVectorIndex> {
        const indexLogger = (logger ?? getLogger()).child({ module: "vector-index" });
        const folder = path.join(options.directory, options.collection);
        const index = new LocalIndex(folder);

        try {
            if (options.reset || !(await index.isIndexCreated())) {
                await index.createIndex({ version: INDEX_VERSION, deleteIfExists: true });
                indexLogger.info({ folder }, "Created vector collection.");
            }
        } catch (error) {
            throw new VectorIndexError(`Could not open vector collection at "${folder}": ${errorMessage(error)}`, {
                cause: error,
            });
        }

        return new PublicationVectorIndex(index, embedding, chunker, indexLogger);
    }

    /**
     * Chunks, embeds and upserts the documents. Returns the number of distinct
     * records written; a composite id repeated within the call keeps its last chunk.
     */
    async add(documents: Document[], options: IndexOperationOptions = {}): Promise<number> {
        const records = this.uniqueRecords(buildRecords(documents, this.chunker));

        if (records.length === 0) {
            this.logger.info(`Added 0 chunks from ${documents.length} publications`);
            return 0;
        }

        const vectors = await this.embed(
            records.map((record) => record.text),
            options.signal
        );

        try {
            await this.index.beginUpdate();
            for (const [i, record] of records.entries()) {
                const vector = vectors[i];
                if (!vector) {
                    throw new Error(`Missing embedding for chunk ${record.id}`);
                }
                await this.index.upsertItem({
                    id: record.id,
                    vector,
                    metadata: { ...record.metadata, text: record.text },
                });
            }
            await this.index.endUpdate();
        } catch (error) {
            this.index.cancelUpdate();
            throw new VectorIndexError(`Failed to write ${records.length} chunks: ${errorMessage(error)}`, {
                cause: error,
            });
        }

        this.logger.info(`Added ${records.length} chunks from ${documents.length} publications`);
        return records.length;
    }

    /** Nearest chunks to `query`, closest first. */
    async search(query: string, nResults: number, options: IndexOperationOptions = {}): Promise<SearchResult[]> {
        if (!Number.isInteger(nResults) || nResults < 1) {
            throw new RangeError(`nResults must be a positive integer, got: ${nResults}`);
        }

        const queryVector = await this.embedding.embedQuery(query, { signal: options.signal }).catch((error: unknown) => {
            throw new EmbeddingError(
                `Failed to embed the query with ${this.embedding.config.provider}:${this.embedding.config.model}: ${errorMessage(error)}`,
                { cause: error }
            );
        });

        const matches = await this.index.queryItems(queryVector, nResults).catch((error: unknown) => {
            throw new VectorIndexError(`Vector search failed: ${errorMessage(error)}`, { cause: error });
        });

        const results: SearchResult[] = matches.slice(0, nResults).map((match) => {
            const stored = storedMetadataSchema.safeParse(match.item.metadata);
            if (!stored.success) {
                throw new VectorIndexError(`Stored record ${match.item.id} has malformed metadata.`, {
                    cause: stored.error,
                });
            }
            const { text, ...metadata } = stored.data;
            return { content: text, metadata: metadata satisfies ChunkMetadata, distance: 1 - match.score };
        });

        return results.sort((a, b) => a.distance - b.distance);
    }

    async count(): Promise<number> {
        try {
            const items = await this.index.listItems();
            return items.length;
        } catch (error) {
            throw new VectorIndexError(`Could not list the vector collection: ${errorMessage(error)}`, { cause: error });
        }
    }

    private uniqueRecords(records: IndexedRecord[]): IndexedRecord[] {
        const byId = new Map<string, IndexedRecord>();
        for (const record of records) {
            if (byId.has(record.id)) {
                this.logger.warn({ id: record.id }, "Duplicate chunk id in batch; the later chunk replaces the earlier one.");
                byId.delete(record.id);
            }
            byId.set(record.id, record);
        }
        return [...byId.values()];
    }

    private async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        try {
            return await this.embedding.embedDocuments(texts, { signal });
        } catch (error) {
            throw new EmbeddingError(
                `Failed to embed ${texts.length} text${texts.length === 1 ? "" : "s"} with ${this.embedding.config.provider}:${this.embedding.config.model}: ${errorMessage(error)}`,
                { cause: error }
            );
        }
    }
}
