export type ChunkMetadata = {
    publication_id: string;
    title: string;
    username: string;
    source: string;
    chunk_index: number;
    total_chunks: number;
};

export interface IndexedRecord {
    /** `<publication id>_<chunk index>` */
    id: string;
    text: string;
    metadata: ChunkMetadata;
}

export interface SearchResult {
    content: string;
    metadata: ChunkMetadata;
    /** 1 - cosine similarity; lower is closer. */
    distance: number;
}
