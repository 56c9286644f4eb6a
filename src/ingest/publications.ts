import fs from "node:fs/promises";
import type { Logger } from "pino";
import { z } from "zod";
import { LoadError, errorMessage } from "../utils/errors";
import { getLogger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";

export interface Document {
    id: string;
    title: string;
    username: string;
    content: string;
    source: string;
}

export interface LoadPublicationsOptions {
    /** Bodies must be strictly longer than this many characters. */
    minContentLength?: number;
    logger?: Logger;
}

export interface PublicationStats {
    totalPublications: number;
    totalCharacters: number;
    totalWords: number;
    samples: Document[];
}

export const DEFAULT_MIN_CONTENT_LENGTH = 100;
const DOCUMENT_SOURCE = "json";
const SAMPLE_SIZE = 3;

const publicationRecordSchema = z
    .object({
        id: z.union([z.string(), z.number()]).nullish(),
        title: z.string().nullish(),
        username: z.string().nullish(),
        publication_description: z.unknown(),
    })
    .passthrough();

const publicationFileSchema = z.array(z.unknown());

type PublicationRecord = z.infer<typeof publicationRecordSchema>;

/** Length in code points, so astral characters count once. */
function characterCount(text: string): number {
    return Array.from(text).length;
}

function toDocument(record: PublicationRecord, minContentLength: number): Document | null {
    const content = typeof record.publication_description === "string" ? record.publication_description : "";
    if (characterCount(content) <= minContentLength) {
        return null;
    }

    return {
        id: record.id === null || record.id === undefined ? "" : String(record.id),
        title: record.title ?? "Untitled",
        username: record.username ?? "",
        content,
        source: DOCUMENT_SOURCE,
    };
}

export async function readPublications(
    filePath: string,
    options: LoadPublicationsOptions = {}
): Promise<Result<Document[], LoadError>> {
    const minContentLength = options.minContentLength ?? DEFAULT_MIN_CONTENT_LENGTH;
    const logger = options.logger;

    let raw: string;
    try {
        raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
        return err(new LoadError(`Could not read "${filePath}": ${errorMessage(error)}`, filePath, { cause: error }));
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        return err(new LoadError(`Invalid JSON in "${filePath}": ${errorMessage(error)}`, filePath, { cause: error }));
    }

    const records = publicationFileSchema.safeParse(parsed);
    if (!records.success) {
        return err(new LoadError(`Expected a JSON array of publications in "${filePath}"`, filePath, { cause: records.error }));
    }

    const documents: Document[] = [];
    let skipped = 0;
    for (const [position, value] of records.data.entries()) {
        const record = publicationRecordSchema.safeParse(value);
        if (!record.success) {
            skipped += 1;
            const issue = record.error.issues[0];
            const field = issue && issue.path.length > 0 ? ` (${issue.path.join(".")})` : "";
            logger?.warn(`Skipping malformed publication at index ${position}${field}: ${issue?.message ?? "invalid shape"}`);
            continue;
        }
        const document = toDocument(record.data, minContentLength);
        if (document) {
            documents.push(document);
        }
    }

    if (skipped > 0) {
        logger?.warn(`Skipped ${skipped} malformed publication${skipped === 1 ? "" : "s"} in ${filePath}`);
    }

    return ok(documents);
}

/** Like readPublications, but logs failures and returns an empty list instead. */
export async function loadPublications(filePath: string, options: LoadPublicationsOptions = {}): Promise<Document[]> {
    const logger = (options.logger ?? getLogger()).child({ module: "publications" });
    const result = await readPublications(filePath, { ...options, logger });

    if (!result.ok) {
        logger.error({ err: result.error, path: filePath }, "Error loading publications file.");
        return [];
    }

    logger.info(`Loaded ${result.value.length} publications from ${filePath}`);
    return result.value;
}

export function summarizePublications(documents: Document[]): PublicationStats {
    return {
        totalPublications: documents.length,
        totalCharacters: documents.reduce((sum, doc) => sum + characterCount(doc.content), 0),
        totalWords: documents.reduce((sum, doc) => sum + doc.content.split(/\s+/).filter(Boolean).length, 0),
        samples: documents.slice(0, SAMPLE_SIZE),
    };
}

export function formatPublicationStats(stats: PublicationStats): string[] {
    const lines = [
        "--- Publication Statistics ---",
        `Total publications: ${stats.totalPublications}`,
        `Total characters: ${stats.totalCharacters.toLocaleString("en-US")}`,
        `Total words: ${stats.totalWords.toLocaleString("en-US")}`,
    ];

    if (stats.samples.length > 0) {
        lines.push("--- Sample Publications ---");
        stats.samples.forEach((doc, index) => {
            lines.push(`${index + 1}. ${doc.title} (by ${doc.username})`);
            lines.push(`   Content preview: ${Array.from(doc.content).slice(0, 100).join("")}...`);
        });
    }

    return lines;
}
