import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { silentLogger } from "../testing/fakes";
import { LoadError } from "../utils/errors";
import {
    formatPublicationStats,
    loadPublications,
    readPublications,
    summarizePublications,
    type Document,
} from "./publications";

const LONG_BODY = "x".repeat(101);

describe("publications loader", () => {
    let workDir: string;

    beforeEach(async () => {
        workDir = await fs.mkdtemp(path.join(os.tmpdir(), "pubrag-publications-"));
    });

    afterEach(async () => {
        await fs.rm(workDir, { recursive: true, force: true });
    });

    async function writeFixture(name: string, contents: string): Promise<string> {
        const filePath = path.join(workDir, name);
        await fs.writeFile(filePath, contents, "utf8");
        return filePath;
    }

    it("keeps publications longer than 100 characters and fills defaults", async () => {
        const filePath = await writeFixture(
            "publications.json",
            JSON.stringify([
                { id: 7, title: "Attention Notes", username: "alice", publication_description: LONG_BODY },
                { id: "short", title: "Too Short", username: "bob", publication_description: "brief" },
                { id: "edge", title: "Exactly 100", username: "carol", publication_description: "y".repeat(100) },
                { id: "none", title: "No Body", username: "dave" },
                { id: "anon", title: null, publication_description: LONG_BODY, extra: true },
                { publication_description: LONG_BODY },
            ])
        );

        const result = await readPublications(filePath);

        expect(result).toEqual({
            ok: true,
            value: [
                { id: "7", title: "Attention Notes", username: "alice", content: LONG_BODY, source: "json" },
                { id: "anon", title: "Untitled", username: "", content: LONG_BODY, source: "json" },
                { id: "", title: "Untitled", username: "", content: LONG_BODY, source: "json" },
            ],
        });
    });

    it("drops malformed records without losing the rest of the file", async () => {
        const filePath = await writeFixture(
            "mixed.json",
            JSON.stringify([
                { id: "numeric-title", title: 42, username: "alice", publication_description: LONG_BODY },
                "not a record",
                { id: "good", title: "Kept", username: { name: "bob" }, publication_description: LONG_BODY },
                { id: "kept", title: "Kept", username: "carol", publication_description: LONG_BODY },
            ])
        );

        const result = await readPublications(filePath, { logger: silentLogger() });

        expect(result).toEqual({
            ok: true,
            value: [{ id: "kept", title: "Kept", username: "carol", content: LONG_BODY, source: "json" }],
        });
    });

    it("counts characters by code point", async () => {
        const emojiBody = "\u{1F600}".repeat(60);
        const filePath = await writeFixture(
            "emoji.json",
            JSON.stringify([{ id: "e", publication_description: emojiBody }])
        );

        const documents = await loadPublications(filePath, { logger: silentLogger(), minContentLength: 59 });
        const strict = await loadPublications(filePath, { logger: silentLogger() });

        expect(documents.map((doc) => doc.id)).toEqual(["e"]);
        expect(strict).toEqual([]);
    });

    it("honours a custom minimum length", async () => {
        const filePath = await writeFixture(
            "custom.json",
            JSON.stringify([
                { id: "a", publication_description: "twelve chars" },
                { id: "b", publication_description: "ten chars!" },
            ])
        );

        const documents = await loadPublications(filePath, { logger: silentLogger(), minContentLength: 10 });

        expect(documents.map((doc) => doc.id)).toEqual(["a"]);
    });

    it("reports invalid JSON as a LoadError", async () => {
        const filePath = await writeFixture("broken.json", "[{ not json");

        const result = await readPublications(filePath);

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(LoadError);
            expect(result.error.kind).toBe("load");
            expect(result.error.path).toBe(filePath);
        }
    });

    it("rejects a top-level value that is not an array", async () => {
        const filePath = await writeFixture("object.json", JSON.stringify({ publications: [] }));

        const result = await readPublications(filePath);

        expect(result.ok).toBe(false);
    });

    it("returns an empty list when the file cannot be loaded", async () => {
        const missing = path.join(workDir, "missing.json");
        const broken = await writeFixture("broken.json", "{");

        await expect(loadPublications(missing, { logger: silentLogger() })).resolves.toEqual([]);
        await expect(loadPublications(broken, { logger: silentLogger() })).resolves.toEqual([]);
    });
});

describe("summarizePublications", () => {
    function doc(id: string, content: string): Document {
        return { id, title: `Title ${id}`, username: `user${id}`, content, source: "json" };
    }

    it("totals characters and words and samples the first three documents", () => {
        const documents = [
            doc("1", "alpha beta\ngamma"),
            doc("2", "\u00e9\u{1F600} x"),
            doc("3", "one"),
            doc("4", "two words"),
        ];

        const stats = summarizePublications(documents);

        expect(stats.totalPublications).toBe(4);
        expect(stats.totalCharacters).toBe(16 + 4 + 3 + 9);
        expect(stats.totalWords).toBe(3 + 2 + 1 + 2);
        expect(stats.samples.map((sample) => sample.id)).toEqual(["1", "2", "3"]);
    });
});

describe("formatPublicationStats", () => {
    it("renders totals with thousands separators and sample previews", () => {
        const lines = formatPublicationStats({
            totalPublications: 2,
            totalCharacters: 12345,
            totalWords: 2000,
            samples: [{ id: "1", title: "Attention Notes", username: "alice", content: "hello world", source: "json" }],
        });

        expect(lines).toEqual([
            "--- Publication Statistics ---",
            "Total publications: 2",
            "Total characters: 12,345",
            "Total words: 2,000",
            "--- Sample Publications ---",
            "1. Attention Notes (by alice)",
            "   Content preview: hello world...",
        ]);
    });

    it("omits the sample section when there are no documents", () => {
        expect(
            formatPublicationStats({ totalPublications: 0, totalCharacters: 0, totalWords: 0, samples: [] })
        ).toEqual(["--- Publication Statistics ---", "Total publications: 0", "Total characters: 0", "Total words: 0"]);
    });
});
