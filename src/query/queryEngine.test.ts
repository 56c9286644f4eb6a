import { describe, expect, it, vi } from "vitest";
import { DEFAULT_SYSTEM_MESSAGE, buildRagPrompt, formatContext } from "../llm/prompt";
import type { SearchResult } from "../store/types";
import { ScriptedChatProvider, searchResult, silentLogger } from "../testing/fakes";
import { EmbeddingError, GenerationError, RetrievalError } from "../utils/errors";
import { RagQueryEngine, type QueryStage, type SearchableIndex } from "./queryEngine";

function fakeIndex(results: SearchResult[]) {
    const search = vi.fn(async (_query: string, _nResults: number) => results);
    const index: SearchableIndex = { search };
    return { index, search };
}

const RESULTS = [searchResult("Attention Notes", "alice", 0.2), searchResult("Boosting Basics", "bob", 0.4)];

describe("RagQueryEngine", () => {
    it("answers from the retrieved context", async () => {
        const { index, search } = fakeIndex(RESULTS);
        const chat = new ScriptedChatProvider("Attention weighs tokens.");
        const engine = new RagQueryEngine(index, chat, { logger: silentLogger() });
        const stages: QueryStage[] = [];

        const result = await engine.query("  What is attention?  ", { onStage: (stage) => stages.push(stage) });

        expect(result).toEqual({ ok: true, value: { answer: "Attention weighs tokens.", results: RESULTS } });
        expect(search).toHaveBeenCalledTimes(1);
        expect(search.mock.calls[0]?.slice(0, 2)).toEqual(["What is attention?", 3]);
        expect(chat.calls).toHaveLength(1);
        expect(chat.calls[0]).toMatchObject({
            prompt: buildRagPrompt("What is attention?", formatContext(RESULTS)),
            systemPrompt: DEFAULT_SYSTEM_MESSAGE,
        });
        expect(stages).toEqual(["searching", "formatting-context", "building-prompt", "awaiting-model", "done"]);
    });

    it("uses the configured match count unless the call overrides it", async () => {
        const { index, search } = fakeIndex(RESULTS);
        const engine = new RagQueryEngine(index, new ScriptedChatProvider(), {
            matchCount: 5,
            logger: silentLogger(),
        });

        await engine.query("first");
        await engine.query("second", { nResults: 1 });

        expect(search.mock.calls.map((call) => call[1])).toEqual([5, 1]);
    });

    it("passes generation settings and a custom system message to the model", async () => {
        const { index } = fakeIndex(RESULTS);
        const chat = new ScriptedChatProvider();
        const engine = new RagQueryEngine(index, chat, {
            systemMessage: "Answer briefly.",
            temperature: 0.3,
            maxTokens: 1000,
            logger: silentLogger(),
        });

        await engine.query("question");

        expect(chat.calls[0]).toMatchObject({ systemPrompt: "Answer briefly.", temperature: 0.3, maxTokens: 1000 });
    });

    it("still asks the model when the index has no matches", async () => {
        const { index } = fakeIndex([]);
        const chat = new ScriptedChatProvider("General answer.");
        const engine = new RagQueryEngine(index, chat, { logger: silentLogger() });

        const result = await engine.query("Anything?");

        expect(result).toEqual({ ok: true, value: { answer: "General answer.", results: [] } });
        expect(chat.calls[0]?.prompt).toBe(buildRagPrompt("Anything?", ""));
    });

    it("reports search failures as a RetrievalError without calling the model", async () => {
        const cause = new EmbeddingError("embedding service down");
        const index: SearchableIndex = {
            search: async () => {
                throw cause;
            },
        };
        const chat = new ScriptedChatProvider();
        const engine = new RagQueryEngine(index, chat, { logger: silentLogger() });
        const stages: QueryStage[] = [];

        const result = await engine.query("What is attention?", { onStage: (stage) => stages.push(stage) });

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(RetrievalError);
            expect(result.error.message).toBe("Search failed (embedding: embedding service down)");
            expect(result.error.cause).toBe(cause);
        }
        expect(chat.calls).toEqual([]);
        expect(stages).toEqual(["searching"]);
    });

    it("reports model failures as a GenerationError that keeps the sources", async () => {
        const { index } = fakeIndex(RESULTS);
        const chat = new ScriptedChatProvider();
        chat.failure = new Error("rate limited");
        const engine = new RagQueryEngine(index, chat, { logger: silentLogger() });

        const result = await engine.query("What is attention?");

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error).toBeInstanceOf(GenerationError);
            expect(result.error.message).toBe("Error generating response: rate limited");
            expect(result.error.kind).toBe("generation");
            if (result.error.kind === "generation") {
                expect(result.error.results).toEqual(RESULTS);
            }
        }
    });

    it("rejects an empty question before searching", async () => {
        const { index, search } = fakeIndex(RESULTS);
        const engine = new RagQueryEngine(index, new ScriptedChatProvider(), { logger: silentLogger() });

        const result = await engine.query("   ");

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe("retrieval");
        }
        expect(search).not.toHaveBeenCalled();
    });
});
