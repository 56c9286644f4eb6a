import type { SearchResult } from "../store/types";

export const DEFAULT_SYSTEM_MESSAGE =
    "You are a helpful AI assistant that provides accurate, technical information about machine learning and AI.";

const CONTEXT_RULE = "-".repeat(50);

export function relevance(result: SearchResult): number {
    return 1 - result.distance;
}

/** Renders retrieved chunks as the numbered context block placed in the prompt. */
export function formatContext(results: SearchResult[]): string {
    return results
        .map((result, index) =>
            [
                `Document ${index + 1} (Relevance: ${relevance(result).toFixed(3)}):`,
                `Title: ${result.metadata.title}`,
                `Author: ${result.metadata.username}`,
                `Content: ${result.content}`,
                CONTEXT_RULE,
            ].join("\n")
        )
        .join("\n");
}

export function buildRagPrompt(question: string, context: string): string {
    return [
        "You are an AI assistant with access to technical publications about machine learning, AI, and data science.",
        "",
        "Based on the following context from relevant publications, please answer the user's question. " +
            "If the context doesn't contain enough information to fully answer the question, you can use your general knowledge " +
            "but please indicate what information comes from the provided context vs. your general knowledge.",
        "",
        "CONTEXT:",
        context,
        "",
        `QUESTION: ${question}`,
        "",
        "Please provide a comprehensive answer that:",
        "1. Directly addresses the question",
        "2. Cites specific information from the provided context when possible",
        "3. Is well-structured and easy to understand",
        "4. If using information from specific documents, mention which ones",
        "",
        "ANSWER:",
    ].join("\n");
}
