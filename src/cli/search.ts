import { loadAppConfig } from "../config/loadConfig";
import { TokenChunker } from "../ingest/chunker";
import { createEmbeddingProvider } from "../llm/factory";
import { PublicationVectorIndex } from "../store/vectorIndex";
import { configureLogger, getLogger } from "../utils/logger";
import { createTokenizer } from "../utils/tokenEncoder";

interface CliOptions {
    configPath?: string;
    count?: number;
    query: string;
}

function printHelp(): void {
    const lines = [
        "Usage: search [--config <path>] [-n <count>] <query...>",
        "",
        "Options:",
        "  -c, --config   Path to .env file (defaults to .env in the working directory).",
        "  -n, --count    Number of chunks to return (defaults to PUBRAG_RETRIEVAL_MATCH_COUNT).",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions | null {
    let configPath: string | undefined;
    let count: number | undefined;
    const words: string[] = [];

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        switch (arg) {
            case "-h":
            case "--help":
                printHelp();
                return null;
            case "-c":
            case "--config":
                configPath = argv[i + 1];
                i += 1;
                break;
            case "-n":
            case "--count":
                {
                    const value = Number.parseInt(argv[i + 1] ?? "", 10);
                    if (Number.isNaN(value) || value <= 0) {
                        throw new Error("The --count option must be a positive integer.");
                    }
                    count = value;
                    i += 1;
                }
                break;
            default:
                words.push(arg);
                break;
        }
    }

    const query = words.join(" ").trim();
    if (!query) {
        printHelp();
        throw new Error("A search query is required.");
    }

    return { configPath, count, query };
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    if (!options) {
        return;
    }

    const config = loadAppConfig(options.configPath);
    const logger = configureLogger(config.logging);

    const embedding = createEmbeddingProvider(config.llm.embedding, logger);
    const chunker = new TokenChunker(createTokenizer(config.chunking.encoding), config.chunking);
    const index = await PublicationVectorIndex.open(config.index, embedding, chunker, logger);

    const results = await index.search(options.query, options.count ?? config.retrieval.matchCount);
    if (results.length === 0) {
        console.log("No matching chunks found.");
        return;
    }

    results.forEach((result, i) => {
        console.log(`${i + 1}. ${result.metadata.title} (distance: ${result.distance.toFixed(3)})`);
    });
}

main().catch((error) => {
    getLogger().error({ err: error }, "Search failed.");
    process.exitCode = 1;
});
