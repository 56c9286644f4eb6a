import { loadAppConfig } from "../config/loadConfig";
import { TokenChunker } from "../ingest/chunker";
import { runIngestionPipeline, type IngestionPipelineStats } from "../ingest/pipeline";
import { createEmbeddingProvider } from "../llm/factory";
import { PublicationVectorIndex } from "../store/vectorIndex";
import { configureLogger, getLogger } from "../utils/logger";
import { createTokenizer } from "../utils/tokenEncoder";

interface CliOptions {
    configPath?: string;
    file?: string;
    reset: boolean;
}

function printHelp(): void {
    const lines = [
        "Usage: ingest [--config <path>] [--file <json>] [--reset]",
        "",
        "Options:",
        "  -c, --config   Path to .env file (defaults to .env in the working directory).",
        "  -f, --file     Publications JSON file (defaults to PUBRAG_DATA_FILE).",
        "  -r, --reset    Drop the existing vector collection before indexing.",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions | null {
    let configPath: string | undefined;
    let file: string | undefined;
    let reset = false;

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
            case "-f":
            case "--file":
                file = argv[i + 1];
                i += 1;
                break;
            case "-r":
            case "--reset":
                reset = true;
                break;
            default:
                throw new Error(`Unknown argument: ${arg}`);
        }
    }

    return { configPath, file, reset };
}

function logStats(stats: IngestionPipelineStats): void {
    const logger = getLogger();
    logger.info("=== Ingestion Statistics ===");
    logger.info(`Publications loaded: ${stats.loadedPublications}`);
    logger.info(`Chunks indexed:      ${stats.indexedChunks}`);
    logger.info(`Duration:            ${(stats.durationMs / 1000).toFixed(2)}s`);
    logger.info("============================");
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    if (!options) {
        return;
    }

    const config = loadAppConfig(options.configPath);
    const logger = configureLogger(config.logging);
    logger.info("Starting publication ingestion...");

    const embedding = createEmbeddingProvider(config.llm.embedding, logger);
    const chunker = new TokenChunker(createTokenizer(config.chunking.encoding), config.chunking);
    const index = await PublicationVectorIndex.open(
        { ...config.index, reset: options.reset },
        embedding,
        chunker,
        logger
    );

    const result = await runIngestionPipeline(config, index, logger, { file: options.file });
    logStats(result.stats);
    logger.info(`Vector collection now holds ${await index.count()} chunks.`);
}

main().catch((error) => {
    getLogger().error({ err: error }, "Fatal error during ingestion.");
    process.exitCode = 1;
});
