import { loadAppConfig } from "../config/loadConfig";
import { TokenChunker } from "../ingest/chunker";
import { createLLMClient } from "../llm/factory";
import { RagQueryEngine } from "../query/queryEngine";
import { PublicationVectorIndex } from "../store/vectorIndex";
import { configureLogger, getLogger } from "../utils/logger";
import { createTokenizer } from "../utils/tokenEncoder";
import { InteractiveShell, createConsoleIO } from "./shell";

interface CliOptions {
    configPath?: string;
}

function printHelp(): void {
    const lines = [
        "Usage: chat [--config <path>]",
        "",
        "Options:",
        "  -c, --config   Path to .env file (defaults to .env in the working directory).",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions | null {
    let configPath: string | undefined;

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
            default:
                throw new Error(`Unknown argument: ${arg}`);
        }
    }

    return { configPath };
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    if (!options) {
        return;
    }

    const config = loadAppConfig(options.configPath);
    const logger = configureLogger(config.logging);

    // Provider constructors reject missing credentials before the shell starts.
    const llm = createLLMClient(config.llm, logger);
    const chunker = new TokenChunker(createTokenizer(config.chunking.encoding), config.chunking);
    const index = await PublicationVectorIndex.open(config.index, llm.embedding, chunker, logger);

    const stored = await index.count();
    logger.info(`Vector collection holds ${stored} chunks.`);
    if (stored === 0) {
        logger.warn("The collection is empty. Run the ingest command first to index publications.");
    }

    const engine = new RagQueryEngine(index, llm.chat, {
        matchCount: config.retrieval.matchCount,
        logger,
    });

    const io = createConsoleIO();
    try {
        await new InteractiveShell(engine, io, logger).run();
    } finally {
        io.close();
    }
}

main().catch((error) => {
    getLogger().error({ err: error }, "Chat session failed.");
    process.exitCode = 1;
});
