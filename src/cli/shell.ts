import readline from "node:readline";
import type { Logger } from "pino";
import { relevance } from "../llm/prompt";
import type { QueryOptions, QueryResult } from "../query/queryEngine";
import type { SearchResult } from "../store/types";
import { errorMessage } from "../utils/errors";
import { wrapText } from "../utils/wrapText";

/** Line-oriented terminal the shell talks through. */
export interface ShellIO {
    /** Resolves with `null` at end of input. */
    readLine(prompt: string): Promise<string | null>;
    writeLine(line: string): void;
}

export interface QueryRunner {
    query(question: string, options?: QueryOptions): Promise<QueryResult>;
}

export interface InteractiveShellOptions {
    wrapWidth?: number;
    nResults?: number;
}

const EXIT_COMMANDS = new Set(["quit", "exit", "q"]);
const RULE = "=".repeat(60);
const PROMPT = "Your question: ";

export class InteractiveShell {
    private readonly wrapWidth: number;

    constructor(
        private readonly engine: QueryRunner,
        private readonly io: ShellIO,
        private readonly logger: Logger,
        private readonly options: InteractiveShellOptions = {}
    ) {
        this.wrapWidth = options.wrapWidth ?? 80;
    }

    async run(): Promise<void> {
        this.io.writeLine(RULE);
        this.io.writeLine("Publication assistant");
        this.io.writeLine("Ask questions about the indexed publications. Type 'quit' to exit.");
        this.io.writeLine(RULE);

        for (;;) {
            const line = await this.io.readLine(PROMPT);
            if (line === null) {
                break;
            }

            const question = line.trim();
            if (!question) {
                continue;
            }
            if (EXIT_COMMANDS.has(question.toLowerCase())) {
                break;
            }

            try {
                await this.handleQuestion(question);
            } catch (error) {
                this.logger.error({ err: error }, "Question handling failed.");
                this.io.writeLine(`Error: ${errorMessage(error)}`);
            }
        }

        this.io.writeLine("Goodbye!");
    }

    async handleQuestion(question: string): Promise<void> {
        this.io.writeLine("Searching publications...");
        const result = await this.engine.query(question, { nResults: this.options.nResults });

        this.io.writeLine("");
        this.io.writeLine(RULE);

        if (!result.ok) {
            const { error } = result;
            if (error.kind === "retrieval") {
                this.io.writeLine(`Could not search the publications: ${error.message}`);
            } else {
                this.writeSources(error.results);
                this.io.writeLine(`The language model is unavailable: ${error.message}`);
            }
            this.io.writeLine(RULE);
            return;
        }

        this.writeSources(result.value.results);
        this.io.writeLine("Answer:");
        this.io.writeLine(wrapText(result.value.answer, this.wrapWidth));
        this.io.writeLine(RULE);
    }

    private writeSources(results: SearchResult[]): void {
        this.io.writeLine(`Sources used (${results.length} documents):`);
        results.forEach((result, index) => {
            this.io.writeLine(`   ${index + 1}. ${result.metadata.title}`);
            this.io.writeLine(`      by ${result.metadata.username} (relevance: ${relevance(result).toFixed(3)})`);
        });
        this.io.writeLine("");
    }
}

/** ShellIO over stdin/stdout. Call `close` once the shell returns. */
export function createConsoleIO(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): ShellIO & { close(): void } {
    const rl = readline.createInterface({ input, output, terminal: false });
    const lines = rl[Symbol.asyncIterator]();

    return {
        async readLine(prompt) {
            output.write(prompt);
            const next = await lines.next();
            return next.done ? null : next.value;
        },
        writeLine(line) {
            output.write(`${line}\n`);
        },
        close() {
            rl.close();
        },
    };
}
