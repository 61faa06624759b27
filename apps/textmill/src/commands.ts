/**
 * @fileoverview CLI commands
 *
 * Each command works against the repository interfaces only, so the
 * entry point decides the storage and tests pass in-memory repositories.
 *
 * @module commands
 */

import {
    DocumentManager,
    PREPROCESS_STEPS,
    PreprocessError,
    PreprocessPipeline,
    TextChunkManager,
    type DocumentRepository,
    type Logger,
    type PreprocessStepRunner,
    type TextChunkRepository,
} from "@textmill/core";
import { readDocumentFile, loadChunks } from "./adapters/files/index.js";
import { builtInRunner } from "./runners/index.js";
import type { TextmillConfig } from "./config/index.js";

/**
 * What a command needs to run.
 */
export interface CommandContext {
    readonly documents: DocumentRepository;
    readonly chunks: TextChunkRepository;
    readonly config: TextmillConfig;
    readonly logger: Logger;

    /** Writes one line of command output */
    readonly out: (line: string) => void;
}

type Command = (args: readonly string[], context: CommandContext) => Promise<number> | number;

export const USAGE = [
    "Usage: textmill <command> [arguments]",
    "",
    "Commands:",
    "  import <file...>           Import text files, one document per file",
    "  status                     Show preprocessing progress",
    "  run [--override]           Run the configured preprocess steps",
    "  sentences <documentId>     Print a document's sentences, one per line",
    "  import-chunks <file.yml>   Import chunks and entity mentions",
    "  cooccur <key> <key> [...]  List chunks mentioning every entity key",
].join("\n");

const importDocuments: Command = (args, { documents, logger, out }) => {
    if (args.length === 0) {
        out("Usage: textmill import <file...>");
        return 1;
    }

    for (const file of args) {
        const document = documents.save(readDocumentFile(file));
        logger.debug("Document imported", { documentId: document.id, file });
    }

    out(`Imported ${args.length} document(s)`);
    return 0;
};

const status: Command = (_args, { documents, out }) => {
    const report = new DocumentManager(documents).countByPreprocessStatus();

    out(`Documents: ${report.total} (raw: ${report.raw})`);
    for (const step of PREPROCESS_STEPS) {
        const counts = report.steps[step];
        out(`  ${step.padEnd(14)}done ${counts.done}, lacking ${counts.lacking}`);
    }
    return 0;
};

const run: Command = async (args, { documents, config, logger, out }) => {
    const runners: PreprocessStepRunner[] = [];

    for (const step of config.pipeline.steps) {
        const runner = builtInRunner(step);
        if (runner) {
            runners.push(runner);
        }
        else {
            logger.warn("No built-in runner for step, skipping", { step });
        }
    }

    const pipeline = new PreprocessPipeline({ repository: documents, runners, logger });

    pipeline.eventBus.subscribe("document:failed", (event) => {
        out(`[FAILED] ${String(event.data?.documentId)} (${String(event.data?.step)}): ${String(event.data?.error)}`);
    });

    const report = await pipeline.processAll({
        override: config.pipeline.override || args.includes("--override"),
    });

    for (const step of report.steps) {
        out(`${step.step}: processed ${step.processed}, skipped ${step.skipped}, failed ${step.failed}`);
    }

    return report.steps.some((step) => step.failed > 0) ? 1 : 0;
};

const sentences: Command = (args, { documents, out }) => {
    const [documentId] = args;
    if (documentId === undefined) {
        out("Usage: textmill sentences <documentId>");
        return 1;
    }

    const document = documents.findById(documentId);
    if (!document) {
        out(`Document not found: ${documentId}`);
        return 1;
    }

    try {
        for (const sentence of document.getSentences()) {
            out(sentence.join(" "));
        }
    }
    catch (error) {
        if (error instanceof PreprocessError) {
            out(error.message);
            return 1;
        }
        throw error;
    }
    return 0;
};

const importChunks: Command = (args, { chunks, logger, out }) => {
    const [file] = args;
    if (file === undefined) {
        out("Usage: textmill import-chunks <file.yml>");
        return 1;
    }

    const loaded = loadChunks(file);
    for (const chunk of loaded) {
        chunks.save(chunk);
    }

    logger.debug("Chunks imported", { file, chunks: loaded.length });
    out(`Imported ${loaded.length} chunk(s)`);
    return 0;
};

const cooccur: Command = (args, { chunks, out }) => {
    if (args.length < 2) {
        out("Usage: textmill cooccur <key> <key> [key...]");
        return 1;
    }

    const found = new TextChunkManager(chunks).chunksWithAllEntities(...args.map((key) => ({ key })));
    if (found.length === 0) {
        out(`No chunks mention all of: ${args.join(", ")}`);
        return 0;
    }

    for (const chunk of found) {
        out(`${chunk.id} (${chunk.documentId}@${chunk.offset}): ${chunk.tokens.join(" ")}`);
    }
    return 0;
};

const COMMANDS: ReadonlyMap<string, Command> = new Map([
    ["import", importDocuments],
    ["status", status],
    ["run", run],
    ["sentences", sentences],
    ["import-chunks", importChunks],
    ["cooccur", cooccur],
]);

/**
 * Run a CLI command.
 *
 * @returns The process exit code
 */
export async function runCommand(
    name: string | undefined,
    args: readonly string[],
    context: CommandContext
): Promise<number> {
    const command = name === undefined ? undefined : COMMANDS.get(name);
    if (!command) {
        context.out(USAGE);
        return name === undefined || name === "help" ? 0 : 1;
    }

    return command(args, context);
}
