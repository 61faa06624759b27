/**
 * @fileoverview Unit tests for the CLI commands
 *
 * Commands run against in-memory repositories; files are mocked.
 *
 * @module __tests__/commands
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
    InMemoryDocumentRepository,
    InMemoryTextChunkRepository,
    TextDocument,
    createTextChunk,
    type Logger,
} from "@textmill/core";
import { runCommand, USAGE, type CommandContext } from "../commands.js";
import { getDefaultConfig } from "../config/index.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

function createMockLogger(): Logger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("runCommand", () => {
    let documents: InMemoryDocumentRepository;
    let chunks: InMemoryTextChunkRepository;
    let lines: string[];
    let context: CommandContext;

    beforeEach(() => {
        vi.clearAllMocks();
        documents = new InMemoryDocumentRepository();
        chunks = new InMemoryTextChunkRepository();
        lines = [];
        context = {
            documents,
            chunks,
            config: getDefaultConfig(),
            logger: createMockLogger(),
            out   : (line) => lines.push(line),
        };
    });

    describe("dispatch", () => {
        // Scenario: No command prints usage
        it("should print usage and succeed without a command", async () => {
            expect(await runCommand(undefined, [], context)).toBe(0);
            expect(lines).toEqual([USAGE]);
        });

        // Scenario: Unknown command
        it("should print usage and fail for an unknown command", async () => {
            expect(await runCommand("toString", [], context)).toBe(1);
            expect(lines).toEqual([USAGE]);
        });
    });

    describe("import", () => {
        // Scenario: One document per file
        it("should import each file as a document", async () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValueOnce("Some sentence.").mockReturnValueOnce("");

            expect(await runCommand("import", ["/corpus/one.txt", "/corpus/two.txt"], context)).toBe(0);

            expect(lines).toEqual(["Imported 2 document(s)"]);
            expect(documents.findById("one")?.text).toBe("Some sentence.");
            expect(documents.findById("two")?.text).toBe("");
        });

        // Scenario: No files given
        it("should fail without files", async () => {
            expect(await runCommand("import", [], context)).toBe(1);
            expect(lines).toEqual(["Usage: textmill import <file...>"]);
        });
    });

    describe("status", () => {
        // Scenario: Counts per step
        it("should print done and lacking counts", async () => {
            documents.save(new TextDocument({ id: "a", text: "" }));
            documents.save(new TextDocument({ id: "b", text: "x" }).setPreprocessResult("tokenization", ["x"]));

            expect(await runCommand("status", [], context)).toBe(0);
            expect(lines).toEqual([
                "Documents: 2 (raw: 1)",
                "  tokenization  done 1, lacking 1",
                "  segmentation  done 0, lacking 2",
                "  tagging       done 0, lacking 2",
                "  nerc          done 0, lacking 2",
            ]);
        });
    });

    describe("run", () => {
        // Scenario: Configured steps with built-in runners
        it("should tokenize and segment every document", async () => {
            documents.save(new TextDocument({ id: "a", text: "One. Two!" }));

            expect(await runCommand("run", [], context)).toBe(0);
            expect(lines).toEqual([
                "tokenization: processed 1, skipped 0, failed 0",
                "segmentation: processed 1, skipped 0, failed 0",
            ]);
            expect(documents.findById("a")?.getPreprocessResult("segmentation")).toEqual([0, 2, 4]);
        });

        // Scenario: Steps without a built-in runner
        it("should warn about steps it cannot run", async () => {
            context = {
                ...context,
                config: {
                    ...getDefaultConfig(),
                    pipeline: { override: false, steps: ["tokenization", "tagging"] },
                },
            };

            await runCommand("run", [], context);

            expect(context.logger.warn).toHaveBeenCalledWith("No built-in runner for step, skipping", {
                step: "tagging",
            });
            expect(lines).toEqual(["tokenization: processed 0, skipped 0, failed 0"]);
        });

        // Scenario: --override re-runs done steps
        it("should re-run done steps with --override", async () => {
            documents.save(new TextDocument({ id: "a", text: "One." }).setPreprocessResult("tokenization", ["One."]));

            await runCommand("run", ["--override"], context);

            expect(documents.findById("a")?.getPreprocessResult("tokenization")).toEqual(["One", "."]);
        });
    });

    describe("sentences", () => {
        // Scenario: One sentence per line
        it("should print each sentence", async () => {
            documents.save(new TextDocument({ id: "a", text: "Hi . Bye ." })
                .setPreprocessResult("tokenization", ["Hi", ".", "Bye", "."])
                .setPreprocessResult("segmentation", [0, 2, 4]));

            expect(await runCommand("sentences", ["a"], context)).toBe(0);
            expect(lines).toEqual(["Hi .", "Bye ."]);
        });

        // Scenario: Not segmented yet
        it("should fail when segmentation is missing", async () => {
            documents.save(new TextDocument({ id: "a", text: "Hi" }).setPreprocessResult("tokenization", ["Hi"]));

            expect(await runCommand("sentences", ["a"], context)).toBe(1);
            expect(lines).toEqual(["Cannot materialize sentences before segmentation is done"]);
        });

        // Scenario: Unknown document
        it("should fail for an unknown document", async () => {
            expect(await runCommand("sentences", ["zzz"], context)).toBe(1);
            expect(lines).toEqual(["Document not found: zzz"]);
        });
    });

    describe("import-chunks", () => {
        // Scenario: Chunks from YAML
        it("should save every chunk from the file", async () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
chunks:
  - id: c1
    documentId: a
    entities:
      - key: ada
  - id: c2
    documentId: a
`);

            expect(await runCommand("import-chunks", ["/corpus/chunks.yml"], context)).toBe(0);
            expect(lines).toEqual(["Imported 2 chunk(s)"]);
            expect(chunks.size).toBe(2);
        });
    });

    describe("cooccur", () => {
        beforeEach(() => {
            chunks.save(createTextChunk({
                id        : "c1",
                documentId: "a",
                offset    : 4,
                tokens    : ["Ada", "met", "Charles"],
                entities  : [
                    { key: "ada", canonicalForm: "Ada", kind: "person", offset: 0 },
                    { key: "babbage", canonicalForm: "Charles", kind: "person", offset: 2 },
                ],
            }));
            chunks.save(createTextChunk({
                id        : "c2",
                documentId: "a",
                entities  : [{ key: "ada", canonicalForm: "Ada", kind: "person", offset: 0 }],
            }));
        });

        // Scenario: Chunks mentioning both keys
        it("should print chunks mentioning every key", async () => {
            expect(await runCommand("cooccur", ["ada", "babbage"], context)).toBe(0);
            expect(lines).toEqual(["c1 (a@4): Ada met Charles"]);
        });

        // Scenario: No match
        it("should say when nothing matches", async () => {
            expect(await runCommand("cooccur", ["ada", "menabrea"], context)).toBe(0);
            expect(lines).toEqual(["No chunks mention all of: ada, menabrea"]);
        });

        // Scenario: Too few keys
        it("should fail with fewer than two keys", async () => {
            expect(await runCommand("cooccur", ["ada"], context)).toBe(1);
        });
    });
});
