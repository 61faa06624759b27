/**
 * @fileoverview Integration tests for the SQLite repositories
 *
 * Runs against an in-memory better-sqlite3 database.
 *
 * Tests cover:
 * - Exact round-trip of documents and preprocess metadata
 * - Filter push-down (raw, lacking / with a step)
 * - Chunk round-trip with ordered mentions
 * - Entity co-occurrence query
 * - Managers over SQLite repositories
 *
 * @module adapters/__tests__/SqliteRepositories
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
    DocumentManager,
    TextChunkManager,
    TextDocument,
    createTextChunk,
    type Clock,
    type EntityInChunk,
} from "@textmill/core";
import {
    TextmillDatabase,
    SqliteDocumentRepository,
    SqliteTextChunkRepository,
} from "../adapters/sqlite/index.js";

const TEST_TIME = new Date("2025-01-15T10:00:00.000Z");

const fixedClock: Clock = { now: () => new Date(TEST_TIME.getTime()) };

function mention(key: string, offset = 0): EntityInChunk {
    return { key, canonicalForm: key.toUpperCase(), kind: "person", offset };
}

function ids(items: readonly { id: string }[]): string[] {
    return items.map((item) => item.id).sort();
}

describe("SqliteDocumentRepository", () => {
    let database: TextmillDatabase;
    let repository: SqliteDocumentRepository;

    beforeEach(() => {
        database = new TextmillDatabase();
        repository = new SqliteDocumentRepository(database);
    });

    afterEach(() => {
        database.close();
    });

    // Scenario: Stored fields come back unchanged
    it("should round-trip text, results and timestamps", () => {
        const document = new TextDocument({ id: "doc-1", text: "Some sentence . Indeed !" }, { clock: fixedClock })
            .setPreprocessResult("tokenization", ["Some", "sentence", ".", "Indeed", "!"])
            .setPreprocessResult("segmentation", [0, 3, 5])
            .setPreprocessResult("nerc", ["O", "O", "O", "O", "O"]);

        repository.save(document);
        const loaded = repository.findById("doc-1");

        expect(loaded?.toSnapshot()).toEqual(document.toSnapshot());
        expect(loaded?.getPreprocessEntry("segmentation")?.doneAt).toEqual(TEST_TIME);
        expect(loaded?.wasPreprocessDone("tagging")).toBe(false);
    });

    // Scenario: Unknown id
    it("should return undefined for an unknown id", () => {
        expect(repository.findById("nope")).toBeUndefined();
    });

    // Scenario: Saving again replaces the row
    it("should replace a document saved twice", () => {
        const document = new TextDocument({ id: "doc-1", text: "a b" });
        repository.save(document);
        repository.save(document.setPreprocessResult("tokenization", ["a", "b"]));

        expect(repository.count()).toBe(1);
        expect(repository.findById("doc-1")?.getPreprocessResult("tokenization")).toEqual(["a", "b"]);
    });

    // Scenario: Setting a result without saving does not reach the store
    it("should not persist unsaved changes", () => {
        const document = new TextDocument({ id: "doc-1", text: "a" });
        repository.save(document);

        document.setPreprocessResult("tokenization", ["a"]);

        expect(repository.findById("doc-1")?.wasPreprocessDone("tokenization")).toBe(false);
    });

    describe("filters", () => {
        beforeEach(() => {
            repository.save(new TextDocument({ id: "empty", text: "" }));
            repository.save(new TextDocument({ id: "empty-tokenized", text: "" })
                .setPreprocessResult("tokenization", []));
            repository.save(new TextDocument({ id: "fresh", text: "Some sentence ." }));
            repository.save(new TextDocument({ id: "segmented", text: "Some sentence ." })
                .setPreprocessResult("tokenization", ["Some", "sentence", "."])
                .setPreprocessResult("segmentation", [0, 3]));
        });

        // Scenario: Raw documents by empty text
        it("should select raw documents", () => {
            expect(ids(repository.find({ kind: "raw" }))).toEqual(["empty", "empty-tokenized"]);
        });

        // Scenario: Empty tokenization is still done
        it("should select documents lacking tokenization", () => {
            expect(ids(repository.find({ kind: "lacking-preprocess", step: "tokenization" }))).toEqual([
                "empty",
                "fresh",
            ]);
        });

        // Scenario: Complementary filter
        it("should select documents with segmentation", () => {
            expect(ids(repository.find({ kind: "with-preprocess", step: "segmentation" }))).toEqual(["segmented"]);
        });

        // Scenario: No filter
        it("should return every document without a filter", () => {
            expect(repository.find()).toHaveLength(4);
        });

        // Scenario: DocumentManager on top of SQLite
        it("should serve DocumentManager queries", () => {
            const manager = new DocumentManager(repository);

            expect(ids(manager.getRawDocuments())).toEqual(["empty", "empty-tokenized"]);
            expect(ids(manager.getDocumentsLackingPreprocess("segmentation"))).toEqual([
                "empty",
                "empty-tokenized",
                "fresh",
            ]);
            expect(manager.countByPreprocessStatus().steps.tokenization).toEqual({ done: 2, lacking: 2 });
        });
    });

    // Scenario: Corrupt stored metadata
    it("should reject corrupt stored metadata", () => {
        database.connection
            .prepare("INSERT INTO documents (id, text, preprocess_metadata) VALUES (?, ?, ?)")
            .run("bad", "x", JSON.stringify({ tokenization: { result: "x y", doneAt: "2025-01-15T10:00:00.000Z" } }));

        expect(() => repository.findById("bad")).toThrow(
            "Corrupt preprocess metadata for document bad: bad entry for tokenization"
        );
    });
});

describe("SqliteTextChunkRepository", () => {
    let database: TextmillDatabase;
    let repository: SqliteTextChunkRepository;

    beforeEach(() => {
        database = new TextmillDatabase();
        repository = new SqliteTextChunkRepository(database);

        repository.save(createTextChunk({ id: "c1", documentId: "doc-1", entities: [mention("A")] }));
        repository.save(createTextChunk({
            id        : "c2",
            documentId: "doc-1",
            offset    : 10,
            tokens    : ["A", "met", "B"],
            entities  : [mention("A"), mention("B", 2)],
        }));
        repository.save(createTextChunk({ id: "c3", documentId: "doc-2", entities: [mention("B")] }));
    });

    afterEach(() => {
        database.close();
    });

    // Scenario: Chunk fields and mention order round-trip
    it("should round-trip a chunk with its mentions", () => {
        expect(repository.findById("c2")).toEqual({
            id        : "c2",
            documentId: "doc-1",
            offset    : 10,
            tokens    : ["A", "met", "B"],
            entities  : [mention("A"), mention("B", 2)],
        });
    });

    // Scenario: Re-saving replaces the mentions
    it("should replace mentions when a chunk is saved again", () => {
        repository.save(createTextChunk({ id: "c1", documentId: "doc-1", entities: [mention("C")] }));

        expect(repository.findById("c1")?.entities).toEqual([mention("C")]);
        expect(ids(repository.find({ kind: "with-entities", keys: ["A"] }))).toEqual(["c2"]);
    });

    // Scenario: The two-entity example
    it("should find only the chunk with both entities", () => {
        expect(ids(repository.find({ kind: "with-entities", keys: ["A", "B"] }))).toEqual(["c2"]);
    });

    // Scenario: Repeated mentions and repeated keys
    it("should return a chunk once despite repeats", () => {
        repository.save(createTextChunk({
            id        : "c4",
            documentId: "doc-3",
            entities  : [mention("A"), mention("A", 1), mention("B", 2)],
        }));

        expect(ids(repository.find({ kind: "with-entities", keys: ["A", "B", "A"] }))).toEqual(["c2", "c4"]);
    });

    // Scenario: Empty key list
    it("should return every chunk for an empty key list", () => {
        expect(ids(repository.find({ kind: "with-entities", keys: [] }))).toEqual(["c1", "c2", "c3"]);
    });

    // Scenario: Chunks of one document
    it("should filter by document", () => {
        expect(ids(repository.find({ kind: "document", documentId: "doc-1" }))).toEqual(["c1", "c2"]);
    });

    // Scenario: TextChunkManager on top of SQLite
    it("should serve TextChunkManager queries", () => {
        const manager = new TextChunkManager(repository);

        expect(ids(manager.chunksWithBothEntities({ key: "A" }, { key: "B" }))).toEqual(["c2"]);
        expect(ids(manager.chunksWithBothEntities({ key: "A" }, { key: "Z" }))).toEqual([]);
        expect(manager.chunksForDocument("doc-1").map((chunk) => chunk.id)).toEqual(["c1", "c2"]);
    });
});
