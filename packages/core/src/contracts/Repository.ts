/**
 * Repository Contracts
 *
 * Narrow store seams for documents and chunks. The core never talks to a
 * storage technology directly; it hands filters to a repository, which
 * pushes them down where it can and otherwise evaluates them in-process
 * with {@link matchesDocumentFilter} / {@link matchesChunkFilter}.
 *
 * Design principles:
 * - Synchronous: validation and queries never wait on I/O of their own
 * - Explicit persistence: nothing is saved unless `save()` is called
 * - Exact round-trip: stored fields come back unchanged
 */

import type { PreprocessStep } from "./PreprocessStep.js";
import type { TextChunk } from "./TextChunk.js";
import { chunkMentionsAll } from "./TextChunk.js";
import type { TextDocument } from "../document/TextDocument.js";

/**
 * Document selection criteria.
 */
export type DocumentFilter =
    | { readonly kind: "all" }
    | { readonly kind: "raw" }
    | { readonly kind: "lacking-preprocess"; readonly step: PreprocessStep }
    | { readonly kind: "with-preprocess"; readonly step: PreprocessStep };

/**
 * Chunk selection criteria.
 */
export type ChunkFilter =
    | { readonly kind: "all" }
    | { readonly kind: "document"; readonly documentId: string }
    | { readonly kind: "with-entities"; readonly keys: readonly string[] };

/**
 * Document repository.
 *
 * @example
 * ```typescript
 * const repository: DocumentRepository = new InMemoryDocumentRepository();
 *
 * const doc = repository.save(new TextDocument({ text: "Some sentence ." }));
 * repository.save(doc.setPreprocessResult("tokenization", ["Some", "sentence", "."]));
 *
 * const untokenized = repository.find({ kind: "lacking-preprocess", step: "tokenization" });
 * ```
 */
export interface DocumentRepository {
    /**
     * Insert or replace a document by id.
     *
     * @returns The same document instance
     */
    save(document: TextDocument): TextDocument;

    /**
     * Fetch a document by id.
     */
    findById(id: string): TextDocument | undefined;

    /**
     * Fetch every document matching the filter (all documents when omitted).
     * Order is unspecified; no document appears twice.
     */
    find(filter?: DocumentFilter): TextDocument[];
}

/**
 * Text chunk repository.
 */
export interface TextChunkRepository {
    /**
     * Insert or replace a chunk by id, including its entity mentions.
     *
     * @returns The same chunk
     */
    save(chunk: TextChunk): TextChunk;

    /**
     * Fetch a chunk by id.
     */
    findById(id: string): TextChunk | undefined;

    /**
     * Fetch every chunk matching the filter (all chunks when omitted).
     * Order is unspecified; no chunk appears twice.
     */
    find(filter?: ChunkFilter): TextChunk[];
}

/**
 * In-process evaluation of a document filter.
 */
export function matchesDocumentFilter(document: TextDocument, filter: DocumentFilter): boolean {
    switch (filter.kind) {
        case "all":
            return true;
        case "raw":
            return document.text === "";
        case "lacking-preprocess":
            return !document.wasPreprocessDone(filter.step);
        case "with-preprocess":
            return document.wasPreprocessDone(filter.step);
    }
}

/**
 * In-process evaluation of a chunk filter.
 */
export function matchesChunkFilter(chunk: TextChunk, filter: ChunkFilter): boolean {
    switch (filter.kind) {
        case "all":
            return true;
        case "document":
            return chunk.documentId === filter.documentId;
        case "with-entities":
            return chunkMentionsAll(chunk, filter.keys);
    }
}
