/**
 * @fileoverview In-Memory Document Repository
 *
 * Keeps document snapshots in a Map and evaluates filters in-process.
 * Every `find` rebuilds fresh document instances, so callers see exactly
 * what was saved and nothing that was changed afterwards without saving.
 *
 * @module @textmill/core/impl/InMemoryDocumentRepository
 */

import type { DocumentFilter, DocumentRepository } from "../contracts/Repository.js";
import { matchesDocumentFilter } from "../contracts/Repository.js";
import type { DocumentSnapshot } from "../contracts/PreprocessMetadata.js";
import {
    TextDocument,
    type TextDocumentOptions,
} from "../document/TextDocument.js";

/**
 * In-memory DocumentRepository.
 *
 * @example
 * ```typescript
 * const repository = new InMemoryDocumentRepository();
 * const doc = repository.save(new TextDocument({ text: "" }));
 * repository.find({ kind: "raw" }); // => [TextDocument { id: doc.id, ... }]
 * ```
 */
export class InMemoryDocumentRepository implements DocumentRepository {
    private readonly snapshots: Map<string, DocumentSnapshot> = new Map();

    /**
     * @param documentOptions - Options for documents rebuilt on load (e.g. clock)
     */
    constructor(private readonly documentOptions: TextDocumentOptions = {}) {}

    save(document: TextDocument): TextDocument {
        this.snapshots.set(document.id, document.toSnapshot());
        return document;
    }

    findById(id: string): TextDocument | undefined {
        const snapshot = this.snapshots.get(id);
        return snapshot ? TextDocument.restore(snapshot, this.documentOptions) : undefined;
    }

    find(filter: DocumentFilter = { kind: "all" }): TextDocument[] {
        return Array.from(this.snapshots.values())
            .map((snapshot) => TextDocument.restore(snapshot, this.documentOptions))
            .filter((document) => matchesDocumentFilter(document, filter));
    }

    /**
     * Number of stored documents.
     */
    get size(): number {
        return this.snapshots.size;
    }
}
