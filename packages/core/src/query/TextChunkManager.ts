/**
 * @fileoverview Text Chunk Manager
 *
 * Entity co-occurrence queries over stored chunks.
 *
 * @module @textmill/core/query/TextChunkManager
 */

import type { TextChunkRepository } from "../contracts/Repository.js";
import type { EntityRef, TextChunk } from "../contracts/TextChunk.js";

/**
 * Read-only chunk queries.
 *
 * @example
 * ```typescript
 * const manager = new TextChunkManager(chunkRepository);
 * const evidence = manager.chunksWithBothEntities({ key: "ada" }, { key: "babbage" });
 * ```
 */
export class TextChunkManager {
    constructor(private readonly repository: TextChunkRepository) {}

    /**
     * Chunks mentioning both entities, each at least once.
     */
    chunksWithBothEntities(first: EntityRef, second: EntityRef): TextChunk[] {
        return this.chunksWithAllEntities(first, second);
    }

    /**
     * Chunks mentioning every given entity at least once.
     *
     * Matching is by key only. Repeated keys in the query count once.
     * With no entities every chunk qualifies. Each chunk is returned once;
     * order is unspecified.
     */
    chunksWithAllEntities(...entities: EntityRef[]): TextChunk[] {
        const keys = [...new Set(entities.map((entity) => entity.key))];
        const seen = new Set<string>();

        return this.repository.find({ kind: "with-entities", keys }).filter((chunk) => {
            if (seen.has(chunk.id)) {
                return false;
            }
            seen.add(chunk.id);
            return true;
        });
    }

    /**
     * Chunks cut from a document, in token order.
     */
    chunksForDocument(documentId: string): TextChunk[] {
        return this.repository
            .find({ kind: "document", documentId })
            .sort((a, b) => a.offset - b.offset);
    }
}
