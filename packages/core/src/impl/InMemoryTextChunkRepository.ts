/**
 * @fileoverview In-Memory Text Chunk Repository
 *
 * @module @textmill/core/impl/InMemoryTextChunkRepository
 */

import type { ChunkFilter, TextChunkRepository } from "../contracts/Repository.js";
import { matchesChunkFilter } from "../contracts/Repository.js";
import { createTextChunk, type TextChunk } from "../contracts/TextChunk.js";

/**
 * In-memory TextChunkRepository. Chunks are copied on save.
 */
export class InMemoryTextChunkRepository implements TextChunkRepository {
    private readonly chunks: Map<string, TextChunk> = new Map();

    save(chunk: TextChunk): TextChunk {
        this.chunks.set(chunk.id, createTextChunk(chunk));
        return chunk;
    }

    findById(id: string): TextChunk | undefined {
        return this.chunks.get(id);
    }

    find(filter: ChunkFilter = { kind: "all" }): TextChunk[] {
        return Array.from(this.chunks.values())
            .filter((chunk) => matchesChunkFilter(chunk, filter));
    }

    /**
     * Number of stored chunks.
     */
    get size(): number {
        return this.chunks.size;
    }
}
