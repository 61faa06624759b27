/**
 * Text Chunk Contract
 *
 * A stored span of a document together with the entity mentions found
 * in it. Chunks reference their document by id only.
 *
 * Chunks are immutable values: adding a mention produces a new chunk
 * which the caller saves explicitly.
 */

/**
 * A real-world entity, identified solely by its key.
 * Used as a query parameter; not stored on its own.
 */
export interface EntityRef {
    readonly key: string;
}

/**
 * One mention of an entity inside a chunk.
 *
 * Only `key` takes part in matching; the rest is descriptive payload.
 */
export interface EntityInChunk {
    /** Identity of the real-world entity */
    readonly key: string;

    /** Normalized surface form, e.g. "Ada Lovelace" */
    readonly canonicalForm: string;

    /** Entity kind, e.g. "person", "organization" */
    readonly kind: string;

    /** Token position of the mention within the chunk */
    readonly offset: number;
}

/**
 * Text chunk.
 *
 * A chunk may hold zero, one or many mentions, including repeats of the
 * same key.
 */
export interface TextChunk {
    /** Unique identifier for this chunk */
    readonly id: string;

    /** Id of the document this chunk was cut from */
    readonly documentId: string;

    /** Token offset of the chunk within its document */
    readonly offset: number;

    /** Tokens covered by the chunk */
    readonly tokens: readonly string[];

    /** Entity mentions, in the order they were added */
    readonly entities: readonly EntityInChunk[];
}

/**
 * Input for {@link createTextChunk}; `tokens` and `entities` default to empty.
 */
export interface TextChunkInput {
    readonly id: string;
    readonly documentId: string;
    readonly offset?: number;
    readonly tokens?: readonly string[];
    readonly entities?: readonly EntityInChunk[];
}

/**
 * Factory function to create a frozen TextChunk.
 *
 * @example
 * ```typescript
 * const chunk = createTextChunk({
 *     id        : "chunk-1",
 *     documentId: "doc-1",
 *     tokens    : ["Ada", "met", "Charles"],
 * });
 * ```
 */
export function createTextChunk(data: TextChunkInput): TextChunk {
    return Object.freeze({
        id        : data.id,
        documentId: data.documentId,
        offset    : data.offset ?? 0,
        tokens    : Object.freeze([...(data.tokens ?? [])]),
        entities  : Object.freeze((data.entities ?? []).map((mention) => Object.freeze({ ...mention }))),
    });
}

/**
 * Return a copy of `chunk` with `mention` appended to its entities.
 */
export function addEntityMention(chunk: TextChunk, mention: EntityInChunk): TextChunk {
    return createTextChunk({
        ...chunk,
        entities: [...chunk.entities, mention],
    });
}

/**
 * Whether the chunk mentions every given key at least once.
 *
 * An empty key list is satisfied by every chunk.
 */
export function chunkMentionsAll(chunk: TextChunk, keys: readonly string[]): boolean {
    const present = new Set(chunk.entities.map((mention) => mention.key));
    return keys.every((key) => present.has(key));
}
