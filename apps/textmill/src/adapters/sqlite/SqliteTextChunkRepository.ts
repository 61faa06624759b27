/**
 * SQLite Text Chunk Repository
 *
 * Chunks live in `text_chunks`; their entity mentions in
 * `chunk_entities`, one row per mention. The co-occurrence query groups
 * mention rows by chunk and keeps the chunks where every requested key
 * is present.
 */

import {
    createTextChunk,
    type ChunkFilter,
    type EntityInChunk,
    type TextChunk,
    type TextChunkRepository,
} from "@textmill/core";
import type { TextmillDatabase } from "./database.js";

/**
 * Raw chunk row from the database
 */
interface ChunkRow {
    id: string;
    document_id: string;
    token_offset: number;
    tokens: string;
}

/**
 * Raw entity mention row from the database
 */
interface EntityRow {
    key: string;
    canonical_form: string;
    kind: string;
    token_offset: number;
}

type SqlParam = string | number;

function parseTokens(chunkId: string, json: string): string[] {
    const parsed: unknown = JSON.parse(json);
    if (!Array.isArray(parsed) || !parsed.every((token) => typeof token === "string")) {
        throw new Error(`Corrupt tokens for chunk ${chunkId}: expected an array of strings`);
    }
    return parsed;
}

/**
 * WHERE clause and parameters for a filter.
 */
function whereClause(filter: ChunkFilter): { sql: string; params: SqlParam[] } {
    switch (filter.kind) {
        case "all":
            return { sql: "", params: [] };
        case "document":
            return { sql: "WHERE document_id = ?", params: [filter.documentId] };
        case "with-entities": {
            const keys = [...new Set(filter.keys)];
            if (keys.length === 0) {
                return { sql: "", params: [] };
            }

            const placeholders = keys.map(() => "?").join(", ");
            return {
                sql: `
                    WHERE id IN (
                        SELECT chunk_id
                        FROM chunk_entities
                        WHERE key IN (${placeholders})
                        GROUP BY chunk_id
                        HAVING COUNT(DISTINCT key) = ?
                    )
                `,
                params: [...keys, keys.length],
            };
        }
    }
}

/**
 * better-sqlite3 TextChunkRepository
 */
export class SqliteTextChunkRepository implements TextChunkRepository {
    constructor(private readonly database: TextmillDatabase) {}

    save(chunk: TextChunk): TextChunk {
        const db = this.database.connection;

        const upsertChunk = db.prepare<{ id: string; documentId: string; offset: number; tokens: string }>(`
            INSERT INTO text_chunks (id, document_id, token_offset, tokens)
            VALUES (@id, @documentId, @offset, @tokens)
            ON CONFLICT (id) DO UPDATE SET
                document_id = excluded.document_id,
                token_offset = excluded.token_offset,
                tokens = excluded.tokens
        `);
        const deleteEntities = db.prepare<[string]>("DELETE FROM chunk_entities WHERE chunk_id = ?");
        const insertEntity = db.prepare<{
            chunkId: string;
            position: number;
            key: string;
            canonicalForm: string;
            kind: string;
            offset: number;
        }>(`
            INSERT INTO chunk_entities (chunk_id, position, key, canonical_form, kind, token_offset)
            VALUES (@chunkId, @position, @key, @canonicalForm, @kind, @offset)
        `);

        db.transaction(() => {
            upsertChunk.run({
                id        : chunk.id,
                documentId: chunk.documentId,
                offset    : chunk.offset,
                tokens    : JSON.stringify(chunk.tokens),
            });

            deleteEntities.run(chunk.id);
            chunk.entities.forEach((mention, position) => {
                insertEntity.run({
                    chunkId      : chunk.id,
                    position,
                    key          : mention.key,
                    canonicalForm: mention.canonicalForm,
                    kind         : mention.kind,
                    offset       : mention.offset,
                });
            });
        })();

        return chunk;
    }

    findById(id: string): TextChunk | undefined {
        const row = this.database.connection.prepare<[string], ChunkRow>(`
            SELECT id, document_id, token_offset, tokens
            FROM text_chunks
            WHERE id = ?
        `).get(id);

        return row ? this.rowToChunk(row) : undefined;
    }

    find(filter: ChunkFilter = { kind: "all" }): TextChunk[] {
        const where = whereClause(filter);

        const rows = this.database.connection.prepare<SqlParam[], ChunkRow>(`
            SELECT id, document_id, token_offset, tokens
            FROM text_chunks
            ${where.sql}
            ORDER BY document_id, token_offset, id
        `).all(...where.params);

        return rows.map((row) => this.rowToChunk(row));
    }

    private getEntities(chunkId: string): EntityInChunk[] {
        const rows = this.database.connection.prepare<[string], EntityRow>(`
            SELECT key, canonical_form, kind, token_offset
            FROM chunk_entities
            WHERE chunk_id = ?
            ORDER BY position
        `).all(chunkId);

        return rows.map((row) => ({
            key          : row.key,
            canonicalForm: row.canonical_form,
            kind         : row.kind,
            offset       : row.token_offset,
        }));
    }

    private rowToChunk(row: ChunkRow): TextChunk {
        return createTextChunk({
            id        : row.id,
            documentId: row.document_id,
            offset    : row.token_offset,
            tokens    : parseTokens(row.id, row.tokens),
            entities  : this.getEntities(row.id),
        });
    }
}
