/**
 * textmill SQLite Database
 *
 * Owns the better-sqlite3 connection and the schema shared by the
 * document and chunk repositories.
 *
 * Tables:
 * - documents: id, text, preprocess metadata as a JSON object keyed by step
 * - text_chunks: id, document id, token offset, tokens as a JSON array
 * - chunk_entities: one row per entity mention, in mention order
 *
 * Use ":memory:" as the path for a throwaway database.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

export const IN_MEMORY = ":memory:";

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS documents (
        id                  TEXT PRIMARY KEY,
        text                TEXT NOT NULL,
        preprocess_metadata TEXT NOT NULL DEFAULT '{}'
    );

    CREATE TABLE IF NOT EXISTS text_chunks (
        id           TEXT PRIMARY KEY,
        document_id  TEXT NOT NULL,
        token_offset INTEGER NOT NULL,
        tokens       TEXT NOT NULL DEFAULT '[]'
    );

    CREATE INDEX IF NOT EXISTS idx_text_chunks_document
        ON text_chunks (document_id);

    CREATE TABLE IF NOT EXISTS chunk_entities (
        chunk_id       TEXT NOT NULL,
        position       INTEGER NOT NULL,
        key            TEXT NOT NULL,
        canonical_form TEXT NOT NULL,
        kind           TEXT NOT NULL,
        token_offset   INTEGER NOT NULL,
        PRIMARY KEY (chunk_id, position)
    );

    CREATE INDEX IF NOT EXISTS idx_chunk_entities_key
        ON chunk_entities (key, chunk_id);
`;

/**
 * textmill database connection
 */
export class TextmillDatabase {
    private db: Database.Database | null = null;

    constructor(readonly path: string = IN_MEMORY) {}

    /**
     * Open the connection and create missing tables.
     */
    open(): Database.Database {
        if (this.db) {
            return this.db;
        }

        if (this.path !== IN_MEMORY) {
            mkdirSync(dirname(this.path), { recursive: true });
        }

        let db: Database.Database;
        try {
            db = new Database(this.path);
        }
        catch (error) {
            if (error instanceof Error && error.message.includes("SQLITE_CANTOPEN")) {
                throw new Error(`Cannot open textmill database at ${this.path}`);
            }
            throw error;
        }

        db.pragma("journal_mode = WAL");
        db.exec(SCHEMA);

        this.db = db;
        return db;
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    /**
     * The open connection, opening it on first use.
     */
    get connection(): Database.Database {
        return this.open();
    }
}
