/**
 * SQLite Document Repository
 *
 * Stores each document as one row; the preprocess metadata is a JSON
 * object keyed by step name, so "lacking step X" is a `json_type` lookup
 * the database answers without loading documents.
 */

import {
    TextDocument,
    type DocumentFilter,
    type DocumentRepository,
    type DocumentSnapshot,
    type PreprocessEntrySnapshot,
    type TextDocumentOptions,
} from "@textmill/core";
import type { TextmillDatabase } from "./database.js";

/**
 * Raw document row from the database
 */
interface DocumentRow {
    id: string;
    text: string;
    preprocess_metadata: string;
}

type SqlParam = string | number;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEntrySnapshot(value: unknown): value is PreprocessEntrySnapshot {
    return (
        isRecord(value) &&
        Array.isArray(value.result) &&
        value.result.every((item) => typeof item === "string" || typeof item === "number") &&
        typeof value.doneAt === "string"
    );
}

/**
 * Parse the stored metadata column.
 *
 * Step names are not checked here; {@link TextDocument.restore} rejects
 * unknown ones.
 */
function parseMetadata(documentId: string, json: string): Record<string, PreprocessEntrySnapshot> {
    const parsed: unknown = JSON.parse(json);
    if (!isRecord(parsed)) {
        throw new Error(`Corrupt preprocess metadata for document ${documentId}: expected an object`);
    }

    const metadata: Record<string, PreprocessEntrySnapshot> = {};
    for (const [step, entry] of Object.entries(parsed)) {
        if (!isEntrySnapshot(entry)) {
            throw new Error(`Corrupt preprocess metadata for document ${documentId}: bad entry for ${step}`);
        }
        metadata[step] = entry;
    }
    return metadata;
}

/**
 * WHERE clause and parameters for a filter.
 */
function whereClause(filter: DocumentFilter): { sql: string; params: SqlParam[] } {
    switch (filter.kind) {
        case "all":
            return { sql: "", params: [] };
        case "raw":
            return { sql: "WHERE text = ''", params: [] };
        case "lacking-preprocess":
            return { sql: "WHERE json_type(preprocess_metadata, ?) IS NULL", params: [`$.${filter.step}`] };
        case "with-preprocess":
            return { sql: "WHERE json_type(preprocess_metadata, ?) IS NOT NULL", params: [`$.${filter.step}`] };
    }
}

/**
 * better-sqlite3 DocumentRepository
 */
export class SqliteDocumentRepository implements DocumentRepository {
    constructor(
        private readonly database: TextmillDatabase,
        private readonly documentOptions: TextDocumentOptions = {}
    ) {}

    save(document: TextDocument): TextDocument {
        const snapshot = document.toSnapshot();

        this.database.connection.prepare<{ id: string; text: string; metadata: string }>(`
            INSERT INTO documents (id, text, preprocess_metadata)
            VALUES (@id, @text, @metadata)
            ON CONFLICT (id) DO UPDATE SET
                text = excluded.text,
                preprocess_metadata = excluded.preprocess_metadata
        `).run({
            id      : snapshot.id,
            text    : snapshot.text,
            metadata: JSON.stringify(snapshot.preprocessMetadata),
        });

        return document;
    }

    findById(id: string): TextDocument | undefined {
        const row = this.database.connection.prepare<[string], DocumentRow>(`
            SELECT id, text, preprocess_metadata
            FROM documents
            WHERE id = ?
        `).get(id);

        return row ? this.rowToDocument(row) : undefined;
    }

    find(filter: DocumentFilter = { kind: "all" }): TextDocument[] {
        const where = whereClause(filter);

        const rows = this.database.connection.prepare<SqlParam[], DocumentRow>(`
            SELECT id, text, preprocess_metadata
            FROM documents
            ${where.sql}
            ORDER BY id
        `).all(...where.params);

        return rows.map((row) => this.rowToDocument(row));
    }

    /**
     * Number of stored documents.
     */
    count(): number {
        const row = this.database.connection.prepare<[], { total: number }>(
            "SELECT COUNT(*) AS total FROM documents"
        ).get();
        return row?.total ?? 0;
    }

    private rowToDocument(row: DocumentRow): TextDocument {
        const snapshot: DocumentSnapshot = {
            id                : row.id,
            text              : row.text,
            preprocessMetadata: parseMetadata(row.id, row.preprocess_metadata),
        };
        return TextDocument.restore(snapshot, this.documentOptions);
    }
}
