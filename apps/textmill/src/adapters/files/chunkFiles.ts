/**
 * @fileoverview Chunk file loader
 *
 * Loads text chunks and their entity mentions from YAML:
 *
 * ```yaml
 * chunks:
 *   - id: c1
 *     documentId: ada
 *     offset: 12
 *     tokens: [Ada, wrote, to, Charles]
 *     entities:
 *       - { key: ada, canonicalForm: Ada Lovelace, kind: person, offset: 0 }
 *       - { key: babbage, canonicalForm: Charles Babbage, kind: person, offset: 3 }
 * ```
 *
 * @module adapters/files/chunkFiles
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
    createTextChunk,
    type EntityInChunk,
    type TextChunk,
} from "@textmill/core";

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
    return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function parseEntity(raw: unknown, where: string): EntityInChunk {
    if (!isRecord(raw)) {
        throw new Error(`Invalid entity ${where}: expected a mapping`);
    }
    if (typeof raw.key !== "string" || raw.key === "") {
        throw new Error(`Invalid entity ${where}: missing or invalid 'key'`);
    }

    const canonicalForm = raw.canonicalForm ?? raw.key;
    if (typeof canonicalForm !== "string") {
        throw new Error(`Invalid entity ${where}: invalid 'canonicalForm'`);
    }

    const kind = raw.kind ?? "unknown";
    if (typeof kind !== "string") {
        throw new Error(`Invalid entity ${where}: invalid 'kind'`);
    }

    const offset = raw.offset ?? 0;
    if (!isNonNegativeInteger(offset)) {
        throw new Error(`Invalid entity ${where}: invalid 'offset'`);
    }

    return { key: raw.key, canonicalForm, kind, offset };
}

function parseChunk(raw: unknown, index: number): TextChunk {
    if (!isRecord(raw)) {
        throw new Error(`Invalid chunk at index ${index}: expected a mapping`);
    }
    if (typeof raw.id !== "string" || raw.id === "") {
        throw new Error(`Invalid chunk at index ${index}: missing or invalid 'id'`);
    }
    if (typeof raw.documentId !== "string" || raw.documentId === "") {
        throw new Error(`Invalid chunk at index ${index}: missing or invalid 'documentId'`);
    }

    const offset = raw.offset ?? 0;
    if (!isNonNegativeInteger(offset)) {
        throw new Error(`Invalid chunk at index ${index}: invalid 'offset'`);
    }

    const tokens = raw.tokens ?? [];
    if (!Array.isArray(tokens) || !tokens.every((token) => typeof token === "string")) {
        throw new Error(`Invalid chunk at index ${index}: 'tokens' must be a list of strings`);
    }

    const entities = raw.entities ?? [];
    if (!Array.isArray(entities)) {
        throw new Error(`Invalid chunk at index ${index}: 'entities' must be a list`);
    }

    return createTextChunk({
        id        : raw.id,
        documentId: raw.documentId,
        offset,
        tokens,
        entities  : entities.map((entity: unknown, position) =>
            parseEntity(entity, `${position} of chunk ${raw.id}`)),
    });
}

/**
 * Load chunks from a YAML file.
 *
 * @param filePath - Path to the chunk file
 * @throws Error if the file doesn't exist or is invalid
 */
export function loadChunks(filePath: string): TextChunk[] {
    if (!existsSync(filePath)) {
        throw new Error(`Chunk file not found: ${filePath}`);
    }

    const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));

    if (!isRecord(parsed) || !Array.isArray(parsed.chunks)) {
        throw new Error("Invalid chunk file format: expected { chunks: [...] }");
    }

    return parsed.chunks.map((raw: unknown, index) => parseChunk(raw, index));
}
