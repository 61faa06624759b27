/**
 * SQLite adapter
 *
 * Repositories backed by a better-sqlite3 database file.
 */

export { TextmillDatabase, IN_MEMORY } from "./database.js";
export { SqliteDocumentRepository } from "./SqliteDocumentRepository.js";
export { SqliteTextChunkRepository } from "./SqliteTextChunkRepository.js";
