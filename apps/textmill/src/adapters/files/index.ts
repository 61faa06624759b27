/**
 * File adapters: document text files and YAML chunk files.
 */

export { readDocumentFile, documentIdForFile } from "./documentFiles.js";
export { loadChunks } from "./chunkFiles.js";
