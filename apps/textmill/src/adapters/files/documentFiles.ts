/**
 * Plain-text document files
 *
 * One file becomes one document. The document id is the file name
 * without its extension, so `notes/ada.txt` is stored as `ada`.
 */

import { readFileSync, existsSync } from "fs";
import { basename, extname } from "path";
import { TextDocument } from "@textmill/core";

/**
 * Id a file's document is stored under.
 */
export function documentIdForFile(filePath: string): string {
    return basename(filePath, extname(filePath));
}

/**
 * Read a text file into a new, unprocessed document.
 *
 * Leading and trailing whitespace is dropped, so a blank file yields a
 * raw document.
 *
 * @throws Error if the file doesn't exist
 */
export function readDocumentFile(filePath: string): TextDocument {
    if (!existsSync(filePath)) {
        throw new Error(`Document file not found: ${filePath}`);
    }

    return new TextDocument({
        id  : documentIdForFile(filePath),
        text: readFileSync(filePath, "utf-8").trim(),
    });
}
