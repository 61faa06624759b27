/**
 * @fileoverview Simple Tokenizer
 *
 * Rule-based tokenizer: runs of letters and digits form a word (inner
 * apostrophes and hyphens included), every other non-space character is
 * a token of its own.
 *
 * @module runners/SimpleTokenizer
 */

import type {
    PreprocessStepRunner,
    StepRunnerContext,
    TextDocument,
} from "@textmill/core";

const TOKEN_PATTERN = /[\p{L}\p{N}_]+(?:['’-][\p{L}\p{N}_]+)*|[^\s\p{L}\p{N}_]/gu;

/**
 * Split text into word and punctuation tokens.
 *
 * @example
 * ```typescript
 * tokenize("Ada's notes, again.");
 * // => ["Ada's", "notes", ",", "again", "."]
 * ```
 */
export function tokenize(text: string): string[] {
    return text.match(TOKEN_PATTERN) ?? [];
}

/**
 * Tokenization runner.
 */
export class SimpleTokenizer implements PreprocessStepRunner<"tokenization"> {
    readonly id = "simple-tokenizer";
    readonly step = "tokenization";
    readonly name = "Simple Tokenizer";

    run(document: TextDocument, context: StepRunnerContext): string[] {
        const tokens = tokenize(document.text);
        context.logger.debug("Tokenized document", {
            documentId: document.id,
            tokens    : tokens.length,
        });
        return tokens;
    }
}
