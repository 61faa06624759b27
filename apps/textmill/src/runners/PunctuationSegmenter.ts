/**
 * @fileoverview Punctuation Segmenter
 *
 * Splits a token list into sentences after sentence-final punctuation.
 * A run of terminators ("?!", "...") ends a single sentence.
 *
 * @module runners/PunctuationSegmenter
 */

import type {
    PreprocessStepRunner,
    StepRunnerContext,
    TextDocument,
} from "@textmill/core";

export const DEFAULT_TERMINATORS: readonly string[] = [".", "!", "?", "…"];

/**
 * Sentence boundaries for a token list: 0, the index after each run of
 * terminators, and the token count.
 *
 * @example
 * ```typescript
 * segment(["Some", "sentence", ".", "And", "some", "other", ".", "Indeed", "!"]);
 * // => [0, 3, 7, 9]
 * ```
 */
export function segment(tokens: readonly string[], terminators: readonly string[] = DEFAULT_TERMINATORS): number[] {
    const boundaries = [0];
    const isTerminator = (token: string | undefined): boolean => token !== undefined && terminators.includes(token);

    tokens.forEach((token, index) => {
        if (isTerminator(token) && !isTerminator(tokens[index + 1])) {
            boundaries.push(index + 1);
        }
    });

    if (boundaries[boundaries.length - 1] !== tokens.length) {
        boundaries.push(tokens.length);
    }

    return boundaries;
}

/**
 * Segmentation runner.
 */
export class PunctuationSegmenter implements PreprocessStepRunner<"segmentation"> {
    readonly id = "punctuation-segmenter";
    readonly step = "segmentation";
    readonly name = "Punctuation Segmenter";

    constructor(private readonly terminators: readonly string[] = DEFAULT_TERMINATORS) {}

    run(document: TextDocument, context: StepRunnerContext): number[] {
        const tokens = document.getPreprocessResult("tokenization") ?? [];
        const boundaries = segment(tokens, this.terminators);

        context.logger.debug("Segmented document", {
            documentId: document.id,
            sentences : boundaries.length - 1,
        });
        return boundaries;
    }
}
