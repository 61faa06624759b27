/**
 * @fileoverview Sentence materializer
 *
 * Turns a token list and its segmentation boundaries into sentences.
 *
 * @module @textmill/core/document/sentences
 */

/**
 * Close the boundary list at both ends so the sentences always cover
 * every token: a leading 0 and a trailing `tokenCount` are added when
 * missing.
 */
export function sentenceCuts(boundaries: readonly number[], tokenCount: number): number[] {
    const cuts = [...boundaries];

    if (cuts[0] !== 0) {
        cuts.unshift(0);
    }
    if (cuts[cuts.length - 1] !== tokenCount) {
        cuts.push(tokenCount);
    }

    return cuts;
}

/**
 * Lazily yield `tokens[b[i] : b[i + 1]]` for consecutive boundaries.
 *
 * The returned iterable can be iterated any number of times; each pass
 * recomputes from the given arrays. Boundaries are expected to be
 * strictly ascending and within `[0, tokens.length]`, as enforced when
 * segmentation is stored.
 *
 * @example
 * ```typescript
 * const tokens = ["Some", "sentence", ".", "And", "some", "other", ".", "Indeed", "!"];
 * [...materializeSentences(tokens, [0, 3, 7, 9])];
 * // => [["Some", "sentence", "."], ["And", "some", "other", "."], ["Indeed", "!"]]
 * ```
 */
export function materializeSentences(
    tokens: readonly string[],
    boundaries: readonly number[]
): Iterable<readonly string[]> {
    return {
        *[Symbol.iterator]() {
            const cuts = sentenceCuts(boundaries, tokens.length);

            for (let i = 0; i + 1 < cuts.length; i++) {
                yield tokens.slice(cuts[i], cuts[i + 1]);
            }
        },
    };
}
