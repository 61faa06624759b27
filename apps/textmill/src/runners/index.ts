/**
 * @fileoverview Built-in step runners
 *
 * @module runners
 */

import type { PreprocessStep, PreprocessStepRunner } from "@textmill/core";
import { SimpleTokenizer } from "./SimpleTokenizer.js";
import { PunctuationSegmenter } from "./PunctuationSegmenter.js";

export { SimpleTokenizer, tokenize } from "./SimpleTokenizer.js";
export { PunctuationSegmenter, segment, DEFAULT_TERMINATORS } from "./PunctuationSegmenter.js";

/**
 * Built-in runner for a step, if the app ships one.
 */
export function builtInRunner(step: PreprocessStep): PreprocessStepRunner | undefined {
    switch (step) {
        case "tokenization":
            return new SimpleTokenizer();
        case "segmentation":
            return new PunctuationSegmenter();
        case "tagging":
        case "nerc":
            return undefined;
    }
}
