/**
 * @fileoverview Preprocess errors
 *
 * Errors raised synchronously by {@link TextDocument.setPreprocessResult}
 * and the sentence materializer. None of them is caught or retried inside
 * the core; callers re-attempt with corrected input.
 *
 * @module @textmill/core/errors
 */

import type { PreprocessStep } from "./contracts/PreprocessStep.js";

/**
 * Base class for every preprocess error.
 */
export class PreprocessError extends Error {
    /**
     * Step the failing call was about (the raw value for unknown steps), or
     * "sentences" when sentence materialization failed
     */
    readonly step: string;

    constructor(step: string, message: string) {
        super(message);
        this.name = new.target.name;
        this.step = step;
    }
}

/**
 * The step argument is not one of the known preprocess steps.
 */
export class InvalidPreprocessStepError extends PreprocessError {
    constructor(step: unknown) {
        super(String(step), `Invalid preprocess step: ${JSON.stringify(step)}`);
    }
}

/**
 * Plural alias of the unknown-step error.
 */
export { InvalidPreprocessStepError as InvalidPreprocessSteps };

/**
 * What a precondition guards: setting a step, or materializing sentences.
 */
export type PreconditionTarget = PreprocessStep | "sentences";

/**
 * A step required before this one has no stored result.
 */
export class PreconditionError extends PreprocessError {
    /** The earlier step whose result is missing */
    readonly missingStep: PreprocessStep;

    constructor(step: PreconditionTarget, missingStep: PreprocessStep, message?: string) {
        super(step, message ?? `Cannot set ${step} before ${missingStep} is done`);
        this.missingStep = missingStep;
    }
}

/**
 * The result has the wrong shape for its step: wrong element types,
 * non-ascending or out-of-range boundaries, or a length that does not
 * match the token count.
 */
export class StructuralValidationError extends PreprocessError {
    constructor(step: PreprocessStep, detail: string) {
        super(step, `Invalid ${step} result: ${detail}`);
    }
}
