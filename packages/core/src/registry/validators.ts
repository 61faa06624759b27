/**
 * @fileoverview Preprocess step validators
 *
 * Validation of step results happens in two layers:
 * - shape: the result is an array of the right element type
 *   (strings, or integers for segmentation)
 * - constraints: the result fits the results of earlier steps
 *   (boundaries within the token list, one label per token)
 *
 * Validators are pure: they read prior results and return either the
 * accepted (copied, frozen) value or the error to raise. Nothing here
 * holds per-document state.
 *
 * @module @textmill/core/registry/validators
 */

import {
    prerequisitesOf,
    type PreprocessStep,
    type StepResults,
} from "../contracts/PreprocessStep.js";
import type { PreprocessMetadata } from "../contracts/PreprocessMetadata.js";
import {
    PreconditionError,
    StructuralValidationError,
    type PreprocessError,
} from "../errors.js";

/**
 * Result of validating a step result.
 */
export type ValidationOutcome<T> =
    | { readonly ok: true; readonly value: T }
    | ValidationFailure;

/**
 * A rejected step result.
 */
export interface ValidationFailure {
    readonly ok: false;
    readonly error: PreprocessError;
}

/**
 * Checks that a value has the result type of a step.
 */
export type ShapeParser<S extends PreprocessStep> = (result: unknown) => ValidationOutcome<StepResults[S]>;

/**
 * Checks a well-shaped result against earlier steps.
 */
export type StepConstraint<S extends PreprocessStep> = (
    value: StepResults[S],
    prior: PreprocessMetadata
) => PreprocessError | undefined;

function reject(error: PreprocessError): ValidationFailure {
    return { ok: false, error };
}

function tokenCountOf(prior: PreprocessMetadata): number {
    return prior.tokenization?.result.length ?? 0;
}

function parseStringList(
    step: "tokenization" | "tagging" | "nerc",
    result: unknown
): ValidationOutcome<readonly string[]> {
    if (!Array.isArray(result)) {
        return reject(new StructuralValidationError(step, "expected an array of strings"));
    }

    const items: readonly unknown[] = result;
    const values: string[] = [];

    for (const [index, item] of items.entries()) {
        if (typeof item !== "string") {
            return reject(new StructuralValidationError(step, `element at index ${index} is not a string`));
        }
        values.push(item);
    }

    return { ok: true, value: Object.freeze(values) };
}

function parseBoundaryList(result: unknown): ValidationOutcome<readonly number[]> {
    if (!Array.isArray(result)) {
        return reject(new StructuralValidationError("segmentation", "expected an array of boundary offsets"));
    }

    const items: readonly unknown[] = result;
    const values: number[] = [];

    for (const [index, item] of items.entries()) {
        if (typeof item !== "number" || !Number.isInteger(item)) {
            return reject(new StructuralValidationError(
                "segmentation",
                `boundary at index ${index} is not an integer`
            ));
        }
        values.push(item);
    }

    return { ok: true, value: Object.freeze(values) };
}

/**
 * Boundaries must be strictly ascending, each within [0, tokenCount].
 */
function checkBoundaries(boundaries: readonly number[], prior: PreprocessMetadata): PreprocessError | undefined {
    const tokenCount = tokenCountOf(prior);
    let previous: number | undefined;

    for (const boundary of boundaries) {
        if (boundary < 0 || boundary > tokenCount) {
            return new StructuralValidationError(
                "segmentation",
                `boundary ${boundary} is outside [0, ${tokenCount}]`
            );
        }

        if (previous !== undefined && boundary <= previous) {
            return new StructuralValidationError(
                "segmentation",
                `boundaries must be strictly ascending (${previous} then ${boundary})`
            );
        }

        previous = boundary;
    }

    return undefined;
}

function checkOnePerToken(
    step: "tagging" | "nerc",
    labels: readonly string[],
    prior: PreprocessMetadata
): PreprocessError | undefined {
    const tokenCount = tokenCountOf(prior);
    if (labels.length !== tokenCount) {
        return new StructuralValidationError(
            step,
            `expected ${tokenCount} labels (one per token), got ${labels.length}`
        );
    }
    return undefined;
}

/**
 * Shape parsers by step. The mapped type makes a missing step a compile error.
 */
export const STEP_SHAPES: { readonly [S in PreprocessStep]: ShapeParser<S> } = {
    tokenization: (result) => parseStringList("tokenization", result),
    segmentation: parseBoundaryList,
    tagging     : (result) => parseStringList("tagging", result),
    nerc        : (result) => parseStringList("nerc", result),
};

/**
 * Cross-step constraints by step.
 */
export const STEP_CONSTRAINTS: { readonly [S in PreprocessStep]: StepConstraint<S> } = {
    tokenization: () => undefined,
    segmentation: checkBoundaries,
    tagging     : (labels, prior) => checkOnePerToken("tagging", labels, prior),
    nerc        : (labels, prior) => checkOnePerToken("nerc", labels, prior),
};

/**
 * Check only that `result` has the result type of `step`.
 */
export function parseStepResult<S extends PreprocessStep>(
    step: S,
    result: unknown
): ValidationOutcome<StepResults[S]> {
    const parse: ShapeParser<S> = STEP_SHAPES[step];
    return parse(result);
}

/**
 * Validate a result for a step against previously stored results.
 *
 * Only prerequisites (earlier steps) are consulted; results of later steps
 * in `prior` are ignored.
 *
 * @param step - The step being set
 * @param result - Candidate result, from untyped input
 * @param prior - Metadata stored so far on the document
 * @returns The accepted value, or the error to raise
 *
 * @example
 * ```typescript
 * const outcome = validateStepResult("segmentation", [0, 3], doc.preprocessMetadata);
 * if (!outcome.ok) {
 *     throw outcome.error;
 * }
 * ```
 */
export function validateStepResult<S extends PreprocessStep>(
    step: S,
    result: unknown,
    prior: PreprocessMetadata
): ValidationOutcome<StepResults[S]> {
    const missing = prerequisitesOf(step).find((required) => prior[required] === undefined);
    if (missing !== undefined) {
        return reject(new PreconditionError(step, missing));
    }

    const parsed = parseStepResult(step, result);
    if (!parsed.ok) {
        return parsed;
    }

    const constraint: StepConstraint<S> = STEP_CONSTRAINTS[step];
    const error = constraint(parsed.value, prior);

    return error ? reject(error) : parsed;
}
