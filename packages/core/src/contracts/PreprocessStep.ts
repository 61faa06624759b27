/**
 * Preprocess Step Contract
 *
 * The closed, ordered set of preprocessing steps a document goes through.
 * Order matters: a step may only depend on the results of steps that
 * come before it.
 */

/**
 * All preprocess steps, in pipeline order.
 */
export const PREPROCESS_STEPS = [
    "tokenization",
    "segmentation",
    "tagging",
    "nerc",
] as const;

/**
 * A single preprocess step identifier.
 */
export type PreprocessStep = typeof PREPROCESS_STEPS[number];

/**
 * Result type stored for each step.
 *
 * - tokenization: ordered token strings
 * - segmentation: ascending sentence boundary offsets into the token list
 * - tagging: one tag per token
 * - nerc: one entity label per token
 */
export interface StepResults {
    readonly tokenization: readonly string[];
    readonly segmentation: readonly number[];
    readonly tagging: readonly string[];
    readonly nerc: readonly string[];
}

/**
 * Steps whose results must already be stored before a step can be set.
 * Only earlier steps may be listed.
 */
export const STEP_PREREQUISITES = {
    tokenization: [],
    segmentation: ["tokenization"],
    tagging     : ["tokenization"],
    nerc        : ["tokenization"],
} as const satisfies Record<PreprocessStep, readonly PreprocessStep[]>;

/**
 * Type guard for step names coming from untyped input (CLI args, config, stored data).
 */
export function isPreprocessStep(value: unknown): value is PreprocessStep {
    return typeof value === "string" && PREPROCESS_STEPS.some((step) => step === value);
}

/**
 * Position of a step in pipeline order (0-based).
 */
export function stepIndex(step: PreprocessStep): number {
    return PREPROCESS_STEPS.indexOf(step);
}

/**
 * Prerequisite steps of a step, in pipeline order.
 */
export function prerequisitesOf(step: PreprocessStep): readonly PreprocessStep[] {
    return STEP_PREREQUISITES[step];
}

/**
 * Steps whose stored results depend on `step`, directly or through another
 * step, in pipeline order. Their results go stale when `step` is set again.
 */
export function dependentsOf(step: PreprocessStep): PreprocessStep[] {
    const affected = new Set<PreprocessStep>([step]);

    for (const candidate of PREPROCESS_STEPS) {
        if (prerequisitesOf(candidate).some((required) => affected.has(required))) {
            affected.add(candidate);
        }
    }

    affected.delete(step);
    return [...affected];
}
