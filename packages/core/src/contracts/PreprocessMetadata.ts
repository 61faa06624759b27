/**
 * Preprocess Metadata Contract
 *
 * Per-document record of which steps are done, their results and when
 * they were stored. A slot exists only for steps that were set
 * successfully; an absent slot means "not done".
 */

import type { PreprocessStep, StepResults } from "./PreprocessStep.js";

/**
 * A stored step result.
 */
export interface PreprocessEntry<S extends PreprocessStep = PreprocessStep> {
    /** The validated result, exactly as it was set */
    readonly result: StepResults[S];

    /** When the result was set */
    readonly doneAt: Date;
}

/**
 * One optional slot per step.
 */
export type PreprocessMetadata = {
    [S in PreprocessStep]?: PreprocessEntry<S>;
};

/**
 * Serializable form of a stored step result.
 */
export interface PreprocessEntrySnapshot {
    readonly result: readonly (string | number)[];

    /** ISO timestamp */
    readonly doneAt: string;
}

/**
 * Serializable form of a document, as persisted by repositories.
 */
export interface DocumentSnapshot {
    readonly id: string;
    readonly text: string;
    readonly preprocessMetadata: Readonly<Record<string, PreprocessEntrySnapshot>>;
}
