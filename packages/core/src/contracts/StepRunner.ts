/**
 * Step Runner Contract
 *
 * Plugins that compute the result of one preprocess step for a document
 * (a tokenizer, a sentence splitter, a tagger, an NER model). The core
 * never computes results itself; it validates and records what runners
 * return.
 *
 * Design principles:
 * - One runner per step in a pipeline
 * - Runners read the document, they never set results or save it
 * - May be sync or async (external tools, HTTP models)
 */

import type { PreprocessStep, StepResults } from "./PreprocessStep.js";
import { isPreprocessStep } from "./PreprocessStep.js";
import type { Logger } from "./Logger.js";
import type { TextDocument } from "../document/TextDocument.js";

/**
 * Context provided to runners.
 */
export interface StepRunnerContext {
    /**
     * Read-only configuration passed to the pipeline.
     */
    readonly config: Readonly<Record<string, unknown>>;

    /**
     * Logger scoped to the step and runner.
     */
    readonly logger: Logger;

    /**
     * Id of the pipeline run, for correlation in logs and events.
     */
    readonly runId: string;
}

/**
 * Step runner interface.
 *
 * @typeParam S - The step this runner produces results for
 *
 * @example
 * ```typescript
 * const whitespaceTokenizer: PreprocessStepRunner<"tokenization"> = {
 *     id  : "whitespace-tokenizer",
 *     step: "tokenization",
 *     run(document) {
 *         return document.text.split(/\s+/).filter(Boolean);
 *     },
 * };
 * ```
 */
export interface PreprocessStepRunner<S extends PreprocessStep = PreprocessStep> {
    /**
     * Unique identifier for this runner.
     */
    readonly id: string;

    /**
     * The step this runner produces.
     */
    readonly step: S;

    /**
     * Optional human-readable name.
     */
    readonly name?: string;

    /**
     * Compute the step result for a document.
     *
     * Prerequisite steps are guaranteed to be done when this is called.
     *
     * @param document - The document (read-only use)
     * @param context - Config, logger, run id
     */
    run(
        document: TextDocument,
        context: StepRunnerContext
    ): Promise<StepResults[S]> | StepResults[S];
}

/**
 * Type guard to check if an object is a PreprocessStepRunner.
 */
export function isStepRunner(obj: unknown): obj is PreprocessStepRunner {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "step" in obj &&
        isPreprocessStep(obj.step) &&
        "run" in obj &&
        typeof obj.run === "function"
    );
}
