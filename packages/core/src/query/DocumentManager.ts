/**
 * @fileoverview Document Manager
 *
 * Collection-level queries selecting documents by preprocessing state.
 * Filters are handed to the repository, which pushes them down to its
 * store where it can.
 *
 * @module @textmill/core/query/DocumentManager
 */

import type { DocumentRepository } from "../contracts/Repository.js";
import { PREPROCESS_STEPS, type PreprocessStep } from "../contracts/PreprocessStep.js";
import type { TextDocument } from "../document/TextDocument.js";

/**
 * Done / lacking counts for one step.
 */
export interface StepStatusCount {
    readonly done: number;
    readonly lacking: number;
}

/**
 * Preprocessing overview of a document collection.
 */
export interface PreprocessStatusReport {
    readonly total: number;
    readonly raw: number;
    readonly steps: Readonly<Record<PreprocessStep, StepStatusCount>>;
}

/**
 * Read-only document queries.
 *
 * @example
 * ```typescript
 * const manager = new DocumentManager(repository);
 * for (const doc of manager.getDocumentsLackingPreprocess("tokenization")) {
 *     repository.save(doc.setPreprocessResult("tokenization", tokenize(doc.text)));
 * }
 * ```
 */
export class DocumentManager {
    constructor(private readonly repository: DocumentRepository) {}

    /**
     * Documents whose text is empty, whatever their preprocessing state.
     */
    getRawDocuments(): TextDocument[] {
        return this.repository.find({ kind: "raw" });
    }

    /**
     * Documents with no stored result for `step`, whatever the other steps.
     */
    getDocumentsLackingPreprocess(step: PreprocessStep): TextDocument[] {
        return this.repository.find({ kind: "lacking-preprocess", step });
    }

    /**
     * Documents with a stored result for `step`.
     */
    getDocumentsWithPreprocess(step: PreprocessStep): TextDocument[] {
        return this.repository.find({ kind: "with-preprocess", step });
    }

    /**
     * Per-step done / lacking counts plus the number of raw documents.
     */
    countByPreprocessStatus(): PreprocessStatusReport {
        const documents = this.repository.find();
        const steps: Record<PreprocessStep, StepStatusCount> = {
            tokenization: { done: 0, lacking: 0 },
            segmentation: { done: 0, lacking: 0 },
            tagging     : { done: 0, lacking: 0 },
            nerc        : { done: 0, lacking: 0 },
        };

        for (const step of PREPROCESS_STEPS) {
            const done = documents.filter((document) => document.wasPreprocessDone(step)).length;
            steps[step] = { done, lacking: documents.length - done };
        }

        return {
            total: documents.length,
            raw  : documents.filter((document) => document.text === "").length,
            steps,
        };
    }
}
