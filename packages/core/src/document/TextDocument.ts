/**
 * @fileoverview Text Document
 *
 * A raw document plus the per-step record of its preprocessing.
 *
 * The preprocess metadata changes only through
 * {@link TextDocument.setPreprocessResult}, which validates the result
 * against earlier steps and then writes it in one go. The document never
 * persists itself: callers hand it to a repository.
 *
 * @module @textmill/core/document/TextDocument
 */

import { randomUUID } from "crypto";
import {
    PREPROCESS_STEPS,
    dependentsOf,
    isPreprocessStep,
    type PreprocessStep,
    type StepResults,
} from "../contracts/PreprocessStep.js";
import type {
    DocumentSnapshot,
    PreprocessEntry,
    PreprocessEntrySnapshot,
    PreprocessMetadata,
} from "../contracts/PreprocessMetadata.js";
import type { Clock } from "../contracts/Clock.js";
import {
    InvalidPreprocessStepError,
    PreconditionError,
    StructuralValidationError,
} from "../errors.js";
import { parseStepResult, validateStepResult } from "../registry/validators.js";
import { systemClock } from "../impl/MonotonicClock.js";
import { materializeSentences } from "./sentences.js";

/**
 * Input for a new document.
 */
export interface TextDocumentInput {
    /** Document id (default: a random UUID) */
    readonly id?: string;

    /** Raw text; may be empty */
    readonly text: string;
}

/**
 * Collaborators of a document.
 */
export interface TextDocumentOptions {
    /** Source of `doneAt` timestamps (default: monotonic wall clock) */
    readonly clock?: Clock;
}

/**
 * Text document with preprocess state.
 *
 * Not safe for concurrent writers: callers serialize writes to one
 * document.
 *
 * @example
 * ```typescript
 * const doc = new TextDocument({ text: "Some sentence . And some other ." });
 *
 * doc.setPreprocessResult("tokenization", doc.text.split(" "))
 *     .setPreprocessResult("segmentation", [0, 3, 7]);
 *
 * repository.save(doc);
 *
 * for (const sentence of doc.getSentences()) {
 *     console.log(sentence.join(" "));
 * }
 * ```
 */
export class TextDocument {
    readonly id: string;
    readonly text: string;

    private metadata: PreprocessMetadata = {};
    private readonly clock: Clock;

    constructor(data: TextDocumentInput, options: TextDocumentOptions = {}) {
        this.id = data.id ?? randomUUID();
        this.text = data.text;
        this.clock = options.clock ?? systemClock;
    }

    /**
     * Rebuild a document from its stored form.
     *
     * Stored entries keep their original `doneAt`. Their shape is checked
     * again; cross-step constraints were checked when they were set and
     * are not re-applied.
     *
     * @throws InvalidPreprocessStepError for unknown stored step names
     * @throws StructuralValidationError for malformed entries
     */
    static restore(snapshot: DocumentSnapshot, options: TextDocumentOptions = {}): TextDocument {
        const document = new TextDocument({ id: snapshot.id, text: snapshot.text }, options);
        const stored: Readonly<Record<string, PreprocessEntrySnapshot | undefined>> = snapshot.preprocessMetadata;

        for (const key of Object.keys(stored)) {
            if (!isPreprocessStep(key)) {
                throw new InvalidPreprocessStepError(key);
            }
        }

        for (const step of PREPROCESS_STEPS) {
            const entry = stored[step];
            if (entry === undefined) {
                continue;
            }

            const doneAt = new Date(entry.doneAt);
            if (Number.isNaN(doneAt.getTime())) {
                throw new StructuralValidationError(step, `stored doneAt ${JSON.stringify(entry.doneAt)} is not a date`);
            }

            document.restoreEntry(step, entry.result, doneAt);
        }

        return document;
    }

    /**
     * Read-only view of the stored preprocess metadata.
     */
    get preprocessMetadata(): Readonly<PreprocessMetadata> {
        return this.metadata;
    }

    /**
     * Validate and store the result of a preprocess step.
     *
     * Steps may only depend on earlier steps: segmentation, tagging and
     * nerc need tokenization. On any error the metadata is left exactly as
     * it was. Setting a step again replaces its previous entry and drops
     * the stored results of every step that depends on it, so setting
     * tokenization again clears segmentation, tagging and nerc.
     *
     * @param step - The step whose result is being stored
     * @param result - The step output
     * @returns This document, so callers can chain `repository.save(...)`
     * @throws InvalidPreprocessStepError if `step` is not a preprocess step
     * @throws PreconditionError if a required earlier step is not done
     * @throws StructuralValidationError if the result has the wrong shape
     */
    setPreprocessResult<S extends PreprocessStep>(step: S, result: StepResults[S]): this;
    setPreprocessResult(step: string, result: unknown): this;
    setPreprocessResult(step: string, result: unknown): this {
        if (!isPreprocessStep(step)) {
            throw new InvalidPreprocessStepError(step);
        }

        const outcome = validateStepResult(step, result, this.metadata);
        if (!outcome.ok) {
            throw outcome.error;
        }

        this.write(step, { result: outcome.value, doneAt: this.clock.now() });
        return this;
    }

    /**
     * Whether a result is stored for `step`.
     */
    wasPreprocessDone(step: PreprocessStep): boolean {
        return this.metadata[step] !== undefined;
    }

    /**
     * Stored result for `step`, or undefined when not done.
     */
    getPreprocessResult<S extends PreprocessStep>(step: S): StepResults[S] | undefined {
        return this.getPreprocessEntry(step)?.result;
    }

    /**
     * Stored entry (result and timestamp) for `step`, or undefined when not done.
     */
    getPreprocessEntry<S extends PreprocessStep>(step: S): PreprocessEntry<S> | undefined {
        const entry: PreprocessEntry<S> | undefined = this.metadata[step];
        return entry;
    }

    /**
     * Sentences as token lists, cut at the segmentation boundaries.
     *
     * Each iteration re-reads the stored tokens and boundaries, and the
     * sentences concatenate back to the full token list.
     *
     * @throws PreconditionError if tokenization or segmentation is not done
     */
    getSentences(): Iterable<readonly string[]> {
        this.requireResult("tokenization");
        this.requireResult("segmentation");

        return {
            [Symbol.iterator]: () => materializeSentences(
                this.requireResult("tokenization"),
                this.requireResult("segmentation")
            )[Symbol.iterator](),
        };
    }

    /**
     * Plain, serializable form of the document.
     */
    toSnapshot(): DocumentSnapshot {
        const preprocessMetadata: Record<string, PreprocessEntrySnapshot> = {};

        for (const step of PREPROCESS_STEPS) {
            const entry = this.metadata[step];
            if (entry) {
                preprocessMetadata[step] = {
                    result: [...entry.result],
                    doneAt: entry.doneAt.toISOString(),
                };
            }
        }

        return {
            id  : this.id,
            text: this.text,
            preprocessMetadata,
        };
    }

    private restoreEntry<S extends PreprocessStep>(step: S, result: unknown, doneAt: Date): void {
        const parsed = parseStepResult(step, result);
        if (!parsed.ok) {
            throw parsed.error;
        }

        this.write(step, { result: parsed.value, doneAt });
    }

    /**
     * Replace a slot and clear the slots that depend on it. Only called
     * once the entry is accepted.
     */
    private write<S extends PreprocessStep>(step: S, entry: PreprocessEntry<S>): void {
        const next: PreprocessMetadata = { ...this.metadata };
        for (const dependent of dependentsOf(step)) {
            delete next[dependent];
        }
        next[step] = entry;
        this.metadata = next;
    }

    private requireResult<S extends PreprocessStep>(step: S): StepResults[S] {
        const result = this.getPreprocessResult(step);
        if (result === undefined) {
            throw new PreconditionError("sentences", step, `Cannot materialize sentences before ${step} is done`);
        }
        return result;
    }
}
