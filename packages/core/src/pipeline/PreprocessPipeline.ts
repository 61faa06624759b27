/**
 * @fileoverview Preprocess Pipeline
 *
 * Runs registered step runners over the documents of a repository and
 * records their results.
 *
 * Pipeline flow, per step in registry order:
 * 1. Select documents lacking the step (or every document with override)
 * 2. Skip documents whose prerequisite steps are not done
 * 3. Run the step runner
 * 4. Validate and store the result on the document
 * 5. Save the document
 *
 * A failing document (runner error or rejected result) is logged,
 * reported as an event and counted; the batch goes on.
 *
 * @module @textmill/core/pipeline/PreprocessPipeline
 */

import {
    PREPROCESS_STEPS,
    prerequisitesOf,
    type PreprocessStep,
} from "../contracts/PreprocessStep.js";
import type { DocumentRepository } from "../contracts/Repository.js";
import type { PreprocessStepRunner, StepRunnerContext } from "../contracts/StepRunner.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import {
    consoleLogger,
    createScopedLogger,
    type Logger,
} from "../contracts/Logger.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { TextDocument } from "../document/TextDocument.js";

/**
 * Pipeline configuration options.
 */
export interface PipelineConfig {
    /** Where documents are read from and saved to */
    readonly repository: DocumentRepository;

    /** Runners to register up front */
    readonly runners?: readonly PreprocessStepRunner[];

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for pipeline operations */
    readonly logger?: Logger;

    /** Read-only configuration handed to runners */
    readonly runnerConfig?: Record<string, unknown>;
}

/**
 * Options for a processing call.
 */
export interface ProcessOptions {
    /** Re-run steps that are already done (default: false) */
    readonly override?: boolean;
}

/**
 * What happened to one document for one step.
 */
export type DocumentOutcome = "preprocessed" | "skipped" | "failed";

/**
 * Counts for one step of a run.
 */
export interface StepReport {
    readonly step: PreprocessStep;
    readonly processed: number;
    readonly skipped: number;
    readonly failed: number;
}

/**
 * Result of {@link PreprocessPipeline.processAll}.
 */
export interface PipelineReport {
    readonly runId: string;
    readonly steps: readonly StepReport[];
}

/**
 * Generate a unique id for a pipeline run.
 */
function generateRunId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `run_${timestamp}_${random}`;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * PreprocessPipeline - drives step runners over a document repository.
 *
 * @example
 * ```typescript
 * const pipeline = new PreprocessPipeline({ repository });
 *
 * pipeline.registerRunner(whitespaceTokenizer);
 * pipeline.registerRunner(punctuationSegmenter);
 *
 * pipeline.eventBus.subscribe("document:failed", (event) => {
 *     console.log("Rejected:", event.data);
 * });
 *
 * const report = await pipeline.processAll();
 * ```
 */
export class PreprocessPipeline {
    private readonly repository: DocumentRepository;
    private readonly logger: Logger;
    private readonly runnerConfig: Readonly<Record<string, unknown>>;
    private readonly runners: Map<PreprocessStep, PreprocessStepRunner> = new Map();

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: PipelineConfig) {
        this.repository = config.repository;
        this.logger = config.logger ?? consoleLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus(this.logger);
        this.runnerConfig = config.runnerConfig ?? {};

        for (const runner of config.runners ?? []) {
            this.registerRunner(runner);
        }
    }

    /**
     * Register the runner for a step.
     *
     * @throws Error if the step already has a runner
     */
    registerRunner(runner: PreprocessStepRunner): void {
        const existing = this.runners.get(runner.step);
        if (existing) {
            throw new Error(`Runner already registered for step ${runner.step}: ${existing.id}`);
        }

        this.runners.set(runner.step, runner);
        this.logger.info("Runner registered", {
            step    : runner.step,
            runnerId: runner.id,
        });
    }

    /**
     * Remove the runner of a step, if any.
     */
    unregisterRunner(step: PreprocessStep): void {
        if (this.runners.delete(step)) {
            this.logger.info("Runner unregistered", { step });
        }
    }

    /**
     * Steps with a registered runner, in pipeline order.
     */
    get registeredSteps(): PreprocessStep[] {
        return PREPROCESS_STEPS.filter((step) => this.runners.has(step));
    }

    /**
     * Run every registered step, in order, over the repository.
     */
    async processAll(options: ProcessOptions = {}): Promise<PipelineReport> {
        const runId = generateRunId();
        const steps: StepReport[] = [];

        this.emit(createEvent("pipeline:started", {
            steps   : this.registeredSteps,
            override: options.override ?? false,
        }, runId));

        for (const step of this.registeredSteps) {
            steps.push(await this.runStep(step, options, runId));
        }

        this.emit(createEvent("pipeline:finished", { steps }, runId));
        this.logger.info("Pipeline finished", { runId, steps: steps.length });

        return { runId, steps };
    }

    /**
     * Run one step over the documents that lack it (all documents with override).
     *
     * @throws Error if no runner is registered for the step
     */
    async processStep(step: PreprocessStep, options: ProcessOptions = {}): Promise<StepReport> {
        return this.runStep(step, options, generateRunId());
    }

    /**
     * Run every registered step on a single document, saving after each
     * stored result.
     */
    async processDocument(
        document: TextDocument,
        options: ProcessOptions = {}
    ): Promise<Partial<Record<PreprocessStep, DocumentOutcome>>> {
        const runId = generateRunId();
        const outcomes: Partial<Record<PreprocessStep, DocumentOutcome>> = {};

        for (const step of this.registeredSteps) {
            const runner = this.requireRunner(step);
            outcomes[step] = await this.applyRunner(runner, document, options, runId);
        }

        return outcomes;
    }

    private async runStep(step: PreprocessStep, options: ProcessOptions, runId: string): Promise<StepReport> {
        const runner = this.requireRunner(step);
        const documents = options.override
            ? this.repository.find()
            : this.repository.find({ kind: "lacking-preprocess", step });

        this.emit(createEvent("step:started", {
            step,
            runnerId : runner.id,
            documents: documents.length,
        }, runId));

        let processed = 0;
        let skipped = 0;
        let failed = 0;

        for (const document of documents) {
            const outcome = await this.applyRunner(runner, document, options, runId);
            if (outcome === "preprocessed") {
                processed++;
            }
            else if (outcome === "skipped") {
                skipped++;
            }
            else {
                failed++;
            }
        }

        const report: StepReport = { step, processed, skipped, failed };

        this.emit(createEvent("step:finished", { ...report }, runId));
        this.logger.info("Step finished", { runId, ...report });

        return report;
    }

    /**
     * Run one runner on one document and store the result.
     */
    private async applyRunner(
        runner: PreprocessStepRunner,
        document: TextDocument,
        options: ProcessOptions,
        runId: string
    ): Promise<DocumentOutcome> {
        const step = runner.step;

        if (!options.override && document.wasPreprocessDone(step)) {
            this.emit(createEvent("document:skipped", {
                documentId: document.id,
                step,
                reason    : "already done",
            }, runId));
            return "skipped";
        }

        const missing = prerequisitesOf(step).find((required) => !document.wasPreprocessDone(required));
        if (missing !== undefined) {
            this.emit(createEvent("document:skipped", {
                documentId : document.id,
                step,
                reason     : "missing prerequisite",
                missingStep: missing,
            }, runId));

            this.logger.debug("Document skipped (missing prerequisite)", {
                documentId : document.id,
                step,
                missingStep: missing,
                runId,
            });
            return "skipped";
        }

        const context: StepRunnerContext = {
            config: this.runnerConfig,
            logger: createScopedLogger(`${step}:${runner.id}`, this.logger, { runId }),
            runId,
        };

        try {
            const result = await runner.run(document, context);
            this.repository.save(document.setPreprocessResult(step, result));

            this.emit(createEvent("document:preprocessed", {
                documentId: document.id,
                step,
                runnerId  : runner.id,
            }, runId));
            return "preprocessed";
        }
        catch (error) {
            this.logger.error("Document preprocessing failed", {
                documentId: document.id,
                step,
                runnerId  : runner.id,
                runId,
                error     : errorMessage(error),
            });

            this.emit(createEvent("document:failed", {
                documentId: document.id,
                step,
                runnerId  : runner.id,
                error     : errorMessage(error),
            }, runId));
            return "failed";
        }
    }

    private requireRunner(step: PreprocessStep): PreprocessStepRunner {
        const runner = this.runners.get(step);
        if (!runner) {
            throw new Error(`No runner registered for step: ${step}`);
        }
        return runner;
    }

    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
