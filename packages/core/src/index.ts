/**
 * @fileoverview textmill core
 *
 * Records and validates the outputs of document preprocessing
 * (tokenization, segmentation, tagging, NER) and answers queries over
 * them.
 *
 * The core provides:
 * - An ordered preprocess step registry with structural validators
 * - Per-document preprocess state with atomic validate-then-write
 * - Sentence materialization from tokens and boundaries
 * - Document and chunk queries behind narrow repository interfaces
 * - A pipeline that drives pluggable step runners
 *
 * @module @textmill/core
 * @example
 * ```typescript
 * import {
 *     TextDocument,
 *     InMemoryDocumentRepository,
 *     DocumentManager,
 * } from "@textmill/core";
 *
 * const repository = new InMemoryDocumentRepository();
 * const doc = new TextDocument({ text: "Some sentence ." });
 * repository.save(doc.setPreprocessResult("tokenization", ["Some", "sentence", "."]));
 *
 * new DocumentManager(repository).getDocumentsLackingPreprocess("segmentation");
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Errors
// ============================================================================

export {
    PreprocessError,
    InvalidPreprocessStepError,
    InvalidPreprocessSteps,
    PreconditionError,
    StructuralValidationError,
    type PreconditionTarget,
} from "./errors.js";

// ============================================================================
// Registry
// ============================================================================

export {
    STEP_SHAPES,
    STEP_CONSTRAINTS,
    parseStepResult,
    validateStepResult,
    type ValidationOutcome,
    type ValidationFailure,
    type ShapeParser,
    type StepConstraint,
} from "./registry/validators.js";

// ============================================================================
// Documents
// ============================================================================

export {
    TextDocument,
    type TextDocumentInput,
    type TextDocumentOptions,
} from "./document/TextDocument.js";
export { materializeSentences, sentenceCuts } from "./document/sentences.js";

// ============================================================================
// Queries
// ============================================================================

export {
    DocumentManager,
    type PreprocessStatusReport,
    type StepStatusCount,
} from "./query/DocumentManager.js";
export { TextChunkManager } from "./query/TextChunkManager.js";

// ============================================================================
// Implementation exports
// ============================================================================

export * from "./impl/index.js";

// ============================================================================
// Pipeline exports
// ============================================================================

export {
    PreprocessPipeline,
    type PipelineConfig,
    type ProcessOptions,
    type DocumentOutcome,
    type StepReport,
    type PipelineReport,
} from "./pipeline/PreprocessPipeline.js";
