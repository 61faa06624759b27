/**
 * @fileoverview Contract barrel exports
 *
 * Storage-agnostic interfaces and types of the preprocessing core.
 *
 * @module @textmill/core/contracts
 */

// Preprocess steps
export type { PreprocessStep, StepResults } from "./PreprocessStep.js";
export {
    PREPROCESS_STEPS,
    STEP_PREREQUISITES,
    dependentsOf,
    isPreprocessStep,
    prerequisitesOf,
    stepIndex,
} from "./PreprocessStep.js";

// Preprocess metadata
export type {
    PreprocessEntry,
    PreprocessMetadata,
    PreprocessEntrySnapshot,
    DocumentSnapshot,
} from "./PreprocessMetadata.js";

// Chunks and entities
export type {
    EntityRef,
    EntityInChunk,
    TextChunk,
    TextChunkInput,
} from "./TextChunk.js";
export {
    createTextChunk,
    addEntityMention,
    chunkMentionsAll,
} from "./TextChunk.js";

// Repositories
export type {
    DocumentFilter,
    ChunkFilter,
    DocumentRepository,
    TextChunkRepository,
} from "./Repository.js";
export {
    matchesDocumentFilter,
    matchesChunkFilter,
} from "./Repository.js";

// Clock
export type { Clock } from "./Clock.js";

// Logger
export type { Logger, LogLevel } from "./Logger.js";
export {
    LOG_LEVELS,
    consoleLogger,
    createLevelLogger,
    createScopedLogger,
    isLogLevel,
} from "./Logger.js";

// Step runners
export type {
    PreprocessStepRunner,
    StepRunnerContext,
} from "./StepRunner.js";
export { isStepRunner } from "./StepRunner.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    PipelineEventType,
    DocumentEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
