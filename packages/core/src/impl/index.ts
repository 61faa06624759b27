/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of core contracts.
 *
 * @module @textmill/core/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { InMemoryDocumentRepository } from "./InMemoryDocumentRepository.js";
export { InMemoryTextChunkRepository } from "./InMemoryTextChunkRepository.js";
export { MonotonicClock, systemClock } from "./MonotonicClock.js";
