/**
 * @fileoverview Monotonic wall clock
 *
 * @module @textmill/core/impl/MonotonicClock
 */

import type { Clock } from "../contracts/Clock.js";

/**
 * Wall-clock time that never goes backwards.
 *
 * If the underlying source steps back (NTP adjustment, manual change),
 * the last returned instant is repeated until the source catches up.
 *
 * @example
 * ```typescript
 * const clock = new MonotonicClock();
 * clock.now(); // 2025-01-15T10:00:00.000Z
 * ```
 */
export class MonotonicClock implements Clock {
    private last = Number.NEGATIVE_INFINITY;

    /**
     * @param source - Milliseconds since the epoch (default: Date.now)
     */
    constructor(private readonly source: () => number = Date.now) {}

    now(): Date {
        this.last = Math.max(this.last, this.source());
        return new Date(this.last);
    }
}

/**
 * Shared default clock.
 */
export const systemClock: Clock = new MonotonicClock();
