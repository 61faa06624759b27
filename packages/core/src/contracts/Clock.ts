/**
 * Clock Contract
 *
 * Source of the `doneAt` timestamp recorded for each step result.
 * Implementations must never report an earlier instant than one they
 * already returned.
 */

/**
 * Clock interface.
 *
 * @example
 * ```typescript
 * const fixed: Clock = { now: () => new Date("2025-01-15T10:00:00.000Z") };
 * const doc = new TextDocument({ text: "Some text" }, { clock: fixed });
 * ```
 */
export interface Clock {
    /** Current instant */
    now(): Date;
}
