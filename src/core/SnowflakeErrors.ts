/**
 * Discriminant carried by every error the generator raises.
 */
export type SnowflakeErrorCode =
  | "INVALID_CONFIG"
  | "CLOCK_ROLLED_BACK"
  | "TIME_RANGE_EXCEEDED"

/**
 * Base class of the generator's error kinds.
 *
 * Callers branch on `code` (or `instanceof` a subclass). Argument errors
 * raised by value objects, the parser and the adapters are plain
 * TypeError / RangeError and do not extend this class.
 */
export abstract class SnowflakeError extends Error {
  abstract readonly code: SnowflakeErrorCode

  protected constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Raised at construction when the machine ID or epoch is unusable.
 * Not retryable: the configuration has to change.
 */
export class InvalidConfigError extends SnowflakeError {
  readonly code = "INVALID_CONFIG"

  constructor(
    message: string,
    /** Name of the offending option, when a single one is at fault. */
    readonly field?: "epoch" | "machineId" | "clock"
  ) {
    super(message)
  }
}

/**
 * Raised when the clock reads earlier than the last timestamp the generator
 * issued an ID for. Generator state is untouched; the next call succeeds once
 * the clock has caught up.
 */
export class ClockRolledBackError extends SnowflakeError {
  readonly code = "CLOCK_ROLLED_BACK"

  constructor(
    /** Milliseconds (since epoch) of the most recently issued ID. */
    readonly lastTimestamp: number,
    /** Milliseconds (since epoch) the clock reported on the failing call. */
    readonly currentTimestamp: number,
    readonly driftMs: number
  ) {
    super(
      `Snowflake: clock moved backwards by ${driftMs}ms ` +
      `(last issued at ${lastTimestamp}ms, clock now at ${currentTimestamp}ms since epoch). ` +
      `Refusing to generate an ID.`
    )
  }
}

/**
 * Raised when elapsed time since the epoch no longer fits the 41-bit
 * timestamp field. Fatal for this epoch.
 */
export class TimeRangeExceededError extends SnowflakeError {
  readonly code = "TIME_RANGE_EXCEEDED"

  constructor(readonly timestamp: number, readonly maxTimestamp: number) {
    super(
      `Snowflake: timestamp ${timestamp}ms exceeds the 41-bit maximum (${maxTimestamp}ms). ` +
      `The epoch's usable range is exhausted; construct a generator with a later epoch.`
    )
  }
}

export function isSnowflakeError(value: unknown): value is SnowflakeError {
  return value instanceof SnowflakeError
}
