/**
 * Millisecond time source consulted by the generator.
 *
 * Implementations return Unix milliseconds. The value is allowed to go
 * backward (NTP sync, VM migration); SnowflakeGenerator detects and reports
 * that rather than trusting the clock to be monotonic.
 */
export interface Clock {
  now(): number
}

/**
 * Wall clock backed by Date.now().
 */
export class SystemClock implements Clock {
  now(): number {
    return Date.now()
  }
}

/** Shared default clock. Stateless, so one instance serves every generator. */
export const systemClock: Clock = new SystemClock()

/**
 * Clock that only moves when told to.
 *
 * Lets tests and simulations drive forward jumps, backward jumps and
 * millisecond-boundary crossings deterministically.
 *
 * @example
 * ```ts
 * const clock = new ManualClock(Date.parse("2025-01-01T00:00:00Z"))
 * const generator = new SnowflakeGenerator({ epoch: 0, machineId: 1, clock })
 * generator.next()
 * clock.rewind(5)
 * generator.next() // throws ClockRolledBackError, driftMs = 5
 * ```
 */
export class ManualClock implements Clock {
  private current: number

  constructor(startMs: number) {
    ManualClock.assertInteger(startMs, "startMs")
    this.current = startMs
  }

  now(): number {
    return this.current
  }

  set(ms: number): void {
    ManualClock.assertInteger(ms, "ms")
    this.current = ms
  }

  advance(ms = 1): void {
    ManualClock.assertInteger(ms, "ms")
    this.current += ms
  }

  rewind(ms = 1): void {
    ManualClock.assertInteger(ms, "ms")
    this.current -= ms
  }

  private static assertInteger(value: number, name: string): void {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(
        `ManualClock: ${name} must be a safe integer number of milliseconds. ` +
        `Received: ${value}`
      )
    }
  }
}
