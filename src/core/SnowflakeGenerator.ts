import { AsyncMutex } from "../utils/AsyncMutex"
import { systemClock, type Clock } from "../utils/Clock"
import type { EpochInput } from "../types"
import {
  ClockRolledBackError,
  InvalidConfigError,
  TimeRangeExceededError,
} from "./SnowflakeErrors"
import {
  MAX_MACHINE_ID,
  MAX_SEQUENCE,
  MAX_TIMESTAMP,
  epochToMs,
  isValidMachineId,
  pack,
} from "./SnowflakeLayout"

/**
 * Step between clock re-reads while nextAsync() waits out an exhausted
 * millisecond.
 */
const SLEEP_WAIT_MS = 1

export interface SnowflakeGeneratorConfig {
  /**
   * Instant the timestamp field counts from. Must not lie in the future at
   * construction time.
   */
  epoch: EpochInput

  /**
   * Node identifier, an integer 0–1023. Must be unique across all
   * concurrently running generators; nothing here enforces that.
   */
  machineId: number

  /** Time source. Defaults to the system wall clock. */
  clock?: Clock
}

/** Timestamp/sequence pair a call would commit. */
interface Tick {
  timestamp: number
  sequence: number
}

/**
 * Snowflake-style 64-bit ID generator.
 *
 * Layout: [sign 1b = 0][timestamp 41b][machineId 10b][sequence 12b]
 *
 * Uniqueness:
 *   Within an instance → timestamp + sequence (4096 IDs/ms; waits on overflow)
 *   Across instances   → machineId, as long as no two live instances share one
 *
 * Clock handling:
 *   A clock reading earlier than the last issued timestamp raises
 *   ClockRolledBackError and leaves state untouched; the generator never
 *   retries on its own. Exhausting the sequence within one millisecond moves
 *   the timestamp forward by one and waits for the clock to reach it.
 *
 * Concurrency:
 *   next() runs to completion without yielding, so on Node's single-threaded
 *   event loop it is one critical section; its overflow wait spins.
 *   nextAsync() sleeps instead and holds a per-instance mutex across the
 *   sleep. Worker threads do not share instances: give each its own
 *   generator and machineId.
 */
export class SnowflakeGenerator {
  private readonly epochMs: number
  private readonly machineId: number
  private readonly clock: Clock
  private readonly mutex = new AsyncMutex()

  /** Milliseconds since epoch of the most recently issued ID. */
  private lastTimestamp = -1

  /** Primed to the maximum so the first same-millisecond tick rolls to 0. */
  private sequence = MAX_SEQUENCE

  /**
   * @throws {InvalidConfigError} machineId outside 0–1023, epoch not a valid
   *                              instant, or epoch in the future.
   */
  constructor(config: SnowflakeGeneratorConfig) {
    if (!isValidMachineId(config.machineId)) {
      throw new InvalidConfigError(
        `Snowflake: machineId must be an integer between 0 and ${MAX_MACHINE_ID}. ` +
        `Received: ${config.machineId}`,
        "machineId"
      )
    }

    const epochMs = epochToMs(config.epoch)
    if (epochMs === undefined) {
      throw new InvalidConfigError(
        `Snowflake: epoch must be a valid Date or a non-negative integer of Unix milliseconds. ` +
        `Received: ${String(config.epoch)}`,
        "epoch"
      )
    }

    const clock = config.clock ?? systemClock
    if (typeof clock.now !== "function") {
      throw new InvalidConfigError(`Snowflake: clock must implement now().`, "clock")
    }

    const nowMs = clock.now()
    if (epochMs > nowMs) {
      throw new InvalidConfigError(
        `Snowflake: epoch ${new Date(epochMs).toISOString()} is in the future ` +
        `(clock reads ${new Date(nowMs).toISOString()}).`,
        "epoch"
      )
    }

    this.epochMs = epochMs
    this.machineId = config.machineId
    this.clock = clock
  }

  /**
   * Issues the next identifier.
   *
   * Blocks the event loop for at most about a millisecond when 4096 IDs have
   * already been issued in the current millisecond.
   *
   * @throws {ClockRolledBackError}   The clock reads earlier than the last issued timestamp.
   * @throws {TimeRangeExceededError} Elapsed time no longer fits 41 bits.
   */
  next(): bigint {
    const tick = this.plan(this.elapsed())

    while (this.elapsed() < tick.timestamp) {
      // spin until the clock reaches the borrowed millisecond
    }

    return this.commit(tick)
  }

  /**
   * Issues the next identifier without busy-waiting.
   *
   * Same algorithm as next(), but an exhausted millisecond is waited out by
   * sleeping and re-reading the clock. Callers queue on a FIFO mutex, so
   * concurrent calls resolve in call order with non-decreasing values.
   * Trades a latency floor of one timer tick for not burning CPU.
   *
   * @throws {ClockRolledBackError}   (rejection) as for next().
   * @throws {TimeRangeExceededError} (rejection) as for next().
   */
  async nextAsync(): Promise<bigint> {
    return this.mutex.runExclusive(async () => {
      for (;;) {
        // Re-plan after every sleep: synchronous next() calls may have
        // advanced the state meanwhile.
        const now = this.elapsed()
        const tick = this.plan(now)
        if (now >= tick.timestamp) {
          return this.commit(tick)
        }
        await sleep(SLEEP_WAIT_MS)
      }
    })
  }

  getMachineId(): number {
    return this.machineId
  }

  /** Epoch in Unix milliseconds. */
  getEpoch(): number {
    return this.epochMs
  }

  private elapsed(): number {
    return this.clock.now() - this.epochMs
  }

  /**
   * Works out the timestamp/sequence the next ID takes at `now` without
   * touching state.
   */
  private plan(now: number): Tick {
    if (now < this.lastTimestamp || now < 0) {
      const last = Math.max(this.lastTimestamp, 0)
      throw new ClockRolledBackError(last, now, last - now)
    }

    let tick: Tick
    if (now > this.lastTimestamp) {
      tick = { timestamp: now, sequence: 0 }
    } else {
      const sequence = (this.sequence + 1) & MAX_SEQUENCE
      // Wrapped: this millisecond is used up, borrow the next one.
      tick = sequence === 0
        ? { timestamp: this.lastTimestamp + 1, sequence }
        : { timestamp: this.lastTimestamp, sequence }
    }

    if (tick.timestamp > MAX_TIMESTAMP) {
      throw new TimeRangeExceededError(tick.timestamp, MAX_TIMESTAMP)
    }

    return tick
  }

  private commit(tick: Tick): bigint {
    this.lastTimestamp = tick.timestamp
    this.sequence = tick.sequence
    return pack(tick.timestamp, this.machineId, tick.sequence)
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
