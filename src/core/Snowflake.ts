import type { Logger } from "pino"
import { Config } from "../config"
import type { EpochInput, SnowflakeMetadata } from "../types"
import type { Clock } from "../utils/Clock"
import { createLogger } from "../utils/logger"
import { MachineIdResolver, type MachineIdEnv, type MachineIdSource } from "./MachineIdResolver"
import { SnowflakeGenerator } from "./SnowflakeGenerator"
import { SnowflakeParser, type SnowflakeInput } from "./SnowflakeParser"
import { SnowflakeValue } from "./SnowflakeValue"

/**
 * Input shape for Snowflake.initialize().
 *
 * epoch (optional):
 *   Origin of the timestamp field. Defaults to SNOWFLAKE_EPOCH, or
 *   2024-01-01T00:00:00.000Z when that is unset. Every service decoding
 *   these IDs must agree on it.
 *
 * machineId (optional):
 *   number (0–1023) or string (hashed to 10 bits). If omitted, resolved from
 *   SNOWFLAKE_MACHINE_ID → POD_IP → HOSTNAME → random (with warning).
 *
 * See also: MachineIdResolver.
 */
export interface SnowflakeInitOptions {
  epoch?: EpochInput
  machineId?: number | string
  clock?: Clock
  /** Receives the startup diagnostics. Defaults to the library's pino child logger. */
  logger?: Logger
  /** Environment consulted when machineId is omitted. Defaults to process.env. */
  env?: MachineIdEnv
}

/**
 * Configured entry point: resolves the machineId, owns one generator, and
 * decodes IDs against the same epoch.
 *
 * Create one instance per process (or per worker thread) and reuse it; the
 * generator holds the sequence state that keeps IDs unique.
 *
 * Usage:
 * const snowflake = Snowflake.initialize({ machineId: 42 })
 *
 * const id   = snowflake.generate()
 * const meta = snowflake.parse(id)
 */
export class Snowflake {
  private readonly generator: SnowflakeGenerator
  private readonly machineIdSource: MachineIdSource

  private constructor(options: SnowflakeInitOptions) {
    const log = options.logger ?? createLogger({ component: "snowflake" })
    const resolution = MachineIdResolver.resolve(options.machineId, options.env ?? process.env)

    this.generator = new SnowflakeGenerator({
      epoch: options.epoch ?? Config.SNOWFLAKE_EPOCH,
      machineId: resolution.machineId,
      clock: options.clock,
    })
    this.machineIdSource = resolution.source

    if (resolution.warning) {
      log.warn({ machineId: resolution.machineId, source: resolution.source }, resolution.warning)
    }

    log.info(
      {
        machineId: resolution.machineId,
        source: resolution.source,
        epoch: new Date(this.generator.getEpoch()).toISOString(),
      },
      "snowflake generator initialized"
    )
  }

  /**
   * Creates a configured instance. Call once at startup and keep the result.
   *
   * @throws {InvalidConfigError} machineId out of range or empty, epoch
   *                              invalid or in the future.
   *
   * @example
   * ```ts
   * const snowflake = Snowflake.initialize({
   *   epoch: new Date("2024-01-01T00:00:00Z"),
   *   machineId: "pod-backend-7d9f",
   * })
   * ```
   */
  static initialize(options: SnowflakeInitOptions = {}): Snowflake {
    return new Snowflake(options)
  }

  /**
   * Issues the next identifier. Synchronous; spins for at most about a
   * millisecond when the current millisecond's 4096 IDs are used up.
   *
   * @throws {ClockRolledBackError}   The clock moved backwards.
   * @throws {TimeRangeExceededError} The epoch's 41-bit range is exhausted.
   *
   * @example
   * ```ts
   * const id = snowflake.generate()
   * await db.query("INSERT INTO users (id, email) VALUES ($1, $2)", [id.toString(), email])
   * ```
   */
  generate(): SnowflakeValue {
    return new SnowflakeValue(this.generator.next())
  }

  /**
   * As generate(), but sleeps instead of spinning on sequence overflow.
   */
  async generateAsync(): Promise<SnowflakeValue> {
    return new SnowflakeValue(await this.generator.nextAsync())
  }

  /**
   * Decodes an identifier against this instance's epoch.
   *
   * @throws {TypeError}  Unsupported input type.
   * @throws {RangeError} Malformed or out-of-range input.
   */
  parse(input: SnowflakeInput): SnowflakeMetadata {
    return SnowflakeParser.parse(input, this.generator.getEpoch())
  }

  // ─── Diagnostics ─────────────────────────────────────────────────────────

  getMachineId(): number {
    return this.generator.getMachineId()
  }

  getMachineIdSource(): MachineIdSource {
    return this.machineIdSource
  }

  /** Epoch in Unix milliseconds. */
  getEpoch(): number {
    return this.generator.getEpoch()
  }
}
