import type { EpochInput, SnowflakeFields, SnowflakeMetadata } from "../types"
import { describeType } from "../utils/ByteUtils"
import {
  MAX_MACHINE_ID,
  MAX_SEQUENCE,
  MAX_TIMESTAMP,
  epochToMs,
  isValidMachineId,
  pack,
  unpack,
} from "./SnowflakeLayout"
import { SnowflakeValue } from "./SnowflakeValue"

/**
 * Anything the parser accepts as an identifier.
 */
export type SnowflakeInput = bigint | string | Uint8Array | SnowflakeValue

/**
 * Decodes identifiers into their fields and composes identifiers from fields.
 *
 * Decoding needs no secret and no generator state; the absolute creation
 * time additionally needs the epoch the generator was configured with.
 */
export class SnowflakeParser {
  /**
   * Parses an identifier into frozen metadata.
   *
   * @param input - bigint, decimal string, 8-byte binary or SnowflakeValue.
   * @param epoch - Epoch of the generator that issued the identifier.
   *
   * @throws {TypeError}  Unsupported input type.
   * @throws {RangeError} Input out of range, malformed, an invalid epoch, or an instant Date cannot hold.
   *
   * @example
   * ```ts
   * const meta = SnowflakeParser.parse("7130316800172039", new Date("2024-01-01T00:00:00Z"))
   * meta.machineId // 42
   * meta.sequence  // 7
   * meta.iso       // "2024-01-20T16:13:20.000Z"
   * ```
   */
  static parse(input: SnowflakeInput, epoch: EpochInput): SnowflakeMetadata {
    const epochMs = SnowflakeParser.resolveEpoch(epoch)
    const fields = unpack(SnowflakeParser.normalize(input).toBigInt())

    const unixMs = epochMs + fields.timestamp
    const date = new Date(unixMs)
    if (!Number.isFinite(date.getTime())) {
      throw new RangeError(
        `SnowflakeParser: timestamp ${fields.timestamp} past epoch ${epochMs} lies beyond the range of Date.`
      )
    }

    return Object.freeze({
      ...fields,
      unixMs,
      date,
      iso: date.toISOString(),
    })
  }

  /**
   * Decodes the three packed fields without resolving absolute time.
   */
  static fields(input: SnowflakeInput): SnowflakeFields {
    return Object.freeze(unpack(SnowflakeParser.normalize(input).toBigInt()))
  }

  static timestampOf(input: SnowflakeInput): number {
    return SnowflakeParser.fields(input).timestamp
  }

  static machineIdOf(input: SnowflakeInput): number {
    return SnowflakeParser.fields(input).machineId
  }

  static sequenceOf(input: SnowflakeInput): number {
    return SnowflakeParser.fields(input).sequence
  }

  /**
   * Packs fields into an identifier.
   *
   * @throws {RangeError} Any field outside its bit width.
   */
  static compose(fields: SnowflakeFields): SnowflakeValue {
    const { timestamp, machineId, sequence } = fields

    if (!Number.isInteger(timestamp) || timestamp < 0 || timestamp > MAX_TIMESTAMP) {
      throw new RangeError(
        `SnowflakeParser.compose: timestamp must be an integer between 0 and ${MAX_TIMESTAMP}. ` +
        `Received: ${timestamp}`
      )
    }

    if (!isValidMachineId(machineId)) {
      throw new RangeError(
        `SnowflakeParser.compose: machineId must be an integer between 0 and ${MAX_MACHINE_ID}. ` +
        `Received: ${machineId}`
      )
    }

    if (!Number.isInteger(sequence) || sequence < 0 || sequence > MAX_SEQUENCE) {
      throw new RangeError(
        `SnowflakeParser.compose: sequence must be an integer between 0 and ${MAX_SEQUENCE}. ` +
        `Received: ${sequence}`
      )
    }

    return new SnowflakeValue(pack(timestamp, machineId, sequence))
  }

  /**
   * Smallest identifier any generator on `epoch` can issue at or after
   * `instant`. Use as the inclusive lower bound of a time-range query over
   * an ID column:
   *
   * ```sql
   * SELECT * FROM events WHERE id >= $1 AND id < $2
   * ```
   *
   * Instants before the epoch clamp to 0.
   *
   * @throws {RangeError} Instant past the 41-bit horizon, or invalid epoch/instant.
   */
  static lowerBoundFor(instant: Date, epoch: EpochInput): SnowflakeValue {
    const epochMs = SnowflakeParser.resolveEpoch(epoch)
    const instantMs = instant instanceof Date ? instant.getTime() : Number.NaN

    if (!Number.isFinite(instantMs)) {
      throw new RangeError(
        `SnowflakeParser.lowerBoundFor: instant must be a valid Date. Received: ${String(instant)}`
      )
    }

    const timestamp = Math.max(instantMs - epochMs, 0)
    return SnowflakeParser.compose({ timestamp, machineId: 0, sequence: 0 })
  }

  private static resolveEpoch(epoch: EpochInput): number {
    const epochMs = epochToMs(epoch)
    if (epochMs === undefined) {
      throw new RangeError(
        `SnowflakeParser: epoch must be a valid Date or a non-negative integer of Unix milliseconds. ` +
        `Received: ${String(epoch)}`
      )
    }
    return epochMs
  }

  private static normalize(input: SnowflakeInput): SnowflakeValue {
    if (input instanceof SnowflakeValue) {
      return input
    }

    if (typeof input === "bigint") {
      return new SnowflakeValue(input)
    }

    if (typeof input === "string") {
      return SnowflakeValue.fromString(input)
    }

    if (input instanceof Uint8Array) {
      return SnowflakeValue.fromBinary(input)
    }

    // Unreachable in TypeScript; plain JS callers can still get here
    throw new TypeError(
      `SnowflakeParser: unsupported input type "${describeType(input)}". ` +
      `Accepted: bigint, decimal string, 8-byte Uint8Array/Buffer, SnowflakeValue.`
    )
  }
}
