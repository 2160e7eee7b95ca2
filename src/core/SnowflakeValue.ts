import { ByteUtils, UINT64_BYTES, describeType } from "../utils/ByteUtils"
import { MAX_ID } from "./SnowflakeLayout"

/**
 * Decimal form of an identifier: 1–19 digits, no sign, no leading zeros
 * except for "0" itself.
 */
const DECIMAL_REGEX = /^(0|[1-9]\d{0,18})$/

/**
 * Immutable value object wrapping one identifier.
 *
 * Representations:
 *   - bigint   → toBigInt(); the canonical form
 *   - string   → toString() / toJSON(); decimal, safe for JSON and URLs
 *   - binary   → toBinary(); 8 bytes big-endian, byte order = numeric order
 *
 * Values are range-checked on construction: 0 ≤ id ≤ 2^63 - 1. No further
 * structural check is possible, since every such value decodes to some
 * timestamp/machineId/sequence.
 */
export class SnowflakeValue {
  private readonly id: bigint

  /**
   * @throws {TypeError}  If id is not a bigint.
   * @throws {RangeError} If id is negative or has the sign bit set.
   */
  constructor(id: bigint) {
    if (typeof id !== "bigint") {
      throw new TypeError(
        `SnowflakeValue: constructor requires a bigint. Received: ${describeType(id)}`
      )
    }

    if (id < BigInt(0) || id > MAX_ID) {
      throw new RangeError(
        `SnowflakeValue: id must be between 0 and ${MAX_ID}. Received: ${id}`
      )
    }

    this.id = id
    Object.freeze(this)
  }

  toBigInt(): bigint {
    return this.id
  }

  /**
   * Decimal string, e.g. "1844674407370955161".
   */
  toString(): string {
    return this.id.toString()
  }

  /**
   * JSON.stringify() cannot serialize bigint; identifiers travel as
   * decimal strings.
   */
  toJSON(): string {
    return this.toString()
  }

  /**
   * Returns a new 8-byte big-endian Uint8Array on every call.
   */
  toBinary(): Uint8Array {
    return ByteUtils.fromUint64(this.id)
  }

  equals(other: SnowflakeValue): boolean {
    return SnowflakeValue.isSnowflakeValue(other) && other.id === this.id
  }

  /**
   * Numeric (and therefore chronological, for one generator) ordering.
   * Usable directly as an Array.prototype.sort comparator.
   */
  compare(other: SnowflakeValue): -1 | 0 | 1 {
    if (this.id < other.id) return -1
    if (this.id > other.id) return 1
    return 0
  }

  // ─── Static Factories ───────────────────────────────────────────────────

  static fromBigInt(id: bigint): SnowflakeValue {
    return new SnowflakeValue(id)
  }

  /**
   * Parses the decimal form. Surrounding whitespace is ignored.
   *
   * @throws {TypeError}  If input is not a string.
   * @throws {RangeError} If input is not a decimal integer within range.
   *
   * @example
   * ```ts
   * const id = SnowflakeValue.fromString(req.params.id)
   * ```
   */
  static fromString(input: string): SnowflakeValue {
    if (typeof input !== "string") {
      throw new TypeError(
        `SnowflakeValue.fromString: expected a string, received ${describeType(input)}.`
      )
    }

    const trimmed = input.trim()

    if (!DECIMAL_REGEX.test(trimmed)) {
      throw new RangeError(
        `SnowflakeValue.fromString: expected an unsigned decimal integer of at most 19 digits. ` +
        `Received: "${trimmed}"`
      )
    }

    return new SnowflakeValue(BigInt(trimmed))
  }

  /**
   * Reads an 8-byte big-endian binary (Uint8Array or Buffer).
   *
   * @throws {TypeError}  If binary is not a Uint8Array.
   * @throws {RangeError} If binary is not 8 bytes, or has the sign bit set.
   */
  static fromBinary(binary: Uint8Array): SnowflakeValue {
    if (!(binary instanceof Uint8Array)) {
      throw new TypeError(
        `SnowflakeValue.fromBinary: expected a Uint8Array or Buffer. Received: ${describeType(binary)}`
      )
    }

    if (binary.length !== UINT64_BYTES) {
      throw new RangeError(
        `SnowflakeValue.fromBinary: binary must be exactly ${UINT64_BYTES} bytes. ` +
        `Received ${binary.length} bytes.`
      )
    }

    return new SnowflakeValue(ByteUtils.toUint64(binary))
  }

  static isSnowflakeValue(value: unknown): value is SnowflakeValue {
    return value instanceof SnowflakeValue
  }
}
