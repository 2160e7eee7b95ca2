/** Width of a packed identifier in bytes. */
export const UINT64_BYTES = 8

/**
 * Byte conversions for 64-bit identifiers. Big-endian throughout, so byte
 * order matches numeric order.
 */
export class ByteUtils {
  /**
   * Writes an unsigned 64-bit value into a fresh 8-byte array.
   *
   * @throws {RangeError} If value is negative or wider than 64 bits.
   */
  static fromUint64(value: bigint): Uint8Array {
    if (value < BigInt(0) || value > BigInt.asUintN(64, BigInt(-1))) {
      throw new RangeError(
        `ByteUtils: value must fit in an unsigned 64-bit integer. Received: ${value}`
      )
    }

    const out = new Uint8Array(UINT64_BYTES)
    new DataView(out.buffer).setBigUint64(0, value)
    return out
  }

  /**
   * Reads an unsigned 64-bit big-endian value.
   *
   * Respects byteOffset, so subarray views and pooled Buffers read only
   * their own 8 bytes.
   *
   * @throws {TypeError}  If bytes is not a Uint8Array (or Buffer).
   * @throws {RangeError} If bytes is not exactly 8 bytes long.
   */
  static toUint64(bytes: Uint8Array): bigint {
    ByteUtils.assertUint8Array(bytes, "bytes")

    if (bytes.length !== UINT64_BYTES) {
      throw new RangeError(
        `ByteUtils: expected exactly ${UINT64_BYTES} bytes. Received ${bytes.length} bytes.`
      )
    }

    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigUint64(0)
  }

  private static assertUint8Array(value: unknown, paramName: string): void {
    if (!(value instanceof Uint8Array)) {
      throw new TypeError(
        `ByteUtils: "${paramName}" must be a Uint8Array or Buffer. ` +
        `Received: ${describeType(value)}`
      )
    }
  }
}

/**
 * Short type description for error messages ("null", "undefined" or typeof).
 */
export function describeType(value: unknown): string {
  return value === null ? "null" : value === undefined ? "undefined" : typeof value
}
