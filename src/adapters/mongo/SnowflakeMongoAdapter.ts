import { Long } from "bson"
import { SnowflakeValue } from "../../core/SnowflakeValue"
import { describeType } from "../../utils/ByteUtils"

/**
 * MongoDB adapter: stores identifiers as BSON 64-bit integers (Long).
 *
 * int64 fields sort numerically in MongoDB indexes, so `_id` order is
 * creation order for one generator, and range queries on `_id` work
 * without a separate createdAt field.
 *
 * ```ts
 * await users.insertOne({ _id: SnowflakeMongoAdapter.toDatabase(snowflake.generate()), email })
 * const doc = await users.findOne({ _id: SnowflakeMongoAdapter.fromString(req.params.id) })
 * const id = SnowflakeMongoAdapter.fromDatabase(doc._id)
 * ```
 */
export class SnowflakeMongoAdapter {

  // ─── toDatabase ───────────────────────────────────────────────────────────

  static toDatabase(input: SnowflakeValue | bigint): Long {
    if (input instanceof SnowflakeValue) {
      return Long.fromBigInt(input.toBigInt())
    }

    if (typeof input === "bigint") {
      return Long.fromBigInt(new SnowflakeValue(input).toBigInt())
    }

    throw new TypeError(
      `SnowflakeMongoAdapter.toDatabase: input must be a SnowflakeValue or bigint. ` +
      `Received: ${describeType(input)}`
    )
  }

  // ─── fromDatabase ─────────────────────────────────────────────────────────

  /**
   * Converts a stored int64 back to a SnowflakeValue.
   *
   * The driver hands int64 fields back in one of three shapes: a Long when
   * `promoteLongs` is off or the value exceeds 53 bits, a plain number when
   * it fits (the default), or a bigint under `useBigInt64`.
   *
   * @throws {TypeError}  Unsupported type.
   * @throws {RangeError} Negative, non-integer or imprecise value.
   */
  static fromDatabase(value: Long | bigint | number): SnowflakeValue {
    if (Long.isLong(value)) {
      return new SnowflakeValue(value.toBigInt())
    }

    if (typeof value === "bigint") {
      return new SnowflakeValue(value)
    }

    if (typeof value === "number") {
      if (!Number.isSafeInteger(value)) {
        throw new RangeError(
          `SnowflakeMongoAdapter.fromDatabase: number ${value} is not a safe integer. ` +
          `Read the field with promoteLongs: false or useBigInt64: true.`
        )
      }
      return new SnowflakeValue(BigInt(value))
    }

    throw new TypeError(
      `SnowflakeMongoAdapter.fromDatabase: expected a Long, bigint or number. ` +
      `Received: ${describeType(value)}. ` +
      `Ensure the field was stored using SnowflakeMongoAdapter.toDatabase().`
    )
  }

  // ─── fromString ───────────────────────────────────────────────────────────

  static fromString(input: string): Long {
    return SnowflakeMongoAdapter.toDatabase(SnowflakeValue.fromString(input))
  }
}
