import { SnowflakeParser } from "../../core/SnowflakeParser"
import { SnowflakeValue } from "../../core/SnowflakeValue"
import type { EpochInput } from "../../types"
import { describeType } from "../../utils/ByteUtils"

// ─────────────────────────────────────────────────────────────────────────────
// SnowflakePostgresAdapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * PostgreSQL adapter: converts between SnowflakeValue and the values
 * node-postgres exchanges for BIGINT (int8) columns.
 *
 * Identifiers keep the sign bit clear, so every one fits a signed BIGINT and
 * numeric order in the column is creation order for one generator.
 *
 * Schema:
 *   ```sql
 *   CREATE TABLE users (
 *     id    BIGINT PRIMARY KEY,
 *     email TEXT NOT NULL
 *   );
 *   ```
 *
 * node-postgres returns int8 as a string by default (a JavaScript number
 * cannot hold every 64-bit value) and accepts strings and bigints as
 * parameters. Parameters are produced as decimal strings, which every driver
 * and pooler passes through unchanged.
 */
export class SnowflakePostgresAdapter {

  // ─── toDatabase ───────────────────────────────────────────────────────────

  /**
   * Converts an identifier to a BIGINT query parameter.
   *
   * @example
   * ```ts
   * await db.query(
   *   "INSERT INTO users (id, email) VALUES ($1, $2)",
   *   [SnowflakePostgresAdapter.toDatabase(snowflake.generate()), "user@example.com"]
   * )
   * ```
   */
  static toDatabase(input: SnowflakeValue | bigint): string {
    if (input instanceof SnowflakeValue) {
      return input.toString()
    }

    if (typeof input === "bigint") {
      return new SnowflakeValue(input).toString()
    }

    throw new TypeError(
      `SnowflakePostgresAdapter.toDatabase: input must be a SnowflakeValue or bigint. ` +
      `Received: ${describeType(input)}`
    )
  }

  // ─── fromDatabase ─────────────────────────────────────────────────────────

  /**
   * Converts a BIGINT column value back to a SnowflakeValue.
   *
   * Accepts the string node-postgres returns by default, a bigint (when a
   * type parser for int8 returns BigInt), or a number when it is a safe
   * integer. Larger numbers have already lost precision and are rejected.
   *
   * @throws {TypeError}  Unsupported type.
   * @throws {RangeError} Negative, non-integer or imprecise value.
   */
  static fromDatabase(value: string | bigint | number): SnowflakeValue {
    if (typeof value === "string") {
      return SnowflakeValue.fromString(value)
    }

    if (typeof value === "bigint") {
      return new SnowflakeValue(value)
    }

    if (typeof value === "number") {
      if (!Number.isSafeInteger(value)) {
        throw new RangeError(
          `SnowflakePostgresAdapter.fromDatabase: number ${value} is not a safe integer. ` +
          `Configure the driver to return BIGINT as string or bigint.`
        )
      }
      return new SnowflakeValue(BigInt(value))
    }

    throw new TypeError(
      `SnowflakePostgresAdapter.fromDatabase: expected string, bigint or number. ` +
      `Received: ${describeType(value)}`
    )
  }

  // ─── fromString ───────────────────────────────────────────────────────────

  /**
   * Validates an identifier received as text (URL param, request body) and
   * returns it as a query parameter. Malformed input fails here, before it
   * reaches the database.
   */
  static fromString(input: string): string {
    return SnowflakePostgresAdapter.toDatabase(SnowflakeValue.fromString(input))
  }

  // ─── Time range helper ────────────────────────────────────────────────────

  /**
   * Parameters for a half-open creation-time range [from, to) over an ID
   * column:
   *
   * ```ts
   * const [lower, upper] = SnowflakePostgresAdapter.timeRange(from, to, snowflake.getEpoch())
   * await db.query("SELECT * FROM users WHERE id >= $1 AND id < $2", [lower, upper])
   * ```
   *
   * @throws {RangeError} `to` earlier than `from`, or either outside the epoch's range.
   */
  static timeRange(from: Date, to: Date, epoch: EpochInput): [string, string] {
    const lower = SnowflakeParser.lowerBoundFor(from, epoch)
    const upper = SnowflakeParser.lowerBoundFor(to, epoch)

    if (upper.compare(lower) < 0) {
      throw new RangeError(
        `SnowflakePostgresAdapter.timeRange: "to" (${to.toISOString()}) is earlier than ` +
        `"from" (${from.toISOString()}).`
      )
    }

    return [lower.toString(), upper.toString()]
  }
}
