import { SnowflakeValue } from "../../core/SnowflakeValue"
import { SnowflakePostgresAdapter } from "./SnowflakePostgresAdapter"

const EPOCH = Date.parse("2024-01-01T00:00:00.000Z")
const ID = BigInt("4194304028672")

describe("SnowflakePostgresAdapter", () => {
  test("toDatabase produces decimal BIGINT parameters", () => {
    expect(SnowflakePostgresAdapter.toDatabase(new SnowflakeValue(ID))).toBe("4194304028672")
    expect(SnowflakePostgresAdapter.toDatabase(ID)).toBe("4194304028672")
  })

  test("toDatabase rejects out-of-range and unsupported input", () => {
    expect(() => SnowflakePostgresAdapter.toDatabase(BigInt(-1))).toThrow(RangeError)
    expect(() => SnowflakePostgresAdapter.toDatabase("1" as unknown as bigint)).toThrow(TypeError)
  })

  describe("fromDatabase", () => {
    test("reads the string node-postgres returns for int8", () => {
      expect(SnowflakePostgresAdapter.fromDatabase("4194304028672").toBigInt()).toBe(ID)
      expect(SnowflakePostgresAdapter.fromDatabase("9223372036854775807").toString()).toBe("9223372036854775807")
    })

    test("reads bigint values", () => {
      expect(SnowflakePostgresAdapter.fromDatabase(ID).toBigInt()).toBe(ID)
    })

    test("reads numbers only while they are exact", () => {
      expect(SnowflakePostgresAdapter.fromDatabase(4194304028672).toBigInt()).toBe(ID)
      expect(() => SnowflakePostgresAdapter.fromDatabase(2 ** 60)).toThrow(RangeError)
      expect(() => SnowflakePostgresAdapter.fromDatabase(1.5)).toThrow(RangeError)
    })

    test("rejects negative and unsupported values", () => {
      expect(() => SnowflakePostgresAdapter.fromDatabase("-1")).toThrow(RangeError)
      expect(() => SnowflakePostgresAdapter.fromDatabase(null as unknown as string)).toThrow(TypeError)
    })
  })

  test("fromString validates text input before it reaches a query", () => {
    expect(SnowflakePostgresAdapter.fromString(" 4194304028672 ")).toBe("4194304028672")
    expect(() => SnowflakePostgresAdapter.fromString("1; DROP TABLE users")).toThrow(RangeError)
  })

  describe("timeRange", () => {
    test("returns inclusive lower and exclusive upper bounds", () => {
      const range = SnowflakePostgresAdapter.timeRange(new Date(EPOCH + 1000), new Date(EPOCH + 2000), EPOCH)
      expect(range).toEqual(["4194304000", "8388608000"])
    })

    test("clamps a start before the epoch to zero", () => {
      const range = SnowflakePostgresAdapter.timeRange(new Date(EPOCH - 1000), new Date(EPOCH + 1000), EPOCH)
      expect(range).toEqual(["0", "4194304000"])
    })

    test("rejects reversed ranges", () => {
      expect(() =>
        SnowflakePostgresAdapter.timeRange(new Date(EPOCH + 2000), new Date(EPOCH + 1000), EPOCH)
      ).toThrow(RangeError)
    })
  })
})
