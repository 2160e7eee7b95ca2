import { ManualClock } from "../utils/Clock"
import { SnowflakeGenerator } from "./SnowflakeGenerator"
import { SnowflakeParser } from "./SnowflakeParser"
import { SnowflakeValue } from "./SnowflakeValue"

const EPOCH = Date.parse("2024-01-01T00:00:00.000Z")
const ID = BigInt("4194304028672") // timestamp 1_000_000, machineId 7, sequence 0

describe("SnowflakeParser", () => {
  describe("parse", () => {
    test("decodes fields and resolves absolute time against the epoch", () => {
      const meta = SnowflakeParser.parse(ID, EPOCH)
      expect(meta.timestamp).toBe(1_000_000)
      expect(meta.machineId).toBe(7)
      expect(meta.sequence).toBe(0)
      expect(meta.unixMs).toBe(EPOCH + 1_000_000)
      expect(meta.iso).toBe("2024-01-01T00:16:40.000Z")
      expect(meta.date.getTime()).toBe(EPOCH + 1_000_000)
      expect(Object.isFrozen(meta)).toBe(true)
    })

    test("accepts every input representation", () => {
      const value = new SnowflakeValue(ID)
      for (const input of [ID, "4194304028672", value, value.toBinary()]) {
        expect(SnowflakeParser.parse(input, new Date(EPOCH)).machineId).toBe(7)
      }
    })

    test("decodes the documented example", () => {
      const meta = SnowflakeParser.parse("7130316800172039", new Date("2024-01-01T00:00:00Z"))
      expect(meta.machineId).toBe(42)
      expect(meta.sequence).toBe(7)
      expect(meta.iso).toBe("2024-01-20T16:13:20.000Z")
    })

    test("round-trips what the generator issued", () => {
      const clock = new ManualClock(EPOCH + 123_456)
      const generator = new SnowflakeGenerator({ epoch: EPOCH, machineId: 513, clock })
      generator.next()
      const meta = SnowflakeParser.parse(generator.next(), EPOCH)
      expect(meta).toMatchObject({ timestamp: 123_456, machineId: 513, sequence: 1, unixMs: EPOCH + 123_456 })
    })

    test("rejects an invalid epoch", () => {
      expect(() => SnowflakeParser.parse(ID, new Date(Number.NaN))).toThrow(RangeError)
      expect(() => SnowflakeParser.parse(ID, -5)).toThrow(RangeError)
    })

    test("rejects instants beyond the range of Date", () => {
      const lastValidEpoch = 8_640_000_000_000_000
      expect(SnowflakeParser.parse(BigInt(0), lastValidEpoch).unixMs).toBe(lastValidEpoch)
      expect(() => SnowflakeParser.parse(ID, lastValidEpoch)).toThrow(
        "SnowflakeParser: timestamp 1000000 past epoch 8640000000000000 lies beyond the range of Date."
      )
    })

    test("rejects unsupported and malformed input", () => {
      expect(() => SnowflakeParser.parse(12 as unknown as bigint, EPOCH)).toThrow(TypeError)
      expect(() => SnowflakeParser.parse("abc", EPOCH)).toThrow(RangeError)
      expect(() => SnowflakeParser.parse(new Uint8Array(3), EPOCH)).toThrow(RangeError)
    })
  })

  test("field helpers decode without an epoch", () => {
    expect(SnowflakeParser.fields(ID)).toEqual({ timestamp: 1_000_000, machineId: 7, sequence: 0 })
    expect(SnowflakeParser.timestampOf("4194304028672")).toBe(1_000_000)
    expect(SnowflakeParser.machineIdOf(ID)).toBe(7)
    expect(SnowflakeParser.sequenceOf(ID + BigInt(3))).toBe(3)
  })

  describe("compose", () => {
    test("packs fields into the 64-bit layout", () => {
      expect(SnowflakeParser.compose({ timestamp: 1_000_000, machineId: 7, sequence: 0 }).toBigInt()).toBe(ID)
      expect(SnowflakeParser.compose({ timestamp: 2 ** 41 - 1, machineId: 1023, sequence: 4095 }).toString()).toBe(
        "9223372036854775807"
      )
    })

    test("rejects fields outside their bit widths", () => {
      expect(() => SnowflakeParser.compose({ timestamp: 2 ** 41, machineId: 0, sequence: 0 })).toThrow(RangeError)
      expect(() => SnowflakeParser.compose({ timestamp: -1, machineId: 0, sequence: 0 })).toThrow(RangeError)
      expect(() => SnowflakeParser.compose({ timestamp: 0, machineId: 1024, sequence: 0 })).toThrow(RangeError)
      expect(() => SnowflakeParser.compose({ timestamp: 0, machineId: 0, sequence: 4096 })).toThrow(RangeError)
      expect(() => SnowflakeParser.compose({ timestamp: 0, machineId: 0, sequence: 0.5 })).toThrow(RangeError)
    })
  })

  describe("lowerBoundFor", () => {
    test("returns the smallest id at the given instant", () => {
      const bound = SnowflakeParser.lowerBoundFor(new Date(EPOCH + 1000), EPOCH)
      expect(bound.toBigInt()).toBe(BigInt(4194304000))
      expect(bound.toBigInt() <= ID).toBe(true)
    })

    test("clamps instants before the epoch to zero", () => {
      expect(SnowflakeParser.lowerBoundFor(new Date(EPOCH - 1000), EPOCH).toBigInt()).toBe(BigInt(0))
    })

    test("rejects invalid dates", () => {
      expect(() => SnowflakeParser.lowerBoundFor(new Date("nope"), EPOCH)).toThrow(RangeError)
    })
  })
})
