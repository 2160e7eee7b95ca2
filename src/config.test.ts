import { Config, DEFAULT_EPOCH_ISO, envEpoch, envStr } from "./config"

describe("config", () => {
  const saved = { ...process.env }

  afterEach(() => {
    process.env = { ...saved }
  })

  describe("envStr", () => {
    test("returns the variable, the default, or throws", () => {
      process.env.SNOWGEN_TEST_STR = "hello"
      expect(envStr("SNOWGEN_TEST_STR")).toBe("hello")
      delete process.env.SNOWGEN_TEST_STR
      expect(envStr("SNOWGEN_TEST_STR", "fallback")).toBe("fallback")
      expect(() => envStr("SNOWGEN_TEST_STR")).toThrow("Env var SNOWGEN_TEST_STR not set")
    })

    test("can treat empty values as unset", () => {
      process.env.SNOWGEN_TEST_STR = ""
      expect(envStr("SNOWGEN_TEST_STR", "fallback")).toBe("")
      expect(envStr("SNOWGEN_TEST_STR", "fallback", true)).toBe("fallback")
    })
  })

  describe("envEpoch", () => {
    test("accepts Unix milliseconds", () => {
      process.env.SNOWGEN_TEST_EPOCH = "1704067200000"
      expect(envEpoch("SNOWGEN_TEST_EPOCH")).toBe(1704067200000)
    })

    test("accepts ISO-8601 instants", () => {
      process.env.SNOWGEN_TEST_EPOCH = " 2024-01-01T00:00:00Z "
      expect(envEpoch("SNOWGEN_TEST_EPOCH")).toBe(1704067200000)
    })

    test("falls back to the default when unset or blank", () => {
      delete process.env.SNOWGEN_TEST_EPOCH
      expect(envEpoch("SNOWGEN_TEST_EPOCH", 5)).toBe(5)
      process.env.SNOWGEN_TEST_EPOCH = "  "
      expect(envEpoch("SNOWGEN_TEST_EPOCH", 5)).toBe(5)
      expect(() => envEpoch("SNOWGEN_TEST_EPOCH")).toThrow("Env var SNOWGEN_TEST_EPOCH not set")
    })

    test("rejects values that are not instants", () => {
      process.env.SNOWGEN_TEST_EPOCH = "last tuesday"
      expect(() => envEpoch("SNOWGEN_TEST_EPOCH", 5)).toThrow(
        "Env var SNOWGEN_TEST_EPOCH is not a valid instant: last tuesday"
      )
    })
  })

  test("Config falls back to the info level when LOG_LEVEL is empty", () => {
    process.env.LOG_LEVEL = ""
    jest.isolateModules(() => {
      const fresh: typeof import("./config") = require("./config")
      expect(fresh.Config.LOG_LEVEL).toBe("info")
    })
  })

  test("Config defaults the epoch to 2024-01-01", () => {
    if (saved.SNOWFLAKE_EPOCH === undefined) {
      expect(Config.SNOWFLAKE_EPOCH).toBe(Date.parse(DEFAULT_EPOCH_ISO))
    }
    expect(Number.isSafeInteger(Config.SNOWFLAKE_EPOCH)).toBe(true)
  })
})
