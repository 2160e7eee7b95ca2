export { Snowflake, type SnowflakeInitOptions } from "./core/Snowflake"
export { SnowflakeGenerator, type SnowflakeGeneratorConfig } from "./core/SnowflakeGenerator"
export { SnowflakeValue } from "./core/SnowflakeValue"
export { SnowflakeParser, type SnowflakeInput } from "./core/SnowflakeParser"
export {
  MachineIdResolver,
  type MachineIdEnv,
  type MachineIdResolution,
  type MachineIdSource,
} from "./core/MachineIdResolver"
export {
  SnowflakeError,
  InvalidConfigError,
  ClockRolledBackError,
  TimeRangeExceededError,
  isSnowflakeError,
  type SnowflakeErrorCode,
} from "./core/SnowflakeErrors"
export {
  MAX_MACHINE_ID,
  MAX_SEQUENCE,
  MAX_TIMESTAMP,
  MACHINE_ID_BITS,
  SEQUENCE_BITS,
  TIMESTAMP_BITS,
} from "./core/SnowflakeLayout"
export { SystemClock, ManualClock, systemClock, type Clock } from "./utils/Clock"
export { SnowflakePostgresAdapter } from "./adapters/postgres/SnowflakePostgresAdapter"
export { SnowflakeMongoAdapter } from "./adapters/mongo/SnowflakeMongoAdapter"
export type { EpochInput, SnowflakeFields, SnowflakeMetadata } from "./types"
