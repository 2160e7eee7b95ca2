import type { EpochInput, SnowflakeFields } from "../types"

/*
 * Bit layout, most-significant bit first:
 *
 *   ┌──────┬────────────────┬────────────┬──────────┐
 *   │ sign │   timestamp    │ machineId  │ sequence │
 *   │ 1 b  │     41 b       │    10 b    │   12 b   │
 *   └──────┴────────────────┴────────────┴──────────┘
 */

export const TIMESTAMP_BITS = 41
export const MACHINE_ID_BITS = 10
export const SEQUENCE_BITS = 12

/** 2^41 - 1 ms, roughly 69.7 years past the epoch. */
export const MAX_TIMESTAMP = 2 ** TIMESTAMP_BITS - 1

export const MAX_MACHINE_ID = 2 ** MACHINE_ID_BITS - 1 // 1023

export const MAX_SEQUENCE = 2 ** SEQUENCE_BITS - 1 // 4095

/** Largest packable identifier: 2^63 - 1, the sign bit clear. */
export const MAX_ID = BigInt.asUintN(63, BigInt(-1))

const MACHINE_ID_SHIFT = BigInt(SEQUENCE_BITS)
const TIMESTAMP_SHIFT = BigInt(SEQUENCE_BITS + MACHINE_ID_BITS)
const MACHINE_ID_MASK = BigInt(MAX_MACHINE_ID)
const SEQUENCE_MASK = BigInt(MAX_SEQUENCE)

/**
 * Packs already-validated fields. Callers outside the generator go through
 * SnowflakeParser.compose(), which range-checks first.
 */
export function pack(timestamp: number, machineId: number, sequence: number): bigint {
  return (
    (BigInt(timestamp) << TIMESTAMP_SHIFT) |
    (BigInt(machineId) << MACHINE_ID_SHIFT) |
    BigInt(sequence)
  )
}

export function unpack(id: bigint): SnowflakeFields {
  return {
    timestamp: Number(id >> TIMESTAMP_SHIFT),
    machineId: Number((id >> MACHINE_ID_SHIFT) & MACHINE_ID_MASK),
    sequence: Number(id & SEQUENCE_MASK),
  }
}

export function isValidMachineId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_MACHINE_ID
}

/**
 * Converts an epoch to Unix milliseconds, or undefined when it is not a
 * usable instant (invalid Date, non-integer, negative).
 */
export function epochToMs(epoch: EpochInput): number | undefined {
  const ms = epoch instanceof Date ? epoch.getTime() : epoch
  if (typeof ms !== "number" || !Number.isSafeInteger(ms) || ms < 0) {
    return undefined
  }
  return ms
}
