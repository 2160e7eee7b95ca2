import * as crypto from "crypto"
import { InvalidConfigError } from "./SnowflakeErrors"
import { MAX_MACHINE_ID, isValidMachineId } from "./SnowflakeLayout"

export type MachineIdSource =
  | "explicit_number"
  | "explicit_string"
  | "env_machine_id"
  | "pod_ip"
  | "hostname"
  | "random"

export interface MachineIdResolution {
  /** Resolved 10-bit value written into every identifier. */
  machineId: number
  /** Where the value came from, for startup diagnostics. */
  source: MachineIdSource
  /** Set when source is "random"; the caller should log it prominently. */
  warning?: string
}

/**
 * Environment read by the resolver. Defaults to process.env.
 */
export type MachineIdEnv = Record<string, string | undefined>

/**
 * Resolves the 10-bit machineId (0–1023), in priority order:
 *
 *   1. Explicit numeric config     : used as-is, range-checked
 *   2. Explicit string config      : hashed to 10 bits, deterministic
 *   3. SNOWFLAKE_MACHINE_ID env    : integer 0–1023
 *   4. POD_IP env                  : unique per pod in Kubernetes (Downward API)
 *   5. HOSTNAME env                : unique per container in Docker / ECS
 *   6. Random                      : warns; safe only for single-instance use
 *
 * Hashing into 1024 slots collides quickly: two names share a machineId
 * with probability 1/1024 per pair. Past a handful of nodes, assign numeric
 * IDs from configuration or a coordination service.
 */
export class MachineIdResolver {
  /**
   * @throws {InvalidConfigError} Explicit or SNOWFLAKE_MACHINE_ID value out of
   *                              range, or an empty explicit string.
   */
  static resolve(
    explicitMachineId?: number | string,
    env: MachineIdEnv = process.env
  ): MachineIdResolution {
    if (typeof explicitMachineId === "number") {
      if (!isValidMachineId(explicitMachineId)) {
        throw new InvalidConfigError(
          `Snowflake: explicit machineId must be an integer between 0 and ${MAX_MACHINE_ID}. ` +
          `Received: ${explicitMachineId}`,
          "machineId"
        )
      }
      return { machineId: explicitMachineId, source: "explicit_number" }
    }

    if (typeof explicitMachineId === "string") {
      const trimmed = explicitMachineId.trim()
      if (trimmed.length === 0) {
        throw new InvalidConfigError(
          `Snowflake: machineId string must not be empty. ` +
          `Provide a non-empty string or a numeric value 0–${MAX_MACHINE_ID}.`,
          "machineId"
        )
      }
      return { machineId: MachineIdResolver.hashToMachineId(trimmed), source: "explicit_string" }
    }

    const configured = env.SNOWFLAKE_MACHINE_ID?.trim()
    if (configured) {
      const machineId = Number(configured)
      if (!isValidMachineId(machineId)) {
        throw new InvalidConfigError(
          `Snowflake: SNOWFLAKE_MACHINE_ID must be an integer between 0 and ${MAX_MACHINE_ID}. ` +
          `Received: "${configured}"`,
          "machineId"
        )
      }
      return { machineId, source: "env_machine_id" }
    }

    const podIp = env.POD_IP?.trim()
    if (podIp) {
      return { machineId: MachineIdResolver.hashToMachineId(podIp), source: "pod_ip" }
    }

    const hostname = env.HOSTNAME?.trim()
    if (hostname) {
      return { machineId: MachineIdResolver.hashToMachineId(hostname), source: "hostname" }
    }

    const machineId = crypto.randomInt(0, MAX_MACHINE_ID + 1)
    return {
      machineId,
      source: "random",
      warning:
        `machineId randomly assigned (machineId=${machineId}). ` +
        `Safe for single-instance use only; concurrent instances risk ID collision. ` +
        `Set SNOWFLAKE_MACHINE_ID or pass machineId explicitly.`,
    }
  }

  /**
   * Maps a string to a stable machineId: the first two SHA-256 bytes,
   * big-endian, masked to 10 bits.
   */
  static hashToMachineId(input: string): number {
    const hash = crypto.createHash("sha256").update(input, "utf8").digest()
    return ((hash[0] << 8) | hash[1]) & MAX_MACHINE_ID
  }
}
