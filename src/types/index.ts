/**
 * The three packed fields of an identifier.
 */
export interface SnowflakeFields {
  /** Milliseconds since the generator's epoch (41 bits). */
  timestamp: number

  /** Generator node identifier (10 bits, 0–1023). */
  machineId: number

  /** Per-millisecond sequence counter (12 bits, 0–4095). */
  sequence: number
}

/**
 * Decoded metadata of an identifier, resolved against an epoch.
 */
export interface SnowflakeMetadata extends SnowflakeFields {
  /**
   * Absolute creation time in Unix milliseconds (epoch + timestamp).
   */
  unixMs: number

  date: Date

  /**
   * ISO-8601 form of unixMs.
   */
  iso: string
}

/**
 * An epoch, given either as a Date or as Unix milliseconds.
 */
export type EpochInput = Date | number
