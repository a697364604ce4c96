/**
 * Snowflake helpers. Discord IDs encode their creation time in the top 42 bits.
 */

export const DISCORD_EPOCH = 1420070400000

/** Extract a Unix timestamp (ms) from a Discord snowflake ID */
export function snowflakeToTimestamp(id: string): number {
  return Number(BigInt(id) >> 22n) + DISCORD_EPOCH
}

/** Smallest snowflake that could have been created at `timestamp` */
export function timestampToSnowflake(timestamp: number): string {
  return (BigInt(Math.max(0, timestamp - DISCORD_EPOCH)) << 22n).toString()
}

/** Numeric ordering for snowflakes (string comparison breaks across lengths) */
export function compareSnowflakes(a: string, b: string): number {
  const x = BigInt(a)
  const y = BigInt(b)
  return x < y ? -1 : x > y ? 1 : 0
}
