const SNOWFLAKE_PATTERN = /^\d{17,20}$/;
const DISCORD_EPOCH_MS = 1420070400000n;

export const normalizeSnowflake = (value: unknown): string | null => {
  if (value == null) return null;
  const str = String(value).trim();
  if (!SNOWFLAKE_PATTERN.test(str)) return null;
  return str;
};

/** Creation instant encoded in a snowflake, or null if the value is not one. */
export const snowflakeCreatedAt = (value: unknown): Date | null => {
  const id = normalizeSnowflake(value);
  if (!id) return null;
  const ms = (BigInt(id) >> 22n) + DISCORD_EPOCH_MS;
  return new Date(Number(ms));
};
