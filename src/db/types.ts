// Typed aliases for frequently-used identifiers to make intent explicit.

/** Discord user snowflake. Kept as a string: it does not fit in a double. */
export type ChatId = string;
/** Remote quota-service user id. */
export type AccountId = number;
export type GuildId = string;
