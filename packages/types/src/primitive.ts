/** Unix timestamp in seconds */
export type Timestamp = number;
/** Seconds */
export type Duration = number;
/** Unsigned 256 bit token amount in base units */
export type Amount = bigint;
/** Position of a slash request in the slasher, assigned at request time */
export type SlashIndex = number;
