export const SECONDS_PER_MINUTE = 60;
export const SECONDS_PER_HOUR = 60 * SECONDS_PER_MINUTE;
export const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;

/** 10**18, base units per token */
export const WEI_PER_TOKEN = BigInt(10) ** BigInt(18);
