const DURATION_PATTERN = /^(\d+)([smhd])$/;

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
};

export function isDuration(value: string): boolean {
  return DURATION_PATTERN.test(value);
}

/**
 * Parse a duration such as "15m" or "7d" into seconds.
 */
export function parseDuration(value: string): number {
  const match = value.match(DURATION_PATTERN);
  if (!match) {
    throw new RangeError(`Invalid duration: ${value}`);
  }
  return parseInt(match[1], 10) * UNIT_SECONDS[match[2]];
}
