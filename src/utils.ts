/** Plain decimal, optionally signed, with an optional exponent: "12", "-0.5", ".99", "1E3". */
export function isDecimal(value: string): boolean {
  return /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(value);
}

export function isInteger(value: string): boolean {
  return /^[+-]?\d+$/.test(value);
}

/** Unsigned whole number of at least 1, as given on the command line. */
export function parsePositiveCount(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const n = Number(value);
  return Number.isSafeInteger(n) && n >= 1 ? n : undefined;
}

/**
 * Parse "yyyy-MM-dd HH:mm" as a local time. Returns undefined for anything
 * else, including out-of-range fields such as month 13 or Feb 30.
 */
export function parseLocalDateTime(value: string): Date | undefined {
  const m = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/.exec(value);
  if (!m) return undefined;
  const [year, month, day, hour, minute] = m.slice(1).map((s) => parseInt(s, 10));
  if (year === undefined || month === undefined || day === undefined || hour === undefined || minute === undefined) {
    return undefined;
  }
  const d = new Date(year, month - 1, day, hour, minute);
  if (
    d.getFullYear() !== year ||
    d.getMonth() !== month - 1 ||
    d.getDate() !== day ||
    d.getHours() !== hour ||
    d.getMinutes() !== minute
  ) {
    return undefined;
  }
  return d;
}
