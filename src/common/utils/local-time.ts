const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses user-supplied window bounds as naive local time.
 *
 * `new Date('2024-06-01')` is UTC midnight while `new Date('2024-06-01T00:00')`
 * is local midnight; a date-only value is read on local fields here so both
 * mean the same instant. An impossible calendar day (2024-02-30) yields an
 * invalid Date instead of rolling over. Values with an explicit offset keep it.
 */
export function parseLocalDateTime(value: string): Date {
  const match = DATE_ONLY.exec(value.trim());
  if (!match) return new Date(value);

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return new Date(Number.NaN);
  }
  return date;
}
