const MS_PER_DAY = 24 * 60 * 60 * 1000;

const isoDatePattern = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a strict `YYYY-MM-DD` string into a UTC midnight date.
 * Rolled-over dates such as `2023-02-30` are rejected.
 */
export const parseIsoDate = (value: string): Date | null => {
  const match = isoDatePattern.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day] = match.map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    return null;
  }

  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    return null;
  }

  return parsed;
};

/**
 * Converts a Date to ISO date string (YYYY-MM-DD format).
 */
export const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);

export const addDays = (value: Date, days: number): Date =>
  new Date(value.getTime() + days * MS_PER_DAY);
