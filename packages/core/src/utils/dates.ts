/**
 * Capture dates are calendar dates in `YYYY-MM-DD` form
 */

const CAPTURE_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isCaptureDate(value: string): boolean {
  const match = CAPTURE_DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Capture date of a timestamp, in UTC
 */
export function toCaptureDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
