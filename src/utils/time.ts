/**
 * Date helpers for run timestamps and dated resources (local time)
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Calendar date as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  return `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Run timestamp embedded in file names: YYYY-MM-DD_HHMMSS.
 * Lexical order of these strings equals chronological order.
 */
export function formatRunTimestamp(date: Date): string {
  return `${formatDate(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function previousDay(date: Date): string {
  const copy = new Date(date.getTime());
  copy.setDate(copy.getDate() - 1);
  return formatDate(copy);
}

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a real calendar date in YYYY-MM-DD form
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const [, year, month, day] = match.map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    return false;
  }

  const date = new Date(year, month - 1, day);
  return (
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day
  );
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
