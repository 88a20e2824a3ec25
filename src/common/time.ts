const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

/** Formats a date as `YYYY-MM-DD HH:MM:SS` in UTC, second precision. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function isTimestamp(value: string): boolean {
  return TIMESTAMP_PATTERN.test(value);
}
