/**
 * Timestamp utilities
 *
 * SOLID:
 * - SRP: timestamp formatting only
 */

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * ISO 8601 timestamp carrying the local timezone offset
 * (e.g. 2025-10-30T12:34:56.789+09:00).
 *
 * Follows the process TZ, so a container started with TZ=America/New_York
 * logs -04:00 / -05:00.
 */
export function getTimestampWithTimezone(now: Date = new Date()): string {
  const offset = -now.getTimezoneOffset();
  const offsetHours = Math.floor(Math.abs(offset) / 60);
  const offsetMinutes = Math.abs(offset) % 60;
  const offsetSign = offset >= 0 ? "+" : "-";

  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;

  return `${date}T${time}${offsetSign}${pad(offsetHours)}:${pad(offsetMinutes)}`;
}

/**
 * YYYY-MM-DD in local time
 */
export function getDateStringWithDash(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/**
 * HHmmss in local time, used for file name suffixes
 */
export function getTimeString(now: Date = new Date()): string {
  return `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
}
