/**
 * Date formatting utilities
 * Portal dates use DD/MM/YYYY HH:MM:SS in local time; report rows use a fixed UTC offset
 */

/**
 * Calendar parts of a timestamp as shown in report rows
 */
export interface CalendarParts {
  /** Two-digit day (01-31) */
  day: string;
  /** Two-digit month (01-12) */
  month: string;
  year: number;
  /** HH:MM:SS */
  time: string;
}

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * Formats the local calendar day of a date as DD/MM/YYYY
 *
 * @param date - Date to format
 * @returns Day string in portal format
 */
export function formatPortalDay(date: Date): string {
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()}`;
}

/**
 * Builds the whole-day range the status endpoint filters by
 *
 * @param date - Any instant of the day to cover
 * @returns Start and end timestamps, e.g. "05/03/2025 00:00:00" / "05/03/2025 23:59:59"
 */
export function portalDayRange(date: Date): { start: string; end: string } {
  const day = formatPortalDay(date);
  return {
    start: `${day} 00:00:00`,
    end: `${day} 23:59:59`,
  };
}

/**
 * Converts an instant to calendar parts at a fixed UTC offset
 *
 * The instant itself is unchanged; only its wall-clock reading moves.
 *
 * @param date - Instant to convert
 * @param offsetHours - Offset from UTC in hours (e.g., -5)
 */
export function toFixedOffsetParts(date: Date, offsetHours: number): CalendarParts {
  const shifted = new Date(date.getTime() + offsetHours * 60 * 60 * 1000);

  return {
    day: pad(shifted.getUTCDate()),
    month: pad(shifted.getUTCMonth() + 1),
    year: shifted.getUTCFullYear(),
    time: `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}`,
  };
}

/**
 * Formats the timestamp part of an upload code: YYYYMMDDHHmmssSSS in local time
 *
 * @param date - Instant to encode
 * @returns 17-digit timestamp string
 */
export function formatUploadTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    pad(date.getMilliseconds(), 3)
  );
}

/**
 * Creates a generator of strictly increasing upload codes
 *
 * Each code is the 17-digit timestamp followed by a sequence digit.
 * Two codes requested within the same millisecond (or after the clock
 * moves backwards) continue from the previous code instead of repeating it.
 *
 * @param now - Clock (defaults to the system clock)
 * @returns Function returning the next 18-digit code
 */
export function createUploadCodeGenerator(now: () => Date = () => new Date()): () => string {
  let last: bigint | null = null;

  return () => {
    let next = BigInt(`${formatUploadTimestamp(now())}0`);
    if (last !== null && next <= last) {
      next = last + 1n;
    }
    last = next;
    return next.toString();
  };
}

/**
 * Process-wide upload code generator
 * Every pipeline draws from it so concurrent uploads never share a code
 */
export const nextUploadCode = createUploadCodeGenerator();
