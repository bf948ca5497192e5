/**
 * Filename helpers for stored uploads
 */

const UNSAFE_CHARACTERS = /[^A-Za-z0-9_.-]/g;

/**
 * Reduce arbitrary text to a filename segment made of ASCII letters, digits,
 * `_`, `.` and `-`. Whitespace runs become a single underscore and path
 * separators are treated as whitespace, so the result never names a directory.
 * Returns an empty string when nothing usable remains.
 */
export function secureFilename(value: string): string {
  const ascii = value
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .replace(/[/\\]/g, ' ');

  return ascii
    .split(/\s+/)
    .filter(part => part.length > 0)
    .join('_')
    .replace(UNSAFE_CHARACTERS, '')
    .replace(/^[._]+|[._]+$/g, '');
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a local-time timestamp as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const datePart = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const timePart = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${datePart}_${timePart}`;
}

/**
 * A stored file name must be a single path segment
 */
export function isPlainFilename(name: string): boolean {
  return name.length > 0
    && name !== '.'
    && name !== '..'
    && !name.includes('/')
    && !name.includes('\\')
    && !name.includes('\0');
}
