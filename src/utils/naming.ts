/**
 * Run and artifact naming utilities
 */

function pad(n: number): string {
  return n.toString().padStart(2, "0");
}

/**
 * Local-time stamp in the form YYYYMMDD_HHMMSS
 */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function generateRunName(prefix: string, date: Date = new Date()): string {
  return `${prefix}_${formatRunTimestamp(date)}`;
}

/**
 * Make a value safe to use as a single file name component
 */
export function sanitizeFileComponent(value: string): string {
  return value.replace(/[^a-zA-Z0-9_.-]/g, "_");
}

/**
 * Map a directory path to a flat, collision-free staging name:
 * "/opt/a" -> "_opt_a".
 */
export function flattenPath(dirPath: string): string {
  return dirPath.replace(/\/+$/, "").replace(/\//g, "_");
}
