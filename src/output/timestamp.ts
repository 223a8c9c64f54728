function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:mm:ss`.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Compact local time for file names, `YYYYMMDD_HHmmss`.
 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
