/**
 * Human-readable duration, e.g. "45 seconds", "2.5 minutes", "1.2 hours"
 */
export function formatDuration(seconds: number): string {
  const safeSeconds = Math.max(0, seconds);
  const minutes = safeSeconds / 60;

  if (minutes < 1) {
    return `${Math.round(safeSeconds)} seconds`;
  }
  if (minutes < 60) {
    return `${minutes.toFixed(1)} minutes`;
  }
  return `${(minutes / 60).toFixed(1)} hours`;
}

/**
 * Local date-time as "YYYY-MM-DD HH:MM:SS"
 */
export function formatLocalDateTime(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${formatLocalDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Local date as "YYYY-MM-DD"
 */
export function formatLocalDate(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
