/**
 * HH:MM in local time, 24-hour clock.
 */
export function formatTime(date: Date): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}

/**
 * Tool names read better with spaces: `trigger_identity_refresh` becomes
 * `trigger identity refresh`.
 */
export function formatAction(action: string): string {
  return action.replace(/_/g, ' ');
}
