/**
 * Time helper functions
 */

/**
 * Format a duration as human-readable string
 * @param seconds - Duration in seconds
 * @returns e.g. "45s", "12m", "3h", "2d"
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return Math.round(seconds) + "s";
  } else if (seconds < 3600) {
    return Math.round(seconds / 60) + "m";
  } else if (seconds < 172800) {
    return Math.round(seconds / 3600) + "h";
  } else {
    return Math.round(seconds / 86400) + "d";
  }
}
