/**
 * Shared text helpers for CLI output.
 */

/**
 * Maximum text length for display (truncated with ellipsis)
 */
export const MAX_TEXT_LENGTH = 80;

/**
 * Collapse newlines and truncate for a single display line.
 */
export function truncateText(text: string, maxLength: number = MAX_TEXT_LENGTH): string {
  const singleLine = text.replace(/\n/g, " ").trim();
  if (singleLine.length <= maxLength) {
    return singleLine;
  }
  return singleLine.substring(0, maxLength - 3) + "...";
}

/**
 * Date part of an ISO timestamp.
 */
export function isoDate(timestamp: string | null): string {
  return timestamp ? timestamp.slice(0, 10) : "-";
}
