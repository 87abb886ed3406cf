/**
 * Format duration in human-readable format
 */
export function formatDuration(milliseconds: number): string {
  if (milliseconds < 1000) {
    return `${milliseconds}ms`;
  }

  const seconds = milliseconds / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = seconds / 60;
  return `${minutes.toFixed(1)}m`;
}

/**
 * Format percentage with appropriate precision
 */
export function formatPercentage(value: number, total: number): string {
  if (total === 0) return '0%';
  const percentage = (value / total) * 100;
  return `${percentage.toFixed(1)}%`;
}

/**
 * Truncate string to specified length with ellipsis
 */
export function truncateString(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  if (maxLength <= 3) return str.substring(0, maxLength);
  return str.substring(0, maxLength - 3) + '...';
}

/**
 * Local wall-clock timestamp: `yyyy-MM-dd HH:mm:ss` for display, `yyyy-MM-dd_HH-mm-ss` for file names
 */
export function formatLocalTimestamp(date: Date, style: 'display' | 'file'): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()].map(pad);

  return style === 'display' ? `${day} ${time.join(':')}` : `${day}_${time.join('-')}`;
}
