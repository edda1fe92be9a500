/** Human-readable duration: 500ms, 5s, 1m 30s, 1h 5m */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;

  const totalSec = Math.round(ms / 1000);
  if (totalSec < 60) return `${totalSec}s`;

  const hours = Math.floor(totalSec / 3600);
  const minutes = Math.floor((totalSec % 3600) / 60);
  const seconds = totalSec % 60;

  if (hours > 0) {
    return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  }
  return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
}

/** Keep the last `max` characters of a captured output stream */
export function tail(text: string, max = 4000): string {
  if (text.length <= max) return text;
  return `…${text.slice(text.length - max)}`;
}
