export function formatResponseTime(ms: number): string {
  if (ms < 1) return `${ms.toFixed(2)} ms`;
  if (ms < 1000) return `${ms.toFixed(1)} ms`;
  return `${(ms / 1000).toFixed(1)} s`;
}

export function truncate(text: string, maxLength = 100, suffix = '...'): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - suffix.length) + suffix;
}

/** Elapsed milliseconds since a `performance.now()` reading */
export function elapsedSince(start: number): number {
  return Math.max(0, performance.now() - start);
}
