const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse a duration string such as "15m", "90s", "1h30m" or "250ms" into
 * milliseconds. A bare number is taken as seconds.
 */
export function parseDuration(input: string): number {
  const text = input.trim();
  if (/^\d+(\.\d+)?$/.test(text)) return Math.round(Number(text) * 1_000);

  const pattern = /(\d+(?:\.\d+)?)(ms|h|m|s)/g;
  let total = 0;
  let consumed = 0;
  for (const match of text.matchAll(pattern)) {
    if (match.index !== consumed) break;
    const [whole, amount, unit] = match;
    total += Number(amount) * (UNIT_MS[unit ?? ''] ?? 0);
    consumed += whole.length;
  }
  if (consumed === 0 || consumed !== text.length) {
    throw new Error(`Invalid duration: "${input}" (expected e.g. 15m, 90s, 1h30m)`);
  }
  return Math.round(total);
}

/**
 * Format milliseconds as a compact duration, rounded to `unitMs`:
 * 45s, 3m0s, 1h2m3s.
 */
export function formatDuration(ms: number, unitMs = 1_000): string {
  const rounded = Math.max(0, Math.round(ms / unitMs) * unitMs);
  const totalSeconds = Math.floor(rounded / 1_000);
  const hours = Math.floor(totalSeconds / 3_600);
  const minutes = Math.floor((totalSeconds % 3_600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}
