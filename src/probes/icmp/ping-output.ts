// Round-trip time formats seen across ping implementations, most specific first
const RTT_PATTERNS: readonly RegExp[] = [
  /time[<=](\d+\.?\d*)\s*ms/i,
  /Zeit[<=](\d+\.?\d*)\s*ms/i,
  /time[<=](\d+\.?\d*)/i,
  /(\d+\.?\d*)\s*ms/i,
];

/** Round-trip time in ms from `ping` output, or null if none is found */
export function parsePingRtt(output: string): number | null {
  for (const pattern of RTT_PATTERNS) {
    const match = pattern.exec(output);
    if (!match?.[1]) continue;
    const value = parseFloat(match[1]);
    if (Number.isFinite(value)) return value;
  }
  return null;
}
