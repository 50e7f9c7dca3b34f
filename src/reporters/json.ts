import { isHostReachable, toPortable } from '../scanner/host-result.js';
import { formatHostKey } from '../utils/targets.js';
import type { PortableHostResult, PortableMultiHostReport } from '../schemas/result.js';
import type { HostScanResult } from '../types/scan.js';

/**
 * Keys results by host. A host scanned more than once is keyed by its
 * "host:ports" form instead, with a "#n" suffix on exact repeats.
 */
function keyedResults(results: readonly HostScanResult[]): Record<string, PortableHostResult> {
  const counts = new Map<string, number>();
  for (const result of results) {
    counts.set(result.host, (counts.get(result.host) ?? 0) + 1);
  }

  const keyed: Record<string, PortableHostResult> = {};
  for (const result of results) {
    const base = (counts.get(result.host) ?? 0) > 1 ? formatHostKey(result) : result.host;
    let key = base;
    for (let n = 2; key in keyed; n++) key = `${base}#${n}`;
    keyed[key] = toPortable(result);
  }
  return keyed;
}

export function buildMultiHostReport(
  results: readonly HostScanResult[],
  totalDurationMs: number,
  now: Date = new Date()
): PortableMultiHostReport {
  return {
    scan_timestamp: now.toISOString(),
    total_hosts: results.length,
    successful_hosts: results.filter(isHostReachable).length,
    total_duration_ms: totalDurationMs,
    results: keyedResults(results),
  };
}

/** A single host prints as its portable form; several get the wrapper */
export function renderJson(results: readonly HostScanResult[], totalDurationMs: number, now: Date = new Date()): string {
  const [only] = results;
  const document = results.length === 1 && only ? toPortable(only) : buildMultiHostReport(results, totalDurationMs, now);
  return JSON.stringify(document, null, 2);
}
