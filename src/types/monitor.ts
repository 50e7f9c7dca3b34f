import type { HostScanResult, Target } from './scan.js';

// Continuous monitoring types

export type HealthPredicate = (result: HostScanResult) => boolean;

export interface HostHistoryEntry {
  iteration: number;
  /** Epoch milliseconds */
  timestamp: number;
  healthy: boolean;
  result: HostScanResult;
}

export interface HostMonitorState {
  key: string;
  target: Target;
  latest: HostScanResult | null;
  history: HostHistoryEntry[];
  successfulCount: number;
  totalCount: number;
}

export interface HostUptime {
  key: string;
  successfulCount: number;
  totalCount: number;
  uptimePercent: number;
}

export interface MonitorSummary {
  iterations: number;
  successfulIterations: number;
  uptimePercent: number;
  startedAt: string;
  stoppedAt: string;
  hosts: HostUptime[];
}

export interface MonitorIteration {
  iteration: number;
  healthy: boolean;
  durationMs: number;
  results: HostScanResult[];
}

export interface ContinuousMonitorOptions {
  /** Seconds between iterations */
  interval?: number | undefined;
  historyLimit?: number | undefined;
  isHealthy?: HealthPredicate | undefined;
  signal?: AbortSignal | undefined;
  onIteration?: ((iteration: MonitorIteration) => void) | undefined;
  onSummary?: ((summary: MonitorSummary) => void) | undefined;
}
