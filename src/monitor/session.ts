import { ConfigurationError } from '../errors.js';
import { formatHostKey } from '../utils/targets.js';
import type {
  HealthPredicate,
  HostMonitorState,
  HostUptime,
  MonitorSummary,
} from '../types/monitor.js';
import type { HostScanResult, Target } from '../types/scan.js';

/** Healthy when any TCP connect or the ping succeeded */
export const defaultHealthPredicate: HealthPredicate = (result) =>
  [...result.tcp.values()].some((tcp) => tcp.success) || result.icmp?.success === true;

export interface MonitorSessionOptions {
  /** Entries kept per host; 0 keeps everything */
  historyLimit?: number | undefined;
  isHealthy?: HealthPredicate | undefined;
  startedAt?: Date | undefined;
}

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

/** Per-host state across monitor iterations */
export class MonitorSession {
  private readonly hosts = new Map<string, HostMonitorState>();
  private readonly historyLimit: number;
  private readonly isHealthy: HealthPredicate;
  private readonly startedAt: Date;
  private iterationCount = 0;
  private successfulIterationCount = 0;

  constructor(targets: readonly Target[], options: MonitorSessionOptions = {}) {
    const historyLimit = options.historyLimit ?? 100;
    if (!Number.isInteger(historyLimit) || historyLimit < 0) {
      throw new ConfigurationError(`historyLimit must be a non-negative integer, got ${historyLimit}`);
    }

    this.historyLimit = historyLimit;
    this.isHealthy = options.isHealthy ?? defaultHealthPredicate;
    this.startedAt = options.startedAt ?? new Date();

    for (const target of targets) {
      const key = formatHostKey(target);
      this.hosts.set(key, {
        key,
        target: { host: target.host, ports: [...target.ports] },
        latest: null,
        history: [],
        successfulCount: 0,
        totalCount: 0,
      });
    }
  }

  get iterations(): number {
    return this.iterationCount;
  }

  get successfulIterations(): number {
    return this.successfulIterationCount;
  }

  get startTime(): Date {
    return this.startedAt;
  }

  keys(): string[] {
    return [...this.hosts.keys()];
  }

  get(key: string): HostMonitorState | undefined {
    return this.hosts.get(key);
  }

  states(): HostMonitorState[] {
    return [...this.hosts.values()];
  }

  /**
   * Records one iteration's results (in target order). Returns whether every
   * host was healthy.
   */
  record(results: readonly HostScanResult[], timestamp: number = Date.now()): boolean {
    this.iterationCount++;
    const iteration = this.iterationCount;
    let allHealthy = results.length > 0;

    for (const state of this.hosts.values()) {
      const result = results.find((candidate) => formatHostKey(candidate) === state.key);
      if (!result) continue;

      const healthy = this.isHealthy(result);
      if (!healthy) allHealthy = false;

      state.latest = result;
      state.totalCount++;
      if (healthy) state.successfulCount++;
      state.history.push({ iteration, timestamp, healthy, result });
      if (this.historyLimit > 0 && state.history.length > this.historyLimit) {
        state.history.splice(0, state.history.length - this.historyLimit);
      }
    }

    if (allHealthy) this.successfulIterationCount++;
    return allHealthy;
  }

  uptime(key: string): HostUptime | undefined {
    const state = this.hosts.get(key);
    if (!state) return undefined;
    return {
      key,
      successfulCount: state.successfulCount,
      totalCount: state.totalCount,
      uptimePercent: percent(state.successfulCount, state.totalCount),
    };
  }

  summary(stoppedAt: Date = new Date()): MonitorSummary {
    return {
      iterations: this.iterationCount,
      successfulIterations: this.successfulIterationCount,
      uptimePercent: percent(this.successfulIterationCount, this.iterationCount),
      startedAt: this.startedAt.toISOString(),
      stoppedAt: stoppedAt.toISOString(),
      hosts: this.states().map((state) => ({
        key: state.key,
        successfulCount: state.successfulCount,
        totalCount: state.totalCount,
        uptimePercent: percent(state.successfulCount, state.totalCount),
      })),
    };
  }
}
