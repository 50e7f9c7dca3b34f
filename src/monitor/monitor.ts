import type { Logger } from 'winston';
import { ConfigurationError, errorMessage } from '../errors.js';
import { abortableDelay } from '../utils/delay.js';
import { elapsedSince } from '../utils/format.js';
import { createSilentLogger } from '../utils/logger.js';
import { assertValidTargets, uniqueTargets } from '../utils/targets.js';
import { MonitorSession } from './session.js';
import type { ContinuousMonitorOptions, MonitorIteration, MonitorSummary } from '../types/monitor.js';
import type { HostScanResult, Target } from '../types/scan.js';

/** Anything that can scan a target list; ScanOrchestrator is the usual one */
export interface TargetScanner {
  run(targets: readonly Target[]): Promise<HostScanResult[]>;
}

export const DEFAULT_MONITOR_INTERVAL_SECONDS = 30;

export class ContinuousMonitor {
  readonly session: MonitorSession;
  private readonly scanner: TargetScanner;
  private readonly targets: readonly Target[];
  private readonly options: ContinuousMonitorOptions;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly controller = new AbortController();
  private running = false;

  constructor(
    scanner: TargetScanner,
    targets: readonly Target[],
    options: ContinuousMonitorOptions = {},
    logger: Logger = createSilentLogger('monitor')
  ) {
    assertValidTargets(targets);
    const interval = options.interval ?? DEFAULT_MONITOR_INTERVAL_SECONDS;
    if (!Number.isFinite(interval) || interval <= 0) {
      throw new ConfigurationError(`Monitor interval must be a positive number of seconds, got ${interval}`);
    }

    this.scanner = scanner;
    this.targets = uniqueTargets(targets);
    this.options = options;
    this.logger = logger;
    this.intervalMs = interval * 1000;
    this.session = new MonitorSession(this.targets, {
      historyLimit: options.historyLimit,
      isHealthy: options.isHealthy,
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Interrupts the sleep between iterations; a scan in progress finishes first */
  stop(): void {
    this.controller.abort();
  }

  /**
   * Scans, records and sleeps until stopped. Resolves with the session
   * summary once the loop ends.
   */
  async start(): Promise<MonitorSummary> {
    if (this.running) {
      throw new ConfigurationError('Monitor is already running');
    }
    this.running = true;

    const external = this.options.signal;
    const onExternalAbort = (): void => this.stop();
    if (external?.aborted) this.stop();
    external?.addEventListener('abort', onExternalAbort, { once: true });

    const signal = this.controller.signal;
    this.logger.info(`Monitoring ${this.targets.length} target(s) every ${this.intervalMs / 1000}s`);

    try {
      while (!signal.aborted) {
        await this.iterate();
        if (signal.aborted) break;
        await abortableDelay(this.intervalMs, signal);
      }
    } finally {
      external?.removeEventListener('abort', onExternalAbort);
      this.running = false;
    }

    const summary = this.session.summary();
    this.logger.info('Monitoring stopped', {
      iterations: summary.iterations,
      successfulIterations: summary.successfulIterations,
      uptimePercent: Number(summary.uptimePercent.toFixed(1)),
    });
    this.options.onSummary?.(summary);
    return summary;
  }

  private async iterate(): Promise<void> {
    const start = performance.now();

    let results: HostScanResult[];
    try {
      results = await this.scanner.run(this.targets);
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      this.logger.error('Monitor scan failed', { error: errorMessage(error) });
      results = [];
    }

    const healthy = this.session.record(results);
    const iteration: MonitorIteration = {
      iteration: this.session.iterations,
      healthy,
      durationMs: elapsedSince(start),
      results,
    };

    this.logger.info(`Iteration ${iteration.iteration}: ${healthy ? 'healthy' : 'unhealthy'}`, {
      durationMs: Math.round(iteration.durationMs),
    });
    this.notify(iteration);
  }

  private notify(iteration: MonitorIteration): void {
    if (!this.options.onIteration) return;
    try {
      this.options.onIteration(iteration);
    } catch (error) {
      this.logger.warn('onIteration callback threw', { iteration: iteration.iteration, error: errorMessage(error) });
    }
  }
}
