import type { Logger } from 'winston';
import { ConfigurationError, errorMessage, type ProbeError } from '../errors.js';
import { DEFAULT_GRACE_MS, runGuarded } from '../probes/guard.js';
import { dnsFailure, httpFailure, icmpFailure, tcpFailure, tlsFailure } from '../probes/failures.js';
import { createProbeSet } from '../probes/probe-set.js';
import { ConcurrencyLimiter, mapWithLimiter } from '../utils/concurrency.js';
import { createSilentLogger } from '../utils/logger.js';
import { assertValidTargets } from '../utils/targets.js';
import { HostResultBuilder, degradedResult } from './host-result.js';
import { isTlsPort, isWebPort } from './port-profiles.js';
import type { ProbeContext } from '../types/probes.js';
import type { HostScanResult, ProbeSet, ScanOrchestratorOptions, ScanStatus, Target } from '../types/scan.js';

export const DEFAULT_TIMEOUT_SECONDS = 5;
export const DEFAULT_MAX_CONCURRENT = 50;

export interface ScanOrchestratorDeps {
  probes: ProbeSet;
  logger?: Logger | undefined;
  /** Slack past the probe timeout before a probe is abandoned */
  graceMs?: number | undefined;
}

/**
 * Runs every probe a target list calls for. Hosts are scanned through one
 * bounded pool and every probe call through another, so no more than
 * `maxConcurrent` probes are in flight at once. Results come back in target
 * order whatever order the probes finish in.
 */
export class ScanOrchestrator {
  private readonly probes: ProbeSet;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly graceMs: number;
  private readonly maxConcurrent: number;
  private readonly sslCheck: boolean;
  private readonly onHostComplete: ScanOrchestratorOptions['onHostComplete'];
  private state: ScanStatus = 'pending';
  private peak = 0;

  constructor(deps: ScanOrchestratorDeps, options: ScanOrchestratorOptions = {}) {
    const timeout = options.timeout ?? DEFAULT_TIMEOUT_SECONDS;
    const maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;

    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ConfigurationError(`Timeout must be a positive number of seconds, got ${timeout}`);
    }
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new ConfigurationError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }

    this.probes = deps.probes;
    this.logger = deps.logger ?? createSilentLogger('orchestrator');
    this.graceMs = deps.graceMs ?? DEFAULT_GRACE_MS;
    this.timeoutMs = timeout * 1000;
    this.maxConcurrent = maxConcurrent;
    this.sslCheck = options.sslCheck ?? false;
    this.onHostComplete = options.onHostComplete;
  }

  get status(): ScanStatus {
    return this.state;
  }

  /** Most probes seen in flight at once during the last run */
  get peakConcurrency(): number {
    return this.peak;
  }

  async run(targets: readonly Target[]): Promise<HostScanResult[]> {
    if (this.state === 'running') {
      throw new ConfigurationError('A scan is already running on this orchestrator');
    }
    assertValidTargets(targets);

    this.state = 'running';
    const probeLimiter = new ConcurrencyLimiter(this.maxConcurrent);
    const hostLimiter = new ConcurrencyLimiter(this.maxConcurrent);
    const total = targets.length;
    let completed = 0;

    this.logger.info(`Scanning ${total} target(s)`, {
      timeoutMs: this.timeoutMs,
      maxConcurrent: this.maxConcurrent,
      sslCheck: this.sslCheck,
    });

    const results = await mapWithLimiter(targets, hostLimiter, async (target) => {
      const startTime = Date.now();
      let result: HostScanResult;
      try {
        result = await this.scanHost(target, probeLimiter);
      } catch (error) {
        this.logger.error('Host scan failed', { host: target.host, error: errorMessage(error) });
        result = degradedResult(target, errorMessage(error), startTime);
      }

      completed++;
      this.notify(result, completed, total);
      return result;
    });

    this.peak = probeLimiter.peakCount;
    this.state = results.some((result) => result.error !== undefined) ? 'partial_failure' : 'completed';
    this.logger.info(`Scan ${this.state}`, { hosts: total, peakConcurrency: this.peak });
    return results;
  }

  private notify(result: HostScanResult, completed: number, total: number): void {
    if (!this.onHostComplete) return;
    try {
      this.onHostComplete(result, completed, total);
    } catch (error) {
      this.logger.warn('onHostComplete callback threw', { host: result.host, error: errorMessage(error) });
    }
  }

  private guarded<T>(
    limiter: ConcurrencyLimiter,
    probe: (ctx: ProbeContext) => Promise<T>,
    fail: (error: ProbeError, elapsedMs: number) => T
  ): Promise<T> {
    return limiter.run(() => runGuarded(probe, { timeoutMs: this.timeoutMs, graceMs: this.graceMs, fail }));
  }

  private portTasks(host: string, port: number, builder: HostResultBuilder, limiter: ConcurrencyLimiter): Promise<void>[] {
    const tasks = [
      this.guarded(
        limiter,
        (ctx) => this.probes.tcp(host, port, ctx),
        (error, ms) => tcpFailure(host, port, error, ms)
      ).then((result) => builder.setTcp(port, result)),
    ];

    if (isWebPort(port)) {
      tasks.push(
        this.guarded(
          limiter,
          (ctx) => this.probes.http(host, port, ctx),
          (error, ms) => httpFailure(host, port, error, ms)
        ).then((result) => builder.setHttp(port, result))
      );
    }

    if (this.sslCheck && isTlsPort(port)) {
      tasks.push(
        this.guarded(
          limiter,
          (ctx) => this.probes.tls(host, port, ctx),
          (error, ms) => tlsFailure(host, port, error, ms)
        ).then((result) => builder.setTls(port, result))
      );
    }

    return tasks;
  }

  private async scanHost(target: Target, limiter: ConcurrencyLimiter): Promise<HostScanResult> {
    const { host } = target;
    const builder = new HostResultBuilder(target);
    this.logger.debug('Scanning host', { host, ports: target.ports.length });

    // DNS and ICMP run once per host, alongside every port group
    const tasks: Promise<void>[] = [
      this.guarded(
        limiter,
        (ctx) => this.probes.dns(host, ctx),
        (error, ms) => dnsFailure(host, error, ms)
      ).then((result) => builder.setDns(result)),
      this.guarded(
        limiter,
        (ctx) => this.probes.icmp(host, ctx),
        (error, ms) => icmpFailure(host, error, ms)
      ).then((result) => builder.setIcmp(result)),
    ];

    for (const port of target.ports) {
      tasks.push(...this.portTasks(host, port, builder, limiter));
    }

    await Promise.all(tasks);
    const result = builder.finish();
    this.logger.debug('Host scan complete', { host, durationMs: result.durationMs });
    return result;
  }
}

export interface RunScanOptions extends ScanOrchestratorOptions {
  /** Probe set to use; one is created (and closed afterwards) when omitted */
  probes?: ProbeSet | undefined;
  logger?: Logger | undefined;
  graceMs?: number | undefined;
}

/** One-shot scan of `targets` */
export async function runScan(targets: readonly Target[], options: RunScanOptions = {}): Promise<HostScanResult[]> {
  const logger = options.logger ?? createSilentLogger('orchestrator');
  const ownsProbes = options.probes === undefined;
  const probes = options.probes ?? createProbeSet({ timeoutSeconds: options.timeout }, logger);

  try {
    const orchestrator = new ScanOrchestrator({ probes, logger, graceMs: options.graceMs }, options);
    return await orchestrator.run(targets);
  } finally {
    if (ownsProbes) probes.close?.();
  }
}
