#!/usr/bin/env node
import { realpathSync } from 'fs';
import { writeFile } from 'fs/promises';
import { pathToFileURL } from 'url';
import chalk from 'chalk';
import { Command } from 'commander';
import type { Logger } from 'winston';
import { StatusServer } from '../api/server.js';
import { loadConfig } from '../config/index.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { ContinuousMonitor } from '../monitor/monitor.js';
import { createProbeSet } from '../probes/probe-set.js';
import { renderReport, type OutputFormat } from '../reporters/index.js';
import { ScanOrchestrator } from '../scanner/orchestrator.js';
import { elapsedSince } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';
import {
  checkConflicts,
  collectHosts,
  configOverrides,
  parseListenPort,
  parsePositiveInteger,
  parsePositiveNumber,
  resolveFormat,
  resolvePorts,
  resolveTargets,
  type CliOptions,
} from './options.js';
import type { ProbeConfig } from '../schemas/config.js';
import type { HostScanResult, Target } from '../types/scan.js';

interface RunContext {
  config: ProbeConfig;
  targets: Target[];
  format: OutputFormat;
  output: string | undefined;
  logger: Logger;
}

async function emit(report: string, output: string | undefined, logger: Logger): Promise<void> {
  if (output) {
    await writeFile(output, report, 'utf8');
    logger.info(`Report written to ${output}`);
    return;
  }
  process.stdout.write(report.endsWith('\n') ? report : `${report}\n`);
}

function render(ctx: RunContext, results: readonly HostScanResult[], durationMs: number): string {
  return renderReport(ctx.format, results, durationMs, { colors: !ctx.output && process.stdout.isTTY === true });
}

async function runOnce(ctx: RunContext, orchestrator: ScanOrchestrator): Promise<void> {
  const start = performance.now();
  const results = await orchestrator.run(ctx.targets);
  await emit(render(ctx, results, elapsedSince(start)), ctx.output, ctx.logger);
}

async function runMonitor(ctx: RunContext, orchestrator: ScanOrchestrator, servePort: number | undefined): Promise<void> {
  let reports: Promise<void> = Promise.resolve();
  const monitor = new ContinuousMonitor(
    orchestrator,
    ctx.targets,
    {
      interval: ctx.config.monitorIntervalSeconds,
      historyLimit: ctx.config.historyLimit,
      onIteration: (iteration) => {
        reports = reports
          .then(() => emit(render(ctx, iteration.results, iteration.durationMs), ctx.output, ctx.logger))
          .catch((error: unknown) => {
            ctx.logger.error('Failed to write monitor report', { error: errorMessage(error) });
          });
      },
    },
    ctx.logger
  );

  const server = servePort !== undefined
    ? new StatusServer({ session: monitor.session, port: servePort, logger: ctx.logger })
    : null;
  if (server) await server.start();

  const onSignal = (): void => {
    ctx.logger.info('Stopping monitor...');
    monitor.stop();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const summary = await monitor.start();
    await reports;
    process.stderr.write(
      `${chalk.bold('Monitoring summary:')} ${summary.successfulIterations}/${summary.iterations} healthy iterations ` +
        `(${summary.uptimePercent.toFixed(1)}% uptime)\n`
    );
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
    await server?.stop();
  }
}

async function run(hostsArg: string | undefined, options: CliOptions): Promise<void> {
  checkConflicts(options);
  const format = resolveFormat(options);
  const ports = resolvePorts(options);

  const { config, targets: fileTargets } = await loadConfig({
    configFile: options.config,
    overrides: configOverrides(options),
  });
  const logger = createLogger({ name: 'netprobe', level: config.logLevel, logFile: config.logFile });

  const hosts = await collectHosts(hostsArg, options);
  const targets = resolveTargets(hosts, ports, fileTargets);
  const ctx: RunContext = { config, targets, format, output: options.output, logger };

  const probes = createProbeSet({ timeoutSeconds: config.timeoutSeconds }, logger);
  const orchestrator = new ScanOrchestrator(
    { probes, logger },
    {
      timeout: config.timeoutSeconds,
      maxConcurrent: config.maxConcurrent,
      sslCheck: config.sslCheck,
      onHostComplete: (result, completed, total) => {
        logger.debug(`Completed ${result.host} (${completed}/${total})`);
      },
    }
  );

  try {
    if (options.monitor) {
      await runMonitor(ctx, orchestrator, options.serve);
    } else {
      await runOnce(ctx, orchestrator);
    }
  } finally {
    probes.close();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('netprobe')
    .version('0.3.0')
    .description('Concurrent DNS, TCP, HTTP(S), TLS certificate and ICMP reachability checks')
    .argument('[hosts]', 'Comma-separated hosts, each optionally with :port')
    .option('--hosts-file <file>', 'Read hosts from a file (one per line, # comments)')
    .option('-p, --port <spec>', 'Ports to check: 80, 80-90, 80,443 or a mix')
    .option('--common-ports', 'Check the built-in list of common ports')
    .option('--ssl-check', 'Analyse TLS certificates on TLS ports')
    .option('-t, --timeout <seconds>', 'Per-probe timeout in seconds', parsePositiveNumber)
    .option('--max-concurrent <n>', 'Maximum probes in flight', parsePositiveInteger)
    .option('-f, --format <format>', 'Output format: table, json, csv or prometheus')
    .option('--json', 'Shorthand for --format json')
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('-c, --config <file>', 'JSON config file')
    .option('--monitor', 'Repeat the scan until interrupted')
    .option('--interval <seconds>', 'Seconds between monitor iterations', parsePositiveNumber)
    .option('--serve <port>', 'Serve the monitor dashboard and status API on this port', parseListenPort)
    .option('-v, --verbose', 'Debug logging')
    .action(async (hosts: string | undefined, options: CliOptions) => {
      await run(hosts, options);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  try {
    await buildProgram().parseAsync(argv);
    return 0;
  } catch (error) {
    const label = error instanceof ConfigurationError ? 'Error' : 'Unexpected error';
    process.stderr.write(`${chalk.red(`${label}:`)} ${errorMessage(error)}\n`);
    return 1;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    // Entry path no longer exists
    return false;
  }
}

if (isMainModule()) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
