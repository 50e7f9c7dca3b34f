import { readFile } from 'fs/promises';
import { InvalidArgumentError } from 'commander';
import { ConfigurationError, errorMessage } from '../errors.js';
import { isOutputFormat, type OutputFormat } from '../reporters/index.js';
import { getCommonPorts } from '../scanner/port-profiles.js';
import { buildTargets, parseHostList, parsePorts, uniqueTargets } from '../utils/targets.js';
import type { ProbeConfigInput, TargetConfig } from '../schemas/config.js';
import type { Target } from '../types/scan.js';

export interface CliOptions {
  hostsFile?: string | undefined;
  port?: string | undefined;
  commonPorts?: boolean | undefined;
  sslCheck?: boolean | undefined;
  timeout?: number | undefined;
  maxConcurrent?: number | undefined;
  format?: string | undefined;
  json?: boolean | undefined;
  output?: string | undefined;
  config?: string | undefined;
  monitor?: boolean | undefined;
  interval?: number | undefined;
  serve?: number | undefined;
  verbose?: boolean | undefined;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parsePositiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseListenPort(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new InvalidArgumentError('Expected a port between 0 and 65535.');
  }
  return parsed;
}

/** Rejects option combinations that cannot both apply */
export function checkConflicts(options: CliOptions): void {
  if (options.port && options.commonPorts) {
    throw new ConfigurationError('Use either --port or --common-ports, not both');
  }
  if (options.json && options.format && options.format !== 'json') {
    throw new ConfigurationError(`--json conflicts with --format ${options.format}`);
  }
  if (options.serve !== undefined && !options.monitor) {
    throw new ConfigurationError('--serve requires --monitor');
  }
}

export function resolveFormat(options: CliOptions): OutputFormat {
  if (options.json) return 'json';
  const format = options.format ?? 'table';
  if (!isOutputFormat(format)) {
    throw new ConfigurationError(`Unknown output format: ${format}`);
  }
  return format;
}

export function resolvePorts(options: CliOptions): number[] {
  if (options.commonPorts) return getCommonPorts();
  return options.port ? parsePorts(options.port) : [];
}

/** Settings given on the command line, for the config loader */
export function configOverrides(options: CliOptions): Partial<ProbeConfigInput> {
  return {
    timeoutSeconds: options.timeout,
    maxConcurrent: options.maxConcurrent,
    sslCheck: options.sslCheck ? true : undefined,
    monitorIntervalSeconds: options.interval,
    logLevel: options.verbose ? 'debug' : undefined,
  };
}

export async function collectHosts(hostsArg: string | undefined, options: CliOptions): Promise<string[]> {
  const hosts = hostsArg ? parseHostList(hostsArg) : [];

  if (options.hostsFile) {
    let text: string;
    try {
      text = await readFile(options.hostsFile, 'utf8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read hosts file ${options.hostsFile}: ${errorMessage(error)}`);
    }
    hosts.push(...parseHostList(text));
  }

  return hosts;
}

/**
 * Targets from the command line followed by those in the config file. A
 * config target without its own ports takes the command-line port list.
 */
export function resolveTargets(hosts: readonly string[], ports: readonly number[], fileTargets: readonly TargetConfig[]): Target[] {
  const targets = hosts.length > 0 ? buildTargets(hosts, ports) : [];
  const fromFile = fileTargets.length > 0
    ? fileTargets.map((target) => {
        const [built] = buildTargets([target.host], target.ports.length > 0 ? target.ports : ports);
        if (!built) throw new ConfigurationError(`Invalid target in config file: ${target.host}`);
        return built;
      })
    : [];

  const all = uniqueTargets([...targets, ...fromFile]);
  if (all.length === 0) {
    throw new ConfigurationError('No hosts given. Pass hosts, --hosts-file, or a config file with targets');
  }
  return all;
}
