import net from 'net';
import { ConfigurationError, PortSpecError } from '../errors.js';
import type { Target } from '../types/scan.js';

export const MAX_PORTS_PER_HOST = 1000;
const MAX_RANGE_SPAN = 1000;

const HOSTNAME_LABEL = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?$/;
const DECIMAL = /^\d+$/;

export function isValidIp(value: string): boolean {
  return net.isIP(value) !== 0;
}

export function isValidHostname(hostname: string): boolean {
  if (!hostname || hostname.length > 253) return false;
  if (isValidIp(hostname)) return true;

  const trimmed = hostname.endsWith('.') ? hostname.slice(0, -1) : hostname;
  return trimmed.split('.').every((label) => label.length > 0 && label.length <= 63 && HOSTNAME_LABEL.test(label));
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function parsePortNumber(text: string, part: string): number {
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) {
    throw new PortSpecError('invalid_format', `Invalid port number: ${part}`);
  }
  return parseInt(trimmed, 10);
}

/**
 * Parses "80", "80-90", "80,443" or any mix of them into a sorted,
 * de-duplicated port list.
 */
export function parsePorts(spec: string): number[] {
  if (!spec) return [];

  const ports = new Set<number>();

  for (const rawPart of spec.split(',')) {
    const part = rawPart.trim();
    if (!part) continue;

    const dash = part.indexOf('-');
    if (dash === -1) {
      const port = parsePortNumber(part, part);
      if (!isValidPort(port)) {
        throw new PortSpecError('invalid_port', `Invalid port: ${port}`);
      }
      ports.add(port);
      continue;
    }

    const start = parsePortNumber(part.slice(0, dash), part);
    const end = parsePortNumber(part.slice(dash + 1), part);

    if (start > end) {
      throw new PortSpecError('range_order', `Invalid port range: ${part} (start > end)`);
    }
    if (end - start + 1 > MAX_RANGE_SPAN) {
      throw new PortSpecError('range_too_large', `Port range too large: ${part} (max ${MAX_RANGE_SPAN} ports)`);
    }
    for (let port = start; port <= end; port++) {
      if (!isValidPort(port)) {
        throw new PortSpecError('invalid_port', `Invalid port in range: ${port}`);
      }
      ports.add(port);
    }
  }

  if (ports.size > MAX_PORTS_PER_HOST) {
    throw new PortSpecError('range_too_large', `Too many ports: ${ports.size} (max ${MAX_PORTS_PER_HOST})`);
  }
  return [...ports].sort((a, b) => a - b);
}

/** Splits "host:port", "[v6]:port" or a bare host */
export function parseHostPort(value: string): { host: string; port: number | null } {
  if (value.startsWith('[')) {
    const bracketEnd = value.indexOf(']');
    if (bracketEnd === -1) {
      throw new ConfigurationError('Invalid IPv6 format: missing closing bracket');
    }
    const host = value.slice(1, bracketEnd);
    const remainder = value.slice(bracketEnd + 1);
    if (remainder === '') return { host, port: null };
    if (!remainder.startsWith(':') || !DECIMAL.test(remainder.slice(1))) {
      throw new ConfigurationError(`Invalid format after IPv6 address: ${value}`);
    }
    return { host, port: parseInt(remainder.slice(1), 10) };
  }

  // A bare IPv6 literal has several colons and no port
  if (isValidIp(value)) return { host: value, port: null };

  const colon = value.lastIndexOf(':');
  if (colon === -1) return { host: value, port: null };

  const portText = value.slice(colon + 1);
  if (!DECIMAL.test(portText)) return { host: value, port: null };
  return { host: value.slice(0, colon), port: parseInt(portText, 10) };
}

/** Strips scheme prefixes, paths and queries from user input */
export function sanitizeHostname(input: string): string {
  let host = input.trim();
  const scheme = /^(https?|ftps?):\/\//i.exec(host);
  if (scheme) host = host.slice(scheme[0].length);
  return host.split('/')[0]?.split('?')[0] ?? '';
}

/** Comma separated host list, or host file lines with `#` comments */
export function parseHostList(text: string): string[] {
  return text
    .split(/[\n,]/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map(sanitizeHostname);
}

/**
 * Builds validated targets. Each entry may carry its own ":port" suffix,
 * which is added to the shared port list.
 */
export function buildTargets(hosts: readonly string[], ports: readonly number[]): Target[] {
  if (hosts.length === 0) {
    throw new ConfigurationError('At least one host is required');
  }

  const targets = hosts.map((entry): Target => {
    const { host, port } = parseHostPort(entry);
    if (!isValidHostname(host)) {
      throw new ConfigurationError(`Invalid hostname or IP address: ${host}`);
    }
    const targetPorts = port !== null && !ports.includes(port) ? [...ports, port] : [...ports];
    return { host, ports: targetPorts };
  });
  return uniqueTargets(targets);
}

/** Drops targets that repeat an earlier host and port list */
export function uniqueTargets(targets: readonly Target[]): Target[] {
  const seen = new Set<string>();
  return targets.filter((target) => {
    const key = formatHostKey(target);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Checks the orchestrator's input preconditions */
export function assertValidTargets(targets: readonly Target[]): void {
  if (!Array.isArray(targets) || targets.length === 0) {
    throw new ConfigurationError('Target list must contain at least one target');
  }

  for (const target of targets) {
    if (typeof target.host !== 'string' || target.host.trim().length === 0) {
      throw new ConfigurationError('Every target needs a non-empty host');
    }
    if (target.ports.length > MAX_PORTS_PER_HOST) {
      throw new ConfigurationError(`Too many ports for ${target.host}: ${target.ports.length} (max ${MAX_PORTS_PER_HOST})`);
    }
    const seen = new Set<number>();
    for (const port of target.ports) {
      if (!isValidPort(port)) {
        throw new ConfigurationError(`Invalid port for ${target.host}: ${port}`);
      }
      if (seen.has(port)) {
        throw new ConfigurationError(`Duplicate port for ${target.host}: ${port}`);
      }
      seen.add(port);
    }
  }
}

/** Monitor session key: "host", "host:port" or "host:p1,p2" */
export function formatHostKey(target: { host: string; ports: readonly number[] }): string {
  if (target.ports.length === 0) return target.host;
  const host = net.isIP(target.host) === 6 ? `[${target.host}]` : target.host;
  return `${host}:${target.ports.join(',')}`;
}
