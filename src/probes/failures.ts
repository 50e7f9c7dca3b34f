import { protocolForPort, buildProbeUrl } from './http-probe.js';
import type { ProbeError } from '../errors.js';
import type { TlsFailure } from '../types/certificate.js';
import type { DnsFailure, HttpFailure, IcmpFailure, TcpFailure } from '../types/probes.js';

// Failure records for probes the guard had to cut off or catch

export function dnsFailure(hostname: string, error: ProbeError, elapsedMs: number): DnsFailure {
  const family = { success: false as const, error: error.message, errorKind: error.kind, addresses: [], count: 0 };
  return {
    hostname,
    success: false,
    error: error.message,
    errorKind: error.kind,
    responseTimeMs: elapsedMs,
    ipv4: family,
    ipv6: { ...family },
  };
}

export function tcpFailure(host: string, port: number, error: ProbeError, elapsedMs: number): TcpFailure {
  const status = error.kind === 'connection_timeout' ? 'timeout' : error.kind === 'connection_refused' ? 'refused' : 'error';
  return { success: false, host, port, status, error: error.message, errorKind: error.kind, responseTimeMs: elapsedMs };
}

export function httpFailure(host: string, port: number, error: ProbeError, elapsedMs: number): HttpFailure {
  return {
    success: false,
    host,
    port,
    url: buildProbeUrl(host, port),
    protocol: protocolForPort(port),
    responseTimeMs: elapsedMs,
    error: error.message,
    errorKind: error.kind,
  };
}

export function tlsFailure(host: string, port: number, error: ProbeError, elapsedMs: number): TlsFailure {
  return { success: false, host, port, responseTimeMs: elapsedMs, error: error.message, errorKind: error.kind };
}

export function icmpFailure(host: string, error: ProbeError, elapsedMs: number): IcmpFailure {
  return { success: false, host, method: 'none', responseTimeMs: elapsedMs, error: error.message, errorKind: error.kind };
}
