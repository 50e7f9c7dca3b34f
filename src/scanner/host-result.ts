import { PortableHostResultSchema, type PortableHostResult } from '../schemas/result.js';
import type {
  PortableDns,
  PortableFamily,
  PortableHttp,
  PortableIcmp,
  PortableSsl,
  PortableTcp,
} from '../schemas/result.js';
import type { TlsResult } from '../types/certificate.js';
import type { DnsResult, FamilyResult, HttpResult, IcmpResult, ProbeErrorKind, TcpResult } from '../types/probes.js';
import type { HostScanResult, SinglePortView, Target } from '../types/scan.js';

/**
 * Collects probe results for one host while its scan runs. `finish` freezes
 * them into a HostScanResult whose port maps follow the requested order.
 */
export class HostResultBuilder {
  readonly host: string;
  readonly ports: readonly number[];
  readonly startTime: number;
  private dns: DnsResult | undefined;
  private icmp: IcmpResult | undefined;
  private readonly tcp = new Map<number, TcpResult>();
  private readonly http = new Map<number, HttpResult>();
  private readonly tls = new Map<number, TlsResult>();

  constructor(target: Target, startTime: number = Date.now()) {
    this.host = target.host;
    this.ports = [...target.ports];
    this.startTime = startTime;
  }

  setDns(result: DnsResult): void {
    this.dns = result;
  }

  setIcmp(result: IcmpResult): void {
    this.icmp = result;
  }

  setTcp(port: number, result: TcpResult): void {
    this.tcp.set(port, result);
  }

  setHttp(port: number, result: HttpResult): void {
    this.http.set(port, result);
  }

  setTls(port: number, result: TlsResult): void {
    this.tls.set(port, result);
  }

  finish(endTime: number = Date.now()): HostScanResult {
    return Object.freeze({
      host: this.host,
      ports: Object.freeze([...this.ports]),
      ...(this.dns ? { dns: this.dns } : {}),
      ...(this.icmp ? { icmp: this.icmp } : {}),
      tcp: this.ordered(this.tcp),
      http: this.ordered(this.http),
      tls: this.ordered(this.tls),
      startTime: this.startTime,
      endTime,
      durationMs: Math.max(0, endTime - this.startTime),
    });
  }

  private ordered<T>(source: Map<number, T>): ReadonlyMap<number, T> {
    const map = new Map<number, T>();
    for (const port of this.ports) {
      const value = source.get(port);
      if (value !== undefined) map.set(port, value);
    }
    return map;
  }
}

/** Placeholder for a host whose scan failed as a whole */
export function degradedResult(target: Target, error: string, startTime: number, endTime: number = Date.now()): HostScanResult {
  return Object.freeze({
    host: target.host,
    ports: Object.freeze([...target.ports]),
    tcp: new Map<number, TcpResult>(),
    http: new Map<number, HttpResult>(),
    tls: new Map<number, TlsResult>(),
    startTime,
    endTime,
    durationMs: Math.max(0, endTime - startTime),
    error,
  });
}

/** Per-port view of a result, only when exactly one port was requested */
export function singlePort(result: HostScanResult): SinglePortView | undefined {
  const [port] = result.ports;
  if (result.ports.length !== 1 || port === undefined) return undefined;

  const view: SinglePortView = { port };
  const tcp = result.tcp.get(port);
  const http = result.http.get(port);
  const tls = result.tls.get(port);
  if (tcp) view.tcp = tcp;
  if (http) view.http = http;
  if (tls) view.tls = tls;
  return view;
}

/** A host counts as reachable when IPv4 resolution or ping succeeded */
export function isHostReachable(result: HostScanResult): boolean {
  return Boolean(result.dns?.ipv4.success || result.icmp?.success);
}

// Portable conversion

type FailureLike = { success: true } | { success: false; error: string; errorKind: ProbeErrorKind };

function failureFields(result: FailureLike): { error?: string; error_kind?: ProbeErrorKind } {
  return result.success ? {} : { error: result.error, error_kind: result.errorKind };
}

function portableFamily(family: FamilyResult): PortableFamily {
  return { success: family.success, addresses: [...family.addresses], count: family.count, ...failureFields(family) };
}

export function portableDns(result: DnsResult): PortableDns {
  return {
    hostname: result.hostname,
    success: result.success,
    response_time_ms: result.responseTimeMs,
    ipv4: portableFamily(result.ipv4),
    ipv6: portableFamily(result.ipv6),
    ...failureFields(result),
  };
}

export function portableTcp(result: TcpResult): PortableTcp {
  return {
    success: result.success,
    host: result.host,
    port: result.port,
    status: result.status,
    response_time_ms: result.responseTimeMs,
    ...failureFields(result),
  };
}

export function portableHttp(result: HttpResult): PortableHttp {
  const base = {
    host: result.host,
    port: result.port,
    url: result.url,
    protocol: result.protocol,
    response_time_ms: result.responseTimeMs,
  };
  if (!result.success) {
    return { success: false, ...base, error: result.error, error_kind: result.errorKind };
  }

  const security = result.securityHeaders;
  return {
    success: true,
    ...base,
    status_code: result.statusCode,
    reason_phrase: result.reasonPhrase,
    headers: { ...result.headers },
    server: result.server,
    content_type: result.contentType,
    content_length: result.contentLength,
    is_redirect: result.isRedirect,
    redirect_url: result.redirectUrl,
    security_headers: {
      headers: { ...security.headers },
      present: { ...security.present },
      present_count: security.presentCount,
      missing_count: security.missingCount,
      score: security.score,
    },
  };
}

export function portableSsl(result: TlsResult): PortableSsl {
  const base = { host: result.host, port: result.port, response_time_ms: result.responseTimeMs };
  if (!result.success) {
    return { success: false, ...base, error: result.error, error_kind: result.errorKind };
  }

  const cert = result.certificate;
  return {
    success: true,
    ...base,
    certificate: {
      subject: { ...cert.subject },
      issuer: { ...cert.issuer },
      subject_raw: cert.subjectRaw,
      issuer_raw: cert.issuerRaw,
      serial_number: cert.serialNumber,
      version: cert.version,
      not_before: cert.notBefore,
      not_after: cert.notAfter,
      subject_alt_names: cert.subjectAltNames.map((san) => ({ ...san })),
      days_until_expiry: cert.daysUntilExpiry,
      is_expired: cert.isExpired,
      expires_soon: cert.expiresSoon,
      hostname_match: cert.hostnameMatch,
    },
    security_score: {
      score: result.securityScore.score,
      grade: result.securityScore.grade,
      issues: [...result.securityScore.issues],
    },
    protocol: result.protocol,
    cipher: result.cipher,
  };
}

export function portableIcmp(result: IcmpResult): PortableIcmp {
  return {
    success: result.success,
    host: result.host,
    method: result.method,
    response_time_ms: result.responseTimeMs,
    ...(result.success && result.rawOutput !== undefined ? { raw_output: result.rawOutput } : {}),
    ...(result.success && result.destAddress !== undefined ? { dest_address: result.destAddress } : {}),
    ...failureFields(result),
  };
}

function portMap<T, R>(map: ReadonlyMap<number, T>, convert: (value: T) => R): Record<string, R> {
  const record: Record<string, R> = {};
  for (const [port, value] of map) {
    record[String(port)] = convert(value);
  }
  return record;
}

/** snake_case export form used by the JSON, CSV and metrics reporters */
export function toPortable(result: HostScanResult): PortableHostResult {
  const portable: PortableHostResult = {
    host: result.host,
    ports: [...result.ports],
    ...(result.dns ? { dns: portableDns(result.dns) } : {}),
    ...(result.icmp ? { icmp: portableIcmp(result.icmp) } : {}),
    tcp: portMap(result.tcp, portableTcp),
    http: portMap(result.http, portableHttp),
    ssl: portMap(result.tls, portableSsl),
    duration_ms: result.durationMs,
    ...(result.error !== undefined ? { error: result.error } : {}),
  };

  const single = singlePort(result);
  if (single) {
    portable.port = single.port;
    if (single.tcp) portable.tcp_single = portableTcp(single.tcp);
    if (single.http) portable.http_single = portableHttp(single.http);
    if (single.tls) portable.ssl_single = portableSsl(single.tls);
  }

  return portable;
}

/** Reads a portable result back, validating the known fields */
export function parsePortableResult(value: unknown): PortableHostResult {
  return PortableHostResultSchema.parse(value);
}
