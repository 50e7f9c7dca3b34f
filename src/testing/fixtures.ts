import { delay } from '../utils/delay.js';
import type { CertificateAnalysis, TlsResult } from '../types/certificate.js';
import type { DnsResult, HttpResult, IcmpResult, ProbeContext, TcpResult } from '../types/probes.js';
import type { ProbeSet } from '../types/scan.js';

// Canned probe results and an in-memory probe set for orchestrator tests

export function dnsResult(host: string, addresses: string[] = ['192.0.2.1']): DnsResult {
  if (addresses.length === 0) {
    const family = {
      success: false as const,
      error: `queryA ENOTFOUND ${host}`,
      errorKind: 'dns_resolution' as const,
      addresses: [],
      count: 0,
    };
    return {
      hostname: host,
      success: false,
      error: family.error,
      errorKind: 'dns_resolution',
      responseTimeMs: 2,
      ipv4: family,
      ipv6: { ...family },
    };
  }
  return {
    hostname: host,
    success: true,
    responseTimeMs: 2,
    ipv4: { success: true, addresses, count: addresses.length },
    ipv6: { success: false, error: `queryAaaa ENODATA ${host}`, errorKind: 'dns_resolution', addresses: [], count: 0 },
  };
}

export function tcpResult(host: string, port: number, open = true, responseTimeMs = 1.5): TcpResult {
  if (open) return { success: true, host, port, status: 'open', responseTimeMs };
  return {
    success: false,
    host,
    port,
    status: 'refused',
    error: 'Connection refused',
    errorKind: 'connection_refused',
    responseTimeMs,
  };
}

export function httpResult(host: string, port: number, statusCode = 200): HttpResult {
  const protocol = port === 443 || port === 8443 ? 'https' : 'http';
  return {
    success: true,
    host,
    port,
    url: `${protocol}://${host}:${port}/`,
    protocol,
    responseTimeMs: 12.5,
    statusCode,
    reasonPhrase: statusCode === 200 ? 'OK' : 'Moved Permanently',
    headers: { server: 'test-server', 'content-type': 'text/html' },
    server: 'test-server',
    contentType: 'text/html',
    contentLength: null,
    isRedirect: statusCode >= 300 && statusCode < 400,
    redirectUrl: null,
    securityHeaders: {
      headers: {
        'strict-transport-security': null,
        'x-frame-options': 'DENY',
        'x-content-type-options': null,
        'x-xss-protection': null,
        'content-security-policy': null,
        'referrer-policy': null,
      },
      present: {
        'strict-transport-security': false,
        'x-frame-options': true,
        'x-content-type-options': false,
        'x-xss-protection': false,
        'content-security-policy': false,
        'referrer-policy': false,
      },
      presentCount: 1,
      missingCount: 5,
      score: '1/6',
    },
  };
}

export function certificateAnalysis(host: string): CertificateAnalysis {
  return {
    subject: { 'Common Name': host },
    issuer: { 'Common Name': 'Test CA' },
    subjectRaw: `CN=${host}`,
    issuerRaw: 'CN=Test CA',
    serialNumber: '01',
    version: 3,
    notBefore: '2026-01-01T00:00:00.000Z',
    notAfter: '2027-01-01T00:00:00.000Z',
    subjectAltNames: [{ type: 'DNS', value: host }],
    daysUntilExpiry: 74,
    isExpired: false,
    expiresSoon: false,
    hostnameMatch: true,
  };
}

export function tlsResult(host: string, port: number): TlsResult {
  return {
    success: true,
    host,
    port,
    responseTimeMs: 20,
    certificate: certificateAnalysis(host),
    securityScore: { score: 100, grade: 'A+', issues: [] },
    protocol: 'TLSv1.3',
    cipher: 'TLS_AES_256_GCM_SHA384',
  };
}

export function icmpResult(host: string, success = true): IcmpResult {
  if (success) return { success: true, host, method: 'system_command', responseTimeMs: 0.8 };
  return {
    success: false,
    host,
    method: 'none',
    responseTimeMs: 1000,
    error: 'Request timed out',
    errorKind: 'connection_timeout',
  };
}

export interface FakeProbeOptions {
  delayMs?: number;
  openPorts?: readonly number[];
  unreachableHosts?: readonly string[];
  overrides?: Partial<Omit<ProbeSet, 'close'>>;
}

/**
 * Probe set that answers from canned results and records every call along
 * with the highest number of calls in flight at once.
 */
export class FakeProbeSet implements ProbeSet {
  readonly calls: string[] = [];
  readonly contexts: ProbeContext[] = [];
  inFlight = 0;
  peak = 0;
  closed = false;
  private readonly delayMs: number;
  private readonly openPorts: ReadonlySet<number>;
  private readonly unreachable: ReadonlySet<string>;
  private readonly overrides: Partial<Omit<ProbeSet, 'close'>>;

  constructor(options: FakeProbeOptions = {}) {
    this.delayMs = options.delayMs ?? 0;
    this.openPorts = new Set(options.openPorts ?? [80, 443]);
    this.unreachable = new Set(options.unreachableHosts ?? []);
    this.overrides = options.overrides ?? {};
  }

  private async track<T>(label: string, ctx: ProbeContext, produce: () => T | Promise<T>): Promise<T> {
    this.calls.push(label);
    this.contexts.push(ctx);
    this.inFlight++;
    this.peak = Math.max(this.peak, this.inFlight);
    try {
      if (this.delayMs > 0) await delay(this.delayMs);
      return await produce();
    } finally {
      this.inFlight--;
    }
  }

  dns(host: string, ctx: ProbeContext): Promise<DnsResult> {
    const override = this.overrides.dns;
    return this.track(`dns:${host}`, ctx, () =>
      override ? override(host, ctx) : dnsResult(host, this.unreachable.has(host) ? [] : ['192.0.2.1'])
    );
  }

  tcp(host: string, port: number, ctx: ProbeContext): Promise<TcpResult> {
    const override = this.overrides.tcp;
    return this.track(`tcp:${host}:${port}`, ctx, () =>
      override ? override(host, port, ctx) : tcpResult(host, port, !this.unreachable.has(host) && this.openPorts.has(port))
    );
  }

  http(host: string, port: number, ctx: ProbeContext): Promise<HttpResult> {
    const override = this.overrides.http;
    return this.track(`http:${host}:${port}`, ctx, () => (override ? override(host, port, ctx) : httpResult(host, port)));
  }

  tls(host: string, port: number, ctx: ProbeContext): Promise<TlsResult> {
    const override = this.overrides.tls;
    return this.track(`tls:${host}:${port}`, ctx, () => (override ? override(host, port, ctx) : tlsResult(host, port)));
  }

  icmp(host: string, ctx: ProbeContext): Promise<IcmpResult> {
    const override = this.overrides.icmp;
    return this.track(`icmp:${host}`, ctx, () =>
      override ? override(host, ctx) : icmpResult(host, !this.unreachable.has(host))
    );
  }

  close(): void {
    this.closed = true;
  }
}
