import type { DnsResult, HttpResult, IcmpResult, ProbeContext, TcpResult } from './probes.js';
import type { TlsResult } from './certificate.js';

// Scan orchestration types

export interface Target {
  host: string;
  /** Requested ports, in request order. Empty means host-only checks. */
  ports: number[];
}

export type ScanStatus = 'pending' | 'running' | 'completed' | 'partial_failure';

export interface HostScanResult {
  readonly host: string;
  readonly ports: readonly number[];
  readonly dns?: DnsResult;
  readonly icmp?: IcmpResult;
  readonly tcp: ReadonlyMap<number, TcpResult>;
  readonly http: ReadonlyMap<number, HttpResult>;
  readonly tls: ReadonlyMap<number, TlsResult>;
  /** Epoch milliseconds */
  readonly startTime: number;
  readonly endTime: number;
  readonly durationMs: number;
  /** Set only on a degraded record whose whole host scan failed */
  readonly error?: string;
}

export interface SinglePortView {
  port: number;
  tcp?: TcpResult;
  http?: HttpResult;
  tls?: TlsResult;
}

/** The probe primitives one orchestrator run calls into */
export interface ProbeSet {
  dns(host: string, ctx: ProbeContext): Promise<DnsResult>;
  tcp(host: string, port: number, ctx: ProbeContext): Promise<TcpResult>;
  http(host: string, port: number, ctx: ProbeContext): Promise<HttpResult>;
  tls(host: string, port: number, ctx: ProbeContext): Promise<TlsResult>;
  icmp(host: string, ctx: ProbeContext): Promise<IcmpResult>;
  /** Releases pooled connections once the run is over */
  close?(): void;
}

export interface ScanOrchestratorOptions {
  /** Per-probe timeout in seconds */
  timeout?: number | undefined;
  maxConcurrent?: number | undefined;
  sslCheck?: boolean | undefined;
  onHostComplete?: ((result: HostScanResult, completed: number, total: number) => void) | undefined;
}
