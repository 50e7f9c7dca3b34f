// Probe result types

export type ProbeErrorKind =
  | 'dns_resolution'
  | 'connection_refused'
  | 'connection_timeout'
  | 'certificate_unavailable'
  | 'certificate_parse'
  | 'subprocess_unavailable'
  | 'unexpected';

export interface ProbeContext {
  timeoutMs: number;
  /** Aborted by the orchestrator when the probe outlives its deadline */
  signal: AbortSignal;
}

export interface ProbeFailureFields {
  success: false;
  error: string;
  errorKind: ProbeErrorKind;
}

// DNS

export type AddressFamily = 'ipv4' | 'ipv6';

export interface FamilySuccess {
  success: true;
  addresses: string[];
  count: number;
}

export interface FamilyFailure extends ProbeFailureFields {
  addresses: string[];
  count: number;
}

export type FamilyResult = FamilySuccess | FamilyFailure;

interface DnsResultBase {
  hostname: string;
  responseTimeMs: number;
  ipv4: FamilyResult;
  ipv6: FamilyResult;
}

export interface DnsSuccess extends DnsResultBase {
  success: true;
}

export interface DnsFailure extends DnsResultBase, ProbeFailureFields {}

export type DnsResult = DnsSuccess | DnsFailure;

export interface ReverseLookupResult {
  ipAddress: string;
  success: boolean;
  hostnames: string[];
  error?: string;
}

// TCP

export type TcpStatus = 'open' | 'refused' | 'timeout' | 'dns_error' | 'error';

interface TcpResultBase {
  host: string;
  port: number;
  responseTimeMs: number;
}

export interface TcpSuccess extends TcpResultBase {
  success: true;
  status: 'open';
}

export interface TcpFailure extends TcpResultBase, ProbeFailureFields {
  status: Exclude<TcpStatus, 'open'>;
}

export type TcpResult = TcpSuccess | TcpFailure;

// HTTP

export type HttpProtocol = 'http' | 'https';

export type SecurityHeaderName =
  | 'strict-transport-security'
  | 'x-frame-options'
  | 'x-content-type-options'
  | 'x-xss-protection'
  | 'content-security-policy'
  | 'referrer-policy';

export interface SecurityHeaderReport {
  headers: Record<SecurityHeaderName, string | null>;
  present: Record<SecurityHeaderName, boolean>;
  presentCount: number;
  missingCount: number;
  /** "present/total", e.g. "3/6" */
  score: string;
}

interface HttpResultBase {
  host: string;
  port: number;
  url: string;
  protocol: HttpProtocol;
  responseTimeMs: number;
}

export interface HttpSuccess extends HttpResultBase {
  success: true;
  statusCode: number;
  reasonPhrase: string;
  /** Lower-cased names, in the order the server sent them */
  headers: Record<string, string>;
  server: string;
  contentType: string;
  contentLength: string | null;
  isRedirect: boolean;
  redirectUrl: string | null;
  securityHeaders: SecurityHeaderReport;
}

export interface HttpFailure extends HttpResultBase, ProbeFailureFields {}

export type HttpResult = HttpSuccess | HttpFailure;

export interface PageFetchSuccess extends HttpResultBase {
  success: true;
  statusCode: number;
  reasonPhrase: string;
  headers: Record<string, string>;
  content: string;
  contentLength: number;
  encoding: string | null;
}

export type PageFetchResult = PageFetchSuccess | HttpFailure;

// ICMP

export type IcmpMethod = 'system_command' | 'raw_socket';

export interface IcmpSuccess {
  success: true;
  host: string;
  method: IcmpMethod;
  responseTimeMs: number;
  rawOutput?: string;
  destAddress?: string;
}

export interface IcmpFailure extends ProbeFailureFields {
  host: string;
  method: IcmpMethod | 'none';
  responseTimeMs: number;
}

export type IcmpResult = IcmpSuccess | IcmpFailure;

export interface ContinuousPingResult {
  host: string;
  packetsSent: number;
  packetsReceived: number;
  packetLossPercent: number;
  responseTimes: {
    minMs: number;
    maxMs: number;
    avgMs: number;
  };
  individualResults: IcmpResult[];
}

/** One way of sending an echo request. Strategies are tried in order. */
export interface PingStrategy {
  readonly method: IcmpMethod;
  attempt(host: string, ctx: ProbeContext): Promise<IcmpResult>;
}
