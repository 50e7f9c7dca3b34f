import axios, { type AxiosRequestConfig, type AxiosResponse } from 'axios';
import http from 'http';
import https from 'https';
import net from 'net';
import { errorMessage } from '../errors.js';
import { elapsedSince } from '../utils/format.js';
import type {
  HttpFailure,
  HttpProtocol,
  HttpResult,
  PageFetchResult,
  ProbeContext,
  ProbeErrorKind,
  SecurityHeaderName,
  SecurityHeaderReport,
} from '../types/probes.js';

export const SECURITY_HEADERS: readonly SecurityHeaderName[] = [
  'strict-transport-security',
  'x-frame-options',
  'x-content-type-options',
  'x-xss-protection',
  'content-security-policy',
  'referrer-policy',
];

const HTTPS_PROBE_PORTS = new Set([443, 8443]);
const PAGE_CONTENT_CHARS = 1000;

export interface HttpProbeOptions {
  userAgent?: string | undefined;
  /** Largest body `fetchPage` will download, in bytes */
  maxContentLength?: number | undefined;
}

export function protocolForPort(port: number): HttpProtocol {
  return HTTPS_PROBE_PORTS.has(port) ? 'https' : 'http';
}

export function buildProbeUrl(host: string, port: number, path = '/'): string {
  const hostPart = net.isIP(host) === 6 ? `[${host}]` : host;
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `${protocolForPort(port)}://${hostPart}:${port}${normalizedPath}`;
}

/** Flattens response headers into lower-cased names, keeping arrival order */
export function normalizeHeaders(raw: Record<string, unknown>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined || value === null) continue;
    const text = Array.isArray(value) ? value.map(String).join(', ') : String(value);
    headers[name.toLowerCase()] = text;
  }
  return headers;
}

function byHeaderName<T>(fn: (name: SecurityHeaderName) => T): Record<SecurityHeaderName, T> {
  return {
    'strict-transport-security': fn('strict-transport-security'),
    'x-frame-options': fn('x-frame-options'),
    'x-content-type-options': fn('x-content-type-options'),
    'x-xss-protection': fn('x-xss-protection'),
    'content-security-policy': fn('content-security-policy'),
    'referrer-policy': fn('referrer-policy'),
  };
}

export function extractSecurityHeaders(headers: Record<string, string>): SecurityHeaderReport {
  const values = byHeaderName((name) => headers[name] ?? null);
  const present = byHeaderName((name) => values[name] !== null);
  const presentCount = SECURITY_HEADERS.filter((name) => present[name]).length;

  return {
    headers: values,
    present,
    presentCount,
    missingCount: SECURITY_HEADERS.length - presentCount,
    score: `${presentCount}/${SECURITY_HEADERS.length}`,
  };
}

function classifyRequestError(error: unknown, signal: AbortSignal): { errorKind: ProbeErrorKind; message: string } {
  if (signal.aborted) return { errorKind: 'connection_timeout', message: 'Probe aborted' };

  if (axios.isAxiosError(error)) {
    switch (error.code) {
      case 'ECONNREFUSED':
        return { errorKind: 'connection_refused', message: 'Connection refused' };
      case 'ECONNABORTED':
      case 'ETIMEDOUT':
      case 'ERR_CANCELED':
        return { errorKind: 'connection_timeout', message: error.message || 'Request timed out' };
      case 'ENOTFOUND':
      case 'EAI_AGAIN':
      case 'EAI_NONAME':
        return { errorKind: 'dns_resolution', message: error.message };
      default:
        break;
    }
  }
  return { errorKind: 'unexpected', message: errorMessage(error) };
}

function charsetOf(contentType: string): string | null {
  const match = /charset=([^;]+)/i.exec(contentType);
  return match?.[1] ? match[1].trim().replace(/^"|"$/g, '').toLowerCase() : null;
}

function decodeBody(body: Buffer, encoding: string | null): string {
  try {
    return new TextDecoder(encoding ?? 'utf-8').decode(body);
  } catch {
    // Unknown charset label
    return body.toString('utf8');
  }
}

/**
 * HTTP(S) liveness checks. One instance holds the agents for a whole scan
 * run; certificate validation is off because the TLS probe grades certs.
 */
export class HttpProbe {
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly userAgent: string;
  private readonly maxContentLength: number;

  constructor(options: HttpProbeOptions = {}) {
    this.httpAgent = new http.Agent({ keepAlive: false });
    this.httpsAgent = new https.Agent({ keepAlive: false, rejectUnauthorized: false });
    this.userAgent = options.userAgent ?? 'netprobe/0.3';
    this.maxContentLength = options.maxContentLength ?? 5 * 1024 * 1024;
  }

  private requestConfig(url: string, ctx: ProbeContext): AxiosRequestConfig {
    return {
      url,
      timeout: ctx.timeoutMs,
      signal: ctx.signal,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      headers: { 'User-Agent': this.userAgent },
      // Every status is a live answer; redirects are reported, not followed
      validateStatus: () => true,
      maxRedirects: 0,
      proxy: false,
    };
  }

  private failure(host: string, port: number, url: string, start: number, error: unknown, ctx: ProbeContext): HttpFailure {
    const { errorKind, message } = classifyRequestError(error, ctx.signal);
    return {
      success: false,
      host,
      port,
      url,
      protocol: protocolForPort(port),
      responseTimeMs: elapsedSince(start),
      error: message,
      errorKind,
    };
  }

  /** HEAD request against the server root */
  async probe(host: string, port: number, ctx: ProbeContext): Promise<HttpResult> {
    const url = buildProbeUrl(host, port);
    const start = performance.now();

    let response: AxiosResponse<unknown>;
    try {
      response = await axios.request<unknown>({ ...this.requestConfig(url, ctx), method: 'HEAD' });
    } catch (error) {
      return this.failure(host, port, url, start, error, ctx);
    }

    const responseTimeMs = elapsedSince(start);
    const headers = normalizeHeaders(response.headers);
    const statusCode = response.status;
    const isRedirect = statusCode >= 300 && statusCode < 400;

    return {
      success: true,
      host,
      port,
      url,
      protocol: protocolForPort(port),
      responseTimeMs,
      statusCode,
      reasonPhrase: response.statusText ?? '',
      headers,
      server: headers['server'] ?? 'Unknown',
      contentType: headers['content-type'] ?? 'Unknown',
      contentLength: headers['content-length'] ?? null,
      isRedirect,
      redirectUrl: isRedirect ? (headers['location'] ?? null) : null,
      securityHeaders: extractSecurityHeaders(headers),
    };
  }

  /** GET `path` and keep the start of the body */
  async fetchPage(host: string, port: number, path: string, ctx: ProbeContext): Promise<PageFetchResult> {
    const url = buildProbeUrl(host, port, path);
    const start = performance.now();

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await axios.request<ArrayBuffer>({
        ...this.requestConfig(url, ctx),
        method: 'GET',
        responseType: 'arraybuffer',
        maxContentLength: this.maxContentLength,
      });
    } catch (error) {
      return this.failure(host, port, url, start, error, ctx);
    }

    const headers = normalizeHeaders(response.headers);
    const body = Buffer.from(response.data);
    const encoding = charsetOf(headers['content-type'] ?? '');

    return {
      success: true,
      host,
      port,
      url,
      protocol: protocolForPort(port),
      responseTimeMs: elapsedSince(start),
      statusCode: response.status,
      reasonPhrase: response.statusText ?? '',
      headers,
      content: decodeBody(body, encoding).slice(0, PAGE_CONTENT_CHARS),
      contentLength: body.length,
      encoding,
    };
  }

  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
