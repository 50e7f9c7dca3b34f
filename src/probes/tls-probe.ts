import net from 'net';
import tls from 'tls';
import { analyzeCertificate, calculateSecurityScore } from '../certificate/analyzer.js';
import { formatDistinguishedName } from '../certificate/distinguished-name.js';
import {
  CertificateParseError,
  CertificateUnavailableError,
  ConnectionRefusedError,
  ConnectionTimeoutError,
  DnsResolutionError,
  ProbeError,
  toProbeError,
} from '../errors.js';
import { elapsedSince } from '../utils/format.js';
import type { CertificateFields, SubjectAltName, TlsResult } from '../types/certificate.js';
import type { ProbeContext } from '../types/probes.js';

export interface PeerCertificateInfo {
  fields: CertificateFields;
  protocol: string | null;
  cipher: string | null;
}

const TAG_SEQUENCE = 0x30;
const TAG_EXPLICIT_VERSION = 0xa0;
const TAG_INTEGER = 0x02;

function byteAt(der: Buffer, offset: number): number {
  const value = der[offset];
  if (value === undefined) throw new CertificateParseError('Truncated certificate DER');
  return value;
}

/** Returns the offset of the first content byte of the element at `offset` */
function enterElement(der: Buffer, offset: number, tag: number): number {
  if (byteAt(der, offset) !== tag) {
    throw new CertificateParseError(`Unexpected DER tag 0x${byteAt(der, offset).toString(16)} at offset ${offset}`);
  }
  const length = byteAt(der, offset + 1);
  return length < 0x80 ? offset + 2 : offset + 2 + (length & 0x7f);
}

/**
 * X.509 version from the DER encoding. TBSCertificate carries an explicit
 * [0] version field for v2 and v3; without it the certificate is v1.
 */
export function readCertificateVersion(der: Buffer): number {
  let offset = enterElement(der, 0, TAG_SEQUENCE);
  offset = enterElement(der, offset, TAG_SEQUENCE);
  if (byteAt(der, offset) !== TAG_EXPLICIT_VERSION) return 1;

  offset = enterElement(der, offset, TAG_EXPLICIT_VERSION);
  if (byteAt(der, offset) !== TAG_INTEGER || byteAt(der, offset + 1) !== 1) {
    throw new CertificateParseError('Malformed certificate version field');
  }
  return byteAt(der, offset + 2) + 1;
}

/** "DNS:a.example, IP Address:10.0.0.1" */
export function parseSubjectAltNames(text: string | undefined): SubjectAltName[] {
  if (!text) return [];

  const names: SubjectAltName[] = [];
  for (const entry of text.split(', ')) {
    const colon = entry.indexOf(':');
    if (colon === -1) continue;
    names.push({ type: entry.slice(0, colon).trim(), value: entry.slice(colon + 1).trim() });
  }
  return names;
}

function parseCertificateDate(text: string, field: string): Date {
  const date = new Date(text);
  if (Number.isNaN(date.getTime())) {
    throw new CertificateParseError(`Invalid certificate ${field}: ${text}`);
  }
  return date;
}

export function extractCertificateFields(cert: tls.PeerCertificate): CertificateFields {
  if (Object.keys(cert).length === 0 || !cert.raw) {
    throw new CertificateUnavailableError();
  }

  return {
    subject: formatDistinguishedName(cert.subject),
    issuer: formatDistinguishedName(cert.issuer),
    serialNumber: cert.serialNumber,
    version: readCertificateVersion(cert.raw),
    notBefore: parseCertificateDate(cert.valid_from, 'notBefore'),
    notAfter: parseCertificateDate(cert.valid_to, 'notAfter'),
    subjectAltNames: parseSubjectAltNames(cert.subjectaltname),
  };
}

function connectError(error: Error): ProbeError {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  switch (code) {
    case 'ECONNREFUSED':
      return new ConnectionRefusedError();
    case 'ETIMEDOUT':
      return new ConnectionTimeoutError(error.message);
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
    case 'EAI_NONAME':
      return new DnsResolutionError(error.message);
    default:
      return new CertificateUnavailableError(`Could not retrieve certificate: ${error.message}`);
  }
}

/** Completes a TLS handshake without verification and reads the peer certificate */
export function fetchPeerCertificate(host: string, port: number, ctx: ProbeContext): Promise<PeerCertificateInfo> {
  return new Promise((resolve, reject) => {
    const socket = tls.connect({
      host,
      port,
      rejectUnauthorized: false,
      ...(net.isIP(host) === 0 ? { servername: host } : {}),
    });
    let settled = false;

    const settle = (outcome: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      ctx.signal.removeEventListener('abort', onAbort);
      socket.destroy();
      outcome();
    };

    const onAbort = (): void => settle(() => reject(new ConnectionTimeoutError('Probe aborted')));
    const timer = setTimeout(
      () => settle(() => reject(new ConnectionTimeoutError(`TLS handshake timeout after ${ctx.timeoutMs}ms`))),
      ctx.timeoutMs
    );

    if (ctx.signal.aborted) {
      onAbort();
      return;
    }
    ctx.signal.addEventListener('abort', onAbort, { once: true });

    socket.once('secureConnect', () => {
      try {
        const fields = extractCertificateFields(socket.getPeerCertificate());
        const cipher = socket.getCipher();
        const info: PeerCertificateInfo = { fields, protocol: socket.getProtocol(), cipher: cipher.name || null };
        settle(() => resolve(info));
      } catch (error) {
        settle(() => reject(toProbeError(error)));
      }
    });

    socket.once('error', (error: Error) => settle(() => reject(connectError(error))));
  });
}

export async function probeTls(host: string, port: number, ctx: ProbeContext): Promise<TlsResult> {
  const start = performance.now();

  try {
    const { fields, protocol, cipher } = await fetchPeerCertificate(host, port, ctx);
    const certificate = analyzeCertificate(fields, host);
    return {
      success: true,
      host,
      port,
      responseTimeMs: elapsedSince(start),
      certificate,
      securityScore: calculateSecurityScore(certificate),
      protocol,
      cipher,
    };
  } catch (error) {
    const probeError = toProbeError(error);
    return {
      success: false,
      host,
      port,
      responseTimeMs: elapsedSince(start),
      error: probeError.message,
      errorKind: probeError.kind,
    };
  }
}
