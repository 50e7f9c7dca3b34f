import type { ProbeFailureFields } from './probes.js';

// Certificate analysis types

export interface SubjectAltName {
  /** "DNS", "IP Address", "email", ... */
  type: string;
  value: string;
}

/** Raw fields read off a peer certificate, before analysis */
export interface CertificateFields {
  /** Distinguished name string, e.g. "CN=example.com, O=Example, C=US" */
  subject: string;
  issuer: string;
  serialNumber: string;
  version: number;
  notBefore: Date;
  notAfter: Date;
  subjectAltNames: SubjectAltName[];
}

/** Long attribute names ("Common Name", "Organization", ...) to values */
export type DistinguishedName = Record<string, string>;

export interface CertificateAnalysis {
  subject: DistinguishedName;
  issuer: DistinguishedName;
  subjectRaw: string;
  issuerRaw: string;
  serialNumber: string;
  version: number;
  notBefore: string;
  notAfter: string;
  subjectAltNames: SubjectAltName[];
  daysUntilExpiry: number;
  isExpired: boolean;
  expiresSoon: boolean;
  hostnameMatch: boolean;
}

export type SecurityGrade = 'A+' | 'A' | 'A-' | 'B' | 'C' | 'D' | 'F';

export interface SecurityScore {
  score: number;
  grade: SecurityGrade;
  issues: string[];
}

interface TlsResultBase {
  host: string;
  port: number;
  responseTimeMs: number;
}

export interface TlsSuccess extends TlsResultBase {
  success: true;
  certificate: CertificateAnalysis;
  securityScore: SecurityScore;
  /** Negotiated protocol, e.g. "TLSv1.3" */
  protocol: string | null;
  cipher: string | null;
}

export interface TlsFailure extends TlsResultBase, ProbeFailureFields {}

export type TlsResult = TlsSuccess | TlsFailure;
