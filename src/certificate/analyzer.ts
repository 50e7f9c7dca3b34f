import { parseDistinguishedName } from './distinguished-name.js';
import { hostnameMatches } from './hostname.js';
import type {
  CertificateAnalysis,
  CertificateFields,
  SecurityGrade,
  SecurityScore,
} from '../types/certificate.js';

const DAY_MS = 24 * 60 * 60 * 1000;
export const EXPIRY_WARNING_DAYS = 30;

const EXPIRED_PENALTY = 50;
const EXPIRING_SOON_PENALTY = 10;
const HOSTNAME_MISMATCH_PENALTY = 20;

const GRADE_THRESHOLDS: ReadonlyArray<[number, SecurityGrade]> = [
  [90, 'A+'],
  [85, 'A'],
  [80, 'A-'],
  [70, 'B'],
  [60, 'C'],
  [50, 'D'],
];

export function analyzeCertificate(
  fields: CertificateFields,
  hostname: string,
  now: Date = new Date()
): CertificateAnalysis {
  const subject = parseDistinguishedName(fields.subject);
  const issuer = parseDistinguishedName(fields.issuer);
  const daysUntilExpiry = Math.floor((fields.notAfter.getTime() - now.getTime()) / DAY_MS);

  return {
    subject,
    issuer,
    subjectRaw: fields.subject,
    issuerRaw: fields.issuer,
    serialNumber: fields.serialNumber,
    version: fields.version,
    notBefore: fields.notBefore.toISOString(),
    notAfter: fields.notAfter.toISOString(),
    subjectAltNames: fields.subjectAltNames.map((san) => ({ ...san })),
    daysUntilExpiry,
    isExpired: daysUntilExpiry < 0,
    expiresSoon: daysUntilExpiry >= 0 && daysUntilExpiry <= EXPIRY_WARNING_DAYS,
    hostnameMatch: hostnameMatches(hostname, subject['Common Name'], fields.subjectAltNames),
  };
}

export function gradeFor(score: number): SecurityGrade {
  for (const [threshold, grade] of GRADE_THRESHOLDS) {
    if (score >= threshold) return grade;
  }
  return 'F';
}

/** Certificate-only score: validity window and hostname coverage */
export function calculateSecurityScore(analysis: CertificateAnalysis): SecurityScore {
  let score = 100;
  const issues: string[] = [];

  if (analysis.isExpired) {
    score -= EXPIRED_PENALTY;
    issues.push('Certificate expired');
  } else if (analysis.expiresSoon) {
    score -= EXPIRING_SOON_PENALTY;
    issues.push('Certificate expires soon');
  }

  if (!analysis.hostnameMatch) {
    score -= HOSTNAME_MISMATCH_PENALTY;
    issues.push('Hostname mismatch');
  }

  score = Math.max(0, score);
  return { score, grade: gradeFor(score), issues };
}
