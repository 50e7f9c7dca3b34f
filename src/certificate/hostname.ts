import type { SubjectAltName } from '../types/certificate.js';

const MATCHABLE_SAN_TYPES = new Set(['DNS', 'IP Address']);

/**
 * Case-insensitive match of `hostname` against one certificate name. A
 * leading "*." matches exactly one extra label, and the bare parent domain
 * as well.
 */
export function matchesCertificateName(hostname: string, pattern: string): boolean {
  const host = hostname.toLowerCase();
  const name = pattern.toLowerCase();

  if (host === name) return true;
  if (!name.startsWith('*.')) return false;

  const parent = name.slice(2);
  if (host === parent) return true;

  const dot = host.indexOf('.');
  return dot > 0 && host.slice(dot + 1) === parent;
}

export function hostnameMatches(
  hostname: string,
  commonName: string | undefined,
  subjectAltNames: readonly SubjectAltName[]
): boolean {
  if (commonName && matchesCertificateName(hostname, commonName)) return true;

  return subjectAltNames.some(
    (san) => MATCHABLE_SAN_TYPES.has(san.type) && matchesCertificateName(hostname, san.value)
  );
}
