import type { DistinguishedName } from '../types/certificate.js';

const ATTRIBUTE_NAMES: Readonly<Record<string, string>> = {
  CN: 'Common Name',
  O: 'Organization',
  OU: 'Organizational Unit',
  L: 'Locality',
  ST: 'State/Province',
  C: 'Country',
};

/** "CN=example.com, O=Example, C=US" to long attribute names */
export function parseDistinguishedName(dn: string): DistinguishedName {
  const parsed: DistinguishedName = {};
  if (!dn) return parsed;

  for (const part of dn.split(', ')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    const key = part.slice(0, eq).trim();
    const value = part.slice(eq + 1).trim();
    parsed[ATTRIBUTE_NAMES[key] ?? key] = value;
  }
  return parsed;
}

/** Builds "K=v, K=v" from a certificate subject or issuer object */
export function formatDistinguishedName(attributes: object): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(attributes)) {
    const entries: unknown[] = Array.isArray(value) ? value : [value];
    for (const entry of entries) {
      if (typeof entry === 'string') parts.push(`${key}=${entry}`);
    }
  }
  return parts.join(', ');
}
