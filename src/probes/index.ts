export { probeDns, reverseLookup, systemResolverFactory, type DnsResolverLike, type ResolverFactory } from './dns-probe.js';
export { probeTcp } from './tcp-probe.js';
export {
  HttpProbe,
  SECURITY_HEADERS,
  buildProbeUrl,
  protocolForPort,
  extractSecurityHeaders,
  normalizeHeaders,
  type HttpProbeOptions,
} from './http-probe.js';
export {
  probeTls,
  fetchPeerCertificate,
  extractCertificateFields,
  readCertificateVersion,
  parseSubjectAltNames,
  type PeerCertificateInfo,
} from './tls-probe.js';
export { runGuarded, DEFAULT_GRACE_MS, type GuardOptions } from './guard.js';
export { createProbeSet, type ProbeSetOptions, type NetworkProbeSet } from './probe-set.js';
export * from './icmp/index.js';
