// Probe types
export type {
  ProbeErrorKind,
  ProbeContext,
  ProbeFailureFields,
  AddressFamily,
  FamilySuccess,
  FamilyFailure,
  FamilyResult,
  DnsSuccess,
  DnsFailure,
  DnsResult,
  ReverseLookupResult,
  TcpStatus,
  TcpSuccess,
  TcpFailure,
  TcpResult,
  HttpProtocol,
  SecurityHeaderName,
  SecurityHeaderReport,
  HttpSuccess,
  HttpFailure,
  HttpResult,
  PageFetchSuccess,
  PageFetchResult,
  IcmpMethod,
  IcmpSuccess,
  IcmpFailure,
  IcmpResult,
  ContinuousPingResult,
  PingStrategy,
} from './probes.js';

// Certificate types
export type {
  SubjectAltName,
  CertificateFields,
  DistinguishedName,
  CertificateAnalysis,
  SecurityGrade,
  SecurityScore,
  TlsSuccess,
  TlsFailure,
  TlsResult,
} from './certificate.js';

// Scan types
export type {
  Target,
  ScanStatus,
  HostScanResult,
  SinglePortView,
  ProbeSet,
  ScanOrchestratorOptions,
} from './scan.js';

// Monitor types
export type {
  HealthPredicate,
  HostHistoryEntry,
  HostMonitorState,
  HostUptime,
  MonitorSummary,
  MonitorIteration,
  ContinuousMonitorOptions,
} from './monitor.js';
