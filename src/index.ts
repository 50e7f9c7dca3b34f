// Scanning
export { ScanOrchestrator, runScan, DEFAULT_TIMEOUT_SECONDS, DEFAULT_MAX_CONCURRENT, type RunScanOptions, type ScanOrchestratorDeps } from './scanner/orchestrator.js';
export {
  HostResultBuilder,
  degradedResult,
  singlePort,
  isHostReachable,
  toPortable,
  parsePortableResult,
} from './scanner/host-result.js';
export { WEB_PORTS, TLS_PORTS, getCommonPorts, getPortDescription, isWebPort, isTlsPort } from './scanner/port-profiles.js';

// Probes
export * from './probes/index.js';

// Certificates
export * from './certificate/index.js';

// Monitoring
export * from './monitor/index.js';

// Output
export * from './reporters/index.js';
export { StatusServer, type StatusServerOptions } from './api/server.js';

// Configuration
export { loadConfig, readConfigFile, configFromEnv, formatZodError, type LoadConfigOptions, type LoadedConfig } from './config/index.js';
export * from './schemas/index.js';

// Errors
export {
  ProbeError,
  DnsResolutionError,
  ConnectionRefusedError,
  ConnectionTimeoutError,
  CertificateUnavailableError,
  CertificateParseError,
  SubprocessUnavailableError,
  UnexpectedProbeError,
  ConfigurationError,
  PortSpecError,
  type PortSpecErrorCode,
} from './errors.js';

// Utilities and types
export * from './utils/index.js';
export * from './types/index.js';
