// Config schemas
export {
  LogLevelSchema,
  ProbeConfigSchema,
  TargetConfigSchema,
  ConfigFileSchema,
  EnvConfigSchema,
  type LogLevel,
  type ProbeConfig,
  type ProbeConfigInput,
  type TargetConfig,
  type ConfigFile,
  type EnvConfig,
} from './config.js';

// Portable result schemas
export {
  ProbeErrorKindSchema,
  PortableFamilySchema,
  PortableDnsSchema,
  PortableTcpSchema,
  PortableSecurityHeadersSchema,
  PortableHttpSchema,
  PortableCertificateSchema,
  PortableSecurityScoreSchema,
  PortableSslSchema,
  PortableIcmpSchema,
  PortableHostResultSchema,
  PortableMultiHostReportSchema,
  type PortableFamily,
  type PortableDns,
  type PortableTcp,
  type PortableHttp,
  type PortableCertificate,
  type PortableSsl,
  type PortableIcmp,
  type PortableHostResult,
  type PortableHostResultInput,
  type PortableMultiHostReport,
} from './result.js';
