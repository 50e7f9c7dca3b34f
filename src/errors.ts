import type { ProbeErrorKind } from './types/probes.js';

// Probe-level errors. These never escape a probe: the probe boundary turns
// them into a failure result carrying `kind` as its errorKind.
export class ProbeError extends Error {
  readonly kind: ProbeErrorKind;

  constructor(kind: ProbeErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class DnsResolutionError extends ProbeError {
  constructor(message: string) {
    super('dns_resolution', message);
  }
}

export class ConnectionRefusedError extends ProbeError {
  constructor(message = 'Connection refused') {
    super('connection_refused', message);
  }
}

export class ConnectionTimeoutError extends ProbeError {
  constructor(message: string) {
    super('connection_timeout', message);
  }
}

export class CertificateUnavailableError extends ProbeError {
  constructor(message = 'Could not retrieve certificate') {
    super('certificate_unavailable', message);
  }
}

export class CertificateParseError extends ProbeError {
  constructor(message: string) {
    super('certificate_parse', message);
  }
}

export class SubprocessUnavailableError extends ProbeError {
  constructor(message: string) {
    super('subprocess_unavailable', message);
  }
}

export class UnexpectedProbeError extends ProbeError {
  constructor(message: string) {
    super('unexpected', message);
  }
}

// Precondition errors. These propagate to the caller before any probe starts.
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type PortSpecErrorCode = 'invalid_format' | 'invalid_port' | 'range_order' | 'range_too_large';

export class PortSpecError extends ConfigurationError {
  readonly code: PortSpecErrorCode;

  constructor(code: PortSpecErrorCode, message: string) {
    super(message);
    this.name = 'PortSpecError';
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === 'string' && error.length > 0) return error;
  return 'Unknown error';
}

export function toProbeError(error: unknown): ProbeError {
  if (error instanceof ProbeError) return error;
  return new UnexpectedProbeError(errorMessage(error));
}
