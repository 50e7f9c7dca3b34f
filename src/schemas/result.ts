import { z } from 'zod';

// Portable (export) form of a host scan. Field names are the JSON, CSV and
// Prometheus contract and must stay stable.

export const ProbeErrorKindSchema = z.enum([
  'dns_resolution',
  'connection_refused',
  'connection_timeout',
  'certificate_unavailable',
  'certificate_parse',
  'subprocess_unavailable',
  'unexpected',
]);

const failureFields = {
  error: z.string().min(1).optional(),
  error_kind: ProbeErrorKindSchema.optional(),
};

function successMatchesError<T extends { success: boolean; error?: string | undefined }>(value: T, ctx: z.RefinementCtx): void {
  if (value.success && value.error !== undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'A successful result must not carry an error' });
  }
  if (!value.success && value.error === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'A failed result must carry an error' });
  }
}

export const PortableFamilySchema = z
  .object({
    success: z.boolean(),
    addresses: z.array(z.string()),
    count: z.number().int().min(0),
    ...failureFields,
  })
  .superRefine(successMatchesError);

export const PortableDnsSchema = z
  .object({
    hostname: z.string(),
    success: z.boolean(),
    response_time_ms: z.number().min(0),
    ipv4: PortableFamilySchema,
    ipv6: PortableFamilySchema,
    ...failureFields,
  })
  .superRefine(successMatchesError);

export const PortableTcpSchema = z
  .object({
    success: z.boolean(),
    host: z.string(),
    port: z.number().int(),
    status: z.enum(['open', 'refused', 'timeout', 'dns_error', 'error']),
    response_time_ms: z.number().min(0),
    ...failureFields,
  })
  .superRefine(successMatchesError);

export const PortableSecurityHeadersSchema = z.object({
  headers: z.record(z.string().nullable()),
  present: z.record(z.boolean()),
  present_count: z.number().int(),
  missing_count: z.number().int(),
  score: z.string(),
});

export const PortableHttpSchema = z
  .object({
    success: z.boolean(),
    host: z.string(),
    port: z.number().int(),
    url: z.string(),
    protocol: z.enum(['http', 'https']),
    response_time_ms: z.number().min(0),
    status_code: z.number().int().optional(),
    reason_phrase: z.string().optional(),
    headers: z.record(z.string()).optional(),
    server: z.string().optional(),
    content_type: z.string().optional(),
    content_length: z.string().nullable().optional(),
    is_redirect: z.boolean().optional(),
    redirect_url: z.string().nullable().optional(),
    security_headers: PortableSecurityHeadersSchema.optional(),
    ...failureFields,
  })
  .superRefine(successMatchesError);

export const PortableCertificateSchema = z.object({
  subject: z.record(z.string()),
  issuer: z.record(z.string()),
  subject_raw: z.string(),
  issuer_raw: z.string(),
  serial_number: z.string(),
  version: z.number().int(),
  not_before: z.string(),
  not_after: z.string(),
  subject_alt_names: z.array(z.object({ type: z.string(), value: z.string() })),
  days_until_expiry: z.number().int(),
  is_expired: z.boolean(),
  expires_soon: z.boolean(),
  hostname_match: z.boolean(),
});

export const PortableSecurityScoreSchema = z.object({
  score: z.number().int().min(0).max(100),
  grade: z.enum(['A+', 'A', 'A-', 'B', 'C', 'D', 'F']),
  issues: z.array(z.string()),
});

export const PortableSslSchema = z
  .object({
    success: z.boolean(),
    host: z.string(),
    port: z.number().int(),
    response_time_ms: z.number().min(0),
    certificate: PortableCertificateSchema.optional(),
    security_score: PortableSecurityScoreSchema.optional(),
    protocol: z.string().nullable().optional(),
    cipher: z.string().nullable().optional(),
    ...failureFields,
  })
  .superRefine(successMatchesError);

export const PortableIcmpSchema = z
  .object({
    success: z.boolean(),
    host: z.string(),
    method: z.enum(['system_command', 'raw_socket', 'none']),
    response_time_ms: z.number().min(0),
    raw_output: z.string().optional(),
    dest_address: z.string().optional(),
    ...failureFields,
  })
  .superRefine(successMatchesError);

export const PortableHostResultSchema = z.object({
  host: z.string(),
  ports: z.array(z.number().int()),
  dns: PortableDnsSchema.optional(),
  icmp: PortableIcmpSchema.optional(),
  tcp: z.record(PortableTcpSchema).default({}),
  http: z.record(PortableHttpSchema).default({}),
  ssl: z.record(PortableSslSchema).default({}),
  duration_ms: z.number().nullable(),
  error: z.string().optional(),
  port: z.number().int().optional(),
  tcp_single: PortableTcpSchema.optional(),
  http_single: PortableHttpSchema.optional(),
  ssl_single: PortableSslSchema.optional(),
});

export const PortableMultiHostReportSchema = z.object({
  scan_timestamp: z.string(),
  total_hosts: z.number().int(),
  successful_hosts: z.number().int(),
  total_duration_ms: z.number(),
  results: z.record(PortableHostResultSchema),
});

export type PortableFamily = z.infer<typeof PortableFamilySchema>;
export type PortableDns = z.infer<typeof PortableDnsSchema>;
export type PortableTcp = z.infer<typeof PortableTcpSchema>;
export type PortableHttp = z.infer<typeof PortableHttpSchema>;
export type PortableCertificate = z.infer<typeof PortableCertificateSchema>;
export type PortableSsl = z.infer<typeof PortableSslSchema>;
export type PortableIcmp = z.infer<typeof PortableIcmpSchema>;
export type PortableHostResult = z.infer<typeof PortableHostResultSchema>;
export type PortableHostResultInput = z.input<typeof PortableHostResultSchema>;
export type PortableMultiHostReport = z.infer<typeof PortableMultiHostReportSchema>;
