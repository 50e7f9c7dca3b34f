import type { HostScanResult } from '../types/scan.js';

export const CSV_COLUMNS = [
  'host',
  'port',
  'dns_ipv4_success',
  'dns_ipv6_success',
  'tcp_success',
  'tcp_response_time_ms',
  'http_success',
  'http_status_code',
  'icmp_success',
  'icmp_response_time_ms',
  'total_duration_ms',
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];
type CsvValue = string | number | boolean | null | undefined;
type CsvRow = Record<CsvColumn, CsvValue>;

/** RFC 4180 field quoting */
export function escapeCsvField(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  const text = typeof value === 'number' ? String(Number(value.toFixed(3))) : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function rowsFor(result: HostScanResult): CsvRow[] {
  const shared = {
    host: result.host,
    dns_ipv4_success: result.dns?.ipv4.success,
    dns_ipv6_success: result.dns?.ipv6.success,
    icmp_success: result.icmp?.success,
    icmp_response_time_ms: result.icmp?.success ? result.icmp.responseTimeMs : null,
    total_duration_ms: result.durationMs,
  };

  if (result.ports.length === 0) {
    return [
      {
        ...shared,
        port: null,
        tcp_success: null,
        tcp_response_time_ms: null,
        http_success: null,
        http_status_code: null,
      },
    ];
  }

  return result.ports.map((port) => {
    const tcp = result.tcp.get(port);
    const http = result.http.get(port);
    return {
      ...shared,
      port,
      tcp_success: tcp?.success,
      tcp_response_time_ms: tcp?.success ? tcp.responseTimeMs : null,
      http_success: http?.success,
      http_status_code: http?.success ? http.statusCode : null,
    };
  });
}

/** One row per host and port, header first */
export function renderCsv(results: readonly HostScanResult[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const result of results) {
    for (const row of rowsFor(result)) {
      lines.push(CSV_COLUMNS.map((column) => escapeCsvField(row[column])).join(','));
    }
  }
  return `${lines.join('\r\n')}\r\n`;
}
