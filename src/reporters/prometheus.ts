import type { HostScanResult } from '../types/scan.js';

interface MetricFamily {
  name: string;
  help: string;
}

const METRICS = {
  dnsIpv4: { name: 'netprobe_dns_ipv4_success', help: 'IPv4 resolution succeeded (1) or failed (0)' },
  dnsIpv6: { name: 'netprobe_dns_ipv6_success', help: 'IPv6 resolution succeeded (1) or failed (0)' },
  tcp: { name: 'netprobe_tcp_success', help: 'TCP connect succeeded (1) or failed (0)' },
  tcpTime: { name: 'netprobe_tcp_response_time_ms', help: 'TCP connect time in milliseconds' },
  http: { name: 'netprobe_http_success', help: 'HTTP request answered (1) or failed (0)' },
  httpStatus: { name: 'netprobe_http_status_code', help: 'HTTP status code of the probe request' },
  icmp: { name: 'netprobe_icmp_success', help: 'Ping answered (1) or failed (0)' },
  icmpTime: { name: 'netprobe_icmp_response_time_ms', help: 'Ping round-trip time in milliseconds' },
  sslScore: { name: 'netprobe_ssl_score', help: 'Certificate security score (0-100)' },
  sslExpiry: { name: 'netprobe_ssl_days_until_expiry', help: 'Days until the certificate expires' },
} satisfies Record<string, MetricFamily>;

type Labels = Record<string, string | number>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function formatLabels(labels: Labels): string {
  const parts = Object.entries(labels).map(([key, value]) => `${key}="${escapeLabelValue(String(value))}"`);
  return parts.length > 0 ? `{${parts.join(',')}}` : '';
}

function formatValue(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}

/** Prometheus text exposition format, one gauge family per probe signal */
export function renderPrometheus(results: readonly HostScanResult[], timestampMs: number = Date.now()): string {
  const samples = new Map<MetricFamily, string[]>();
  const add = (family: MetricFamily, labels: Labels, value: number): void => {
    const lines = samples.get(family) ?? [];
    lines.push(`${family.name}${formatLabels(labels)} ${formatValue(value)} ${timestampMs}`);
    samples.set(family, lines);
  };

  for (const result of results) {
    const host = { host: result.host };

    if (result.dns) {
      add(METRICS.dnsIpv4, host, Number(result.dns.ipv4.success));
      add(METRICS.dnsIpv6, host, Number(result.dns.ipv6.success));
    }

    for (const [port, tcp] of result.tcp) {
      add(METRICS.tcp, { ...host, port }, Number(tcp.success));
      if (tcp.success) add(METRICS.tcpTime, { ...host, port }, tcp.responseTimeMs);
    }

    for (const [port, http] of result.http) {
      add(METRICS.http, { ...host, port }, Number(http.success));
      if (http.success) add(METRICS.httpStatus, { ...host, port }, http.statusCode);
    }

    for (const [port, tls] of result.tls) {
      if (!tls.success) continue;
      add(METRICS.sslScore, { ...host, port }, tls.securityScore.score);
      add(METRICS.sslExpiry, { ...host, port }, tls.certificate.daysUntilExpiry);
    }

    if (result.icmp) {
      add(METRICS.icmp, host, Number(result.icmp.success));
      if (result.icmp.success) add(METRICS.icmpTime, host, result.icmp.responseTimeMs);
    }
  }

  const output: string[] = [];
  for (const family of Object.values(METRICS)) {
    const lines = samples.get(family);
    if (!lines) continue;
    output.push(`# HELP ${family.name} ${family.help}`, `# TYPE ${family.name} gauge`, ...lines);
  }
  return output.length > 0 ? `${output.join('\n')}\n` : '';
}
