import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { getPortDescription } from '../scanner/port-profiles.js';
import { isHostReachable } from '../scanner/host-result.js';
import { formatResponseTime, truncate } from '../utils/format.js';
import type { HostScanResult } from '../types/scan.js';

export interface TableReportOptions {
  colors?: boolean | undefined;
}

type Row = string[];

interface Column {
  title: string;
  width: number;
}

// chalk output has zero-width escape codes, so pad on the plain text
function pad(text: string, width: number, paint?: (value: string) => string): string {
  const padded = text.padEnd(width);
  return paint ? paint(padded) : padded;
}

class TableWriter {
  private readonly lines: string[] = [];

  constructor(private readonly c: ChalkInstance) {}

  heading(text: string): void {
    this.lines.push('', this.c.bold.cyan(text));
  }

  line(text = ''): void {
    this.lines.push(text);
  }

  table(columns: Column[], rows: Array<Array<{ text: string; paint?: (value: string) => string }>>): void {
    this.lines.push(columns.map((column) => pad(column.title, column.width, this.c.bold)).join('  ').trimEnd());
    this.lines.push(columns.map((column) => '-'.repeat(column.width)).join('  '));
    for (const row of rows) {
      this.lines.push(
        row
          .map((cell, index) => pad(truncate(cell.text, columns[index]?.width ?? cell.text.length), columns[index]?.width ?? 0, cell.paint))
          .join('  ')
          .trimEnd()
      );
    }
  }

  toString(): string {
    return this.lines.join('\n');
  }
}

function mark(c: ChalkInstance, ok: boolean | undefined): { text: string; paint: (value: string) => string } {
  if (ok === undefined) return { text: '-', paint: c.gray };
  return ok ? { text: 'OK', paint: c.green } : { text: 'FAIL', paint: c.red };
}

function writeHost(writer: TableWriter, c: ChalkInstance, result: HostScanResult): void {
  const ports = result.ports.length > 0 ? result.ports.join(', ') : 'none';
  writer.heading(`Host: ${result.host}  (ports: ${truncate(ports, 60)})`);

  if (result.error !== undefined) {
    writer.line(c.red(`Scan failed: ${result.error}`));
    return;
  }

  if (result.dns) {
    const dns = result.dns;
    const rows: Row[] = [];
    for (const [label, family] of [['IPv4', dns.ipv4], ['IPv6', dns.ipv6]] as const) {
      rows.push([label, family.success ? 'OK' : 'FAIL', family.success ? family.addresses.join(', ') : family.error]);
    }
    writer.line();
    writer.table(
      [
        { title: 'DNS', width: 6 },
        { title: 'Status', width: 6 },
        { title: 'Addresses', width: 60 },
      ],
      rows.map(([label = '', status = '', detail = '']) => [
        { text: label },
        { text: status, paint: status === 'OK' ? c.green : c.red },
        { text: detail },
      ])
    );
  }

  if (result.ports.length > 0) {
    writer.line();
    writer.table(
      [
        { title: 'Port', width: 6 },
        { title: 'Service', width: 14 },
        { title: 'TCP', width: 9 },
        { title: 'Time', width: 10 },
        { title: 'HTTP', width: 8 },
        { title: 'TLS', width: 6 },
      ],
      result.ports.map((port) => {
        const tcp = result.tcp.get(port);
        const http = result.http.get(port);
        const tls = result.tls.get(port);
        return [
          { text: String(port) },
          { text: getPortDescription(port) },
          tcp ? { text: tcp.status, paint: tcp.success ? c.green : c.red } : { text: '-', paint: c.gray },
          { text: tcp?.success ? formatResponseTime(tcp.responseTimeMs) : '-' },
          http
            ? http.success
              ? { text: String(http.statusCode), paint: http.statusCode < 400 ? c.green : c.yellow }
              : { text: 'FAIL', paint: c.red }
            : { text: '-', paint: c.gray },
          tls
            ? tls.success
              ? { text: tls.securityScore.grade, paint: tls.securityScore.score >= 80 ? c.green : c.yellow }
              : { text: 'FAIL', paint: c.red }
            : { text: '-', paint: c.gray },
        ];
      })
    );
  }

  if (result.icmp) {
    const icmp = result.icmp;
    writer.line();
    writer.line(
      icmp.success
        ? `${c.bold('ICMP')}  ${c.green('OK')}  ${formatResponseTime(icmp.responseTimeMs)} (${icmp.method})`
        : `${c.bold('ICMP')}  ${c.red('FAIL')}  ${icmp.error}`
    );
  }

  writer.line(c.gray(`Scan time: ${formatResponseTime(result.durationMs)}`));
}

function writeSummary(writer: TableWriter, c: ChalkInstance, results: readonly HostScanResult[], totalDurationMs: number): void {
  const reachable = results.filter(isHostReachable).length;
  writer.heading(`Summary: ${reachable}/${results.length} hosts reachable`);
  writer.line();
  writer.table(
    [
      { title: 'Host', width: 30 },
      { title: 'DNS', width: 5 },
      { title: 'TCP', width: 5 },
      { title: 'HTTP', width: 5 },
      { title: 'ICMP', width: 5 },
      { title: 'Overall', width: 8 },
    ],
    results.map((result) => {
      const tcp = [...result.tcp.values()];
      const http = [...result.http.values()];
      return [
        { text: result.host },
        mark(c, result.dns?.success),
        mark(c, tcp.length > 0 ? tcp.some((entry) => entry.success) : undefined),
        mark(c, http.length > 0 ? http.some((entry) => entry.success) : undefined),
        mark(c, result.icmp?.success),
        isHostReachable(result) ? { text: 'UP', paint: c.green } : { text: 'DOWN', paint: c.red },
      ];
    })
  );
  writer.line();
  writer.line(c.gray(`Total scan time: ${formatResponseTime(totalDurationMs)}`));
}

/** Human-readable report for the terminal */
export function renderTable(
  results: readonly HostScanResult[],
  totalDurationMs: number,
  options: TableReportOptions = {}
): string {
  const c = new Chalk({ level: options.colors === false ? 0 : chalk.level });
  const writer = new TableWriter(c);

  for (const result of results) {
    writeHost(writer, c, result);
  }
  if (results.length > 1) {
    writeSummary(writer, c, results, totalDurationMs);
  }
  return writer.toString().replace(/^\n/, '');
}
