import { formatResponseTime } from '../utils/format.js';
import type { HostMonitorState, MonitorSummary } from '../types/monitor.js';
import type { HostScanResult } from '../types/scan.js';

export function escapeHtml(text: string | null | undefined): string {
  if (!text) return '';
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function getCSS(): string {
  return `
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: 'Courier New', monospace; background: #0d1117; color: #c9d1d9; line-height: 1.5; }
    .container { max-width: 1100px; margin: 0 auto; padding: 24px; }
    h1 { font-size: 1.6em; color: #58a6ff; margin-bottom: 16px; }
    .stats { display: flex; gap: 16px; margin-bottom: 24px; }
    .stat { background: #161b22; border: 1px solid #30363d; border-radius: 6px; padding: 12px 18px; }
    .stat-number { display: block; font-size: 1.4em; color: #f0f6fc; }
    .stat-label { font-size: 0.8em; color: #8b949e; }
    table { width: 100%; border-collapse: collapse; background: #161b22; }
    th, td { text-align: left; padding: 8px 10px; border-bottom: 1px solid #30363d; }
    th { color: #8b949e; font-weight: normal; }
    .up { color: #3fb950; }
    .down { color: #f85149; }
    .pending { color: #8b949e; }
    a { color: #58a6ff; text-decoration: none; }
    .footer { margin-top: 16px; font-size: 0.8em; color: #8b949e; }
  `;
}

function openPorts(result: HostScanResult): string {
  const open = [...result.tcp.values()].filter((tcp) => tcp.success).map((tcp) => tcp.port);
  return open.length > 0 ? open.join(', ') : '-';
}

function renderHostRow(state: HostMonitorState, healthy: boolean | null, uptimePercent: number): string {
  const latest = state.latest;
  const statusClass = healthy === null ? 'pending' : healthy ? 'up' : 'down';
  const statusText = healthy === null ? 'PENDING' : healthy ? 'UP' : 'DOWN';
  const dns = latest?.dns ? (latest.dns.success ? latest.dns.ipv4.addresses.concat(latest.dns.ipv6.addresses).join(', ') : 'failed') : '-';
  const icmp = latest?.icmp ? (latest.icmp.success ? formatResponseTime(latest.icmp.responseTimeMs) : 'no reply') : '-';

  return `
        <tr>
          <td><a href="/api/hosts/${encodeURIComponent(state.key)}">${escapeHtml(state.key)}</a></td>
          <td class="${statusClass}">${statusText}</td>
          <td>${escapeHtml(dns)}</td>
          <td>${latest ? escapeHtml(openPorts(latest)) : '-'}</td>
          <td>${escapeHtml(icmp)}</td>
          <td>${uptimePercent.toFixed(1)}% (${state.successfulCount}/${state.totalCount})</td>
        </tr>`;
}

export interface DashboardHost {
  state: HostMonitorState;
  healthy: boolean | null;
  uptimePercent: number;
}

/** Monitor dashboard; the page reloads itself every `refreshSeconds` */
export function getDashboardHTML(summary: MonitorSummary, hosts: readonly DashboardHost[], refreshSeconds: number): string {
  const rows = hosts.map((host) => renderHostRow(host.state, host.healthy, host.uptimePercent)).join('');

  return `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <meta http-equiv="refresh" content="${refreshSeconds}">
  <title>netprobe monitor</title>
  <style>${getCSS()}</style>
</head>
<body>
  <div class="container">
    <h1>netprobe monitor</h1>

    <div class="stats">
      <div class="stat">
        <span class="stat-number">${summary.iterations}</span>
        <span class="stat-label">Iterations</span>
      </div>
      <div class="stat">
        <span class="stat-number">${summary.successfulIterations}</span>
        <span class="stat-label">Healthy iterations</span>
      </div>
      <div class="stat">
        <span class="stat-number">${summary.uptimePercent.toFixed(1)}%</span>
        <span class="stat-label">Uptime</span>
      </div>
      <div class="stat">
        <span class="stat-number">${hosts.length}</span>
        <span class="stat-label">Hosts</span>
      </div>
    </div>

    <table>
      <thead>
        <tr><th>Host</th><th>Status</th><th>DNS</th><th>Open ports</th><th>ICMP</th><th>Uptime</th></tr>
      </thead>
      <tbody>${rows}
      </tbody>
    </table>

    <div class="footer">Monitoring since ${escapeHtml(summary.startedAt)}</div>
  </div>
</body>
</html>`;
}
