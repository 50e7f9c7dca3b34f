import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { HostResultBuilder, degradedResult, isHostReachable, parsePortableResult, singlePort, toPortable } from './host-result.js';
import { dnsResult, httpResult, icmpResult, tcpResult, tlsResult } from '../testing/fixtures.js';
import type { HostScanResult } from '../types/scan.js';

function singlePortResult(): HostScanResult {
  const builder = new HostResultBuilder({ host: 'web.test', ports: [443] }, 1000);
  builder.setDns(dnsResult('web.test'));
  builder.setIcmp(icmpResult('web.test'));
  builder.setTcp(443, tcpResult('web.test', 443));
  builder.setHttp(443, httpResult('web.test', 443));
  builder.setTls(443, tlsResult('web.test', 443));
  return builder.finish(1250);
}

describe('HostResultBuilder', () => {
  it('orders port maps by the requested ports, not by arrival', () => {
    const builder = new HostResultBuilder({ host: 'web.test', ports: [443, 22, 80] }, 1000);
    builder.setTcp(80, tcpResult('web.test', 80));
    builder.setTcp(22, tcpResult('web.test', 22, false));
    builder.setTcp(443, tcpResult('web.test', 443));

    const result = builder.finish(1300);

    expect([...result.tcp.keys()]).toEqual([443, 22, 80]);
    expect(result.durationMs).toBe(300);
    expect(result.dns).toBeUndefined();
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe('toPortable', () => {
  it('converts a single-port result to snake_case with the single-port extras', () => {
    const portable = toPortable(singlePortResult());

    expect(portable.host).toBe('web.test');
    expect(portable.ports).toEqual([443]);
    expect(portable.duration_ms).toBe(250);
    expect(portable.tcp).toEqual({
      '443': { success: true, host: 'web.test', port: 443, status: 'open', response_time_ms: 1.5 },
    });
    expect(portable.port).toBe(443);
    expect(portable.tcp_single).toEqual(portable.tcp['443']);
    expect(portable.http_single?.status_code).toBe(200);
    expect(portable.http['443']?.security_headers?.score).toBe('1/6');
    expect(portable.ssl['443']?.certificate?.subject_raw).toBe('CN=web.test');
    expect(portable.ssl_single?.security_score).toEqual({ score: 100, grade: 'A+', issues: [] });
    expect(portable.dns?.ipv6).toEqual({
      success: false,
      addresses: [],
      count: 0,
      error: 'queryAaaa ENODATA web.test',
      error_kind: 'dns_resolution',
    });
    expect(portable.icmp).toEqual({ success: true, host: 'web.test', method: 'system_command', response_time_ms: 0.8 });
    expect(portable.error).toBeUndefined();
  });

  it('omits single-port extras when several ports were requested', () => {
    const builder = new HostResultBuilder({ host: 'web.test', ports: [80, 443] }, 0);
    builder.setTcp(80, tcpResult('web.test', 80, false));
    const portable = toPortable(builder.finish(10));

    expect(portable.port).toBeUndefined();
    expect(portable.tcp_single).toBeUndefined();
    expect(portable.tcp['80']).toMatchObject({ success: false, status: 'refused', error: 'Connection refused', error_kind: 'connection_refused' });
    expect(portable.http).toEqual({});
    expect(portable.ssl).toEqual({});
  });

  it('carries the error of a degraded host', () => {
    const portable = toPortable(degradedResult({ host: 'down.test', ports: [80, 443] }, 'host setup failed', 100, 150));

    expect(portable).toEqual({
      host: 'down.test',
      ports: [80, 443],
      tcp: {},
      http: {},
      ssl: {},
      duration_ms: 50,
      error: 'host setup failed',
    });
  });

  it('survives a JSON round trip through the portable schema', () => {
    const portable = toPortable(singlePortResult());
    expect(parsePortableResult(JSON.parse(JSON.stringify(portable)))).toEqual(portable);
  });
});

describe('parsePortableResult', () => {
  it('fills in missing port maps', () => {
    expect(parsePortableResult({ host: 'a.test', ports: [], duration_ms: null })).toEqual({
      host: 'a.test',
      ports: [],
      tcp: {},
      http: {},
      ssl: {},
      duration_ms: null,
    });
  });

  it('rejects a successful record that carries an error', () => {
    const value = {
      host: 'a.test',
      ports: [22],
      duration_ms: 5,
      tcp: { '22': { success: true, host: 'a.test', port: 22, status: 'open', response_time_ms: 1, error: 'stray' } },
    };
    expect(() => parsePortableResult(value)).toThrow(ZodError);
  });

  it('rejects a failed record without an error', () => {
    const value = {
      host: 'a.test',
      ports: [22],
      duration_ms: 5,
      tcp: { '22': { success: false, host: 'a.test', port: 22, status: 'refused', response_time_ms: 1 } },
    };
    expect(() => parsePortableResult(value)).toThrow(ZodError);
  });
});

describe('singlePort', () => {
  it('exposes the per-port view of a single-port scan', () => {
    const view = singlePort(singlePortResult());
    expect(view?.port).toBe(443);
    expect(view?.tcp?.success).toBe(true);
    expect(view?.tls?.success).toBe(true);
  });

  it('is undefined for host-only and multi-port scans', () => {
    expect(singlePort(new HostResultBuilder({ host: 'a.test', ports: [] }).finish())).toBeUndefined();
    expect(singlePort(new HostResultBuilder({ host: 'a.test', ports: [80, 443] }).finish())).toBeUndefined();
  });
});

describe('isHostReachable', () => {
  it('accepts IPv4 resolution or a ping reply', () => {
    const pingOnly = new HostResultBuilder({ host: 'a.test', ports: [] });
    pingOnly.setDns(dnsResult('a.test', []));
    pingOnly.setIcmp(icmpResult('a.test'));
    expect(isHostReachable(pingOnly.finish())).toBe(true);

    const dnsOnly = new HostResultBuilder({ host: 'a.test', ports: [] });
    dnsOnly.setDns(dnsResult('a.test'));
    dnsOnly.setIcmp(icmpResult('a.test', false));
    expect(isHostReachable(dnsOnly.finish())).toBe(true);
  });

  it('rejects hosts where both failed and degraded hosts', () => {
    const neither = new HostResultBuilder({ host: 'a.test', ports: [] });
    neither.setDns(dnsResult('a.test', []));
    neither.setIcmp(icmpResult('a.test', false));
    expect(isHostReachable(neither.finish())).toBe(false);
    expect(isHostReachable(degradedResult({ host: 'a.test', ports: [] }, 'boom', 0))).toBe(false);
  });
});
