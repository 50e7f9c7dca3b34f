import { describe, expect, it, vi } from 'vitest';
import { probeDns, reverseLookup, type DnsResolverLike, type ResolverFactory } from './dns-probe.js';
import { probeContext } from '../testing/servers.js';

function resolver(overrides: Partial<DnsResolverLike>): DnsResolverLike {
  return {
    resolve4: () => Promise.reject(new Error('queryA ENODATA')),
    resolve6: () => Promise.reject(new Error('queryAaaa ENODATA')),
    reverse: () => Promise.reject(new Error('getHostByAddr ENOTFOUND')),
    cancel: () => undefined,
    ...overrides,
  };
}

function factoryFor(instance: DnsResolverLike): ResolverFactory {
  return () => instance;
}

describe('probeDns', () => {
  it('resolves both families independently and de-duplicates addresses', async () => {
    const factory = factoryFor(
      resolver({
        resolve4: () => Promise.resolve(['192.0.2.1', '192.0.2.1', '192.0.2.2']),
        resolve6: () => Promise.reject(new Error('queryAaaa ENODATA www.example.test')),
      })
    );

    const result = await probeDns('www.example.test', probeContext(), factory);

    expect(result.success).toBe(true);
    expect(result.hostname).toBe('www.example.test');
    expect(result.ipv4).toEqual({ success: true, addresses: ['192.0.2.1', '192.0.2.2'], count: 2 });
    expect(result.ipv6).toEqual({
      success: false,
      error: 'queryAaaa ENODATA www.example.test',
      errorKind: 'dns_resolution',
      addresses: [],
      count: 0,
    });
  });

  it('succeeds on IPv6 alone', async () => {
    const factory = factoryFor(resolver({ resolve6: () => Promise.resolve(['2001:db8::1']) }));
    const result = await probeDns('v6only.example.test', probeContext(), factory);

    expect(result.success).toBe(true);
    expect(result.ipv4.success).toBe(false);
    expect(result.ipv6).toEqual({ success: true, addresses: ['2001:db8::1'], count: 1 });
  });

  it('fails with the IPv4 error when neither family resolves', async () => {
    const factory = factoryFor(
      resolver({
        resolve4: () => Promise.reject(new Error('queryA ENOTFOUND nowhere.test')),
        resolve6: () => Promise.reject(new Error('queryAaaa ENOTFOUND nowhere.test')),
      })
    );

    const result = await probeDns('nowhere.test', probeContext(), factory);

    expect(result).toMatchObject({
      success: false,
      error: 'queryA ENOTFOUND nowhere.test',
      errorKind: 'dns_resolution',
    });
  });

  it('treats an empty answer as a failure', async () => {
    const factory = factoryFor(resolver({ resolve4: () => Promise.resolve([]) }));
    const result = await probeDns('empty.example.test', probeContext(), factory);

    expect(result.ipv4).toMatchObject({ success: false, error: 'No records found' });
  });

  it('answers IP literals without querying', async () => {
    const createResolver = vi.fn<ResolverFactory>(() => resolver({}));
    const result = await probeDns('192.0.2.7', probeContext(), createResolver);

    expect(createResolver).not.toHaveBeenCalled();
    expect(result.success).toBe(true);
    expect(result.ipv4).toEqual({ success: true, addresses: ['192.0.2.7'], count: 1 });
    expect(result.ipv6).toMatchObject({ success: false, error: 'Not applicable: 192.0.2.7 is an IPv4 address' });
  });

  it('cancels outstanding queries when the probe is aborted', async () => {
    let rejectPending: (error: Error) => void = () => undefined;
    const pending = new Promise<string[]>((_resolve, reject) => {
      rejectPending = reject;
    });
    const cancel = vi.fn(() => rejectPending(new Error('queryA ECANCELLED slow.example.test')));
    const factory = factoryFor(resolver({ resolve4: () => pending, resolve6: () => pending, cancel }));
    const controller = new AbortController();

    const probing = probeDns('slow.example.test', probeContext(5000, controller.signal), factory);
    controller.abort();
    const result = await probing;

    expect(cancel).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ success: false, error: 'queryA ECANCELLED slow.example.test' });
  });

  it('passes the probe timeout to the resolver factory', async () => {
    const createResolver = vi.fn<ResolverFactory>(() => resolver({ resolve4: () => Promise.resolve(['192.0.2.1']) }));
    await probeDns('www.example.test', probeContext(1500), createResolver);

    expect(createResolver).toHaveBeenCalledWith(1500);
  });
});

describe('reverseLookup', () => {
  it('returns de-duplicated PTR names', async () => {
    const factory = factoryFor(resolver({ reverse: () => Promise.resolve(['host.example.test', 'host.example.test']) }));

    await expect(reverseLookup('192.0.2.1', 1000, factory)).resolves.toEqual({
      ipAddress: '192.0.2.1',
      success: true,
      hostnames: ['host.example.test'],
    });
  });

  it('rejects input that is not an IP address', async () => {
    await expect(reverseLookup('example.test', 1000, factoryFor(resolver({})))).resolves.toEqual({
      ipAddress: 'example.test',
      success: false,
      hostnames: [],
      error: 'Not an IP address: example.test',
    });
  });

  it('reports lookup errors', async () => {
    await expect(reverseLookup('192.0.2.1', 1000, factoryFor(resolver({})))).resolves.toMatchObject({
      success: false,
      error: 'getHostByAddr ENOTFOUND',
    });
  });
});
