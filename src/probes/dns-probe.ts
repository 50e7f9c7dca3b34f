import { Resolver } from 'dns/promises';
import net from 'net';
import { errorMessage } from '../errors.js';
import { elapsedSince } from '../utils/format.js';
import type {
  AddressFamily,
  DnsResult,
  FamilyFailure,
  FamilyResult,
  ProbeContext,
  ReverseLookupResult,
} from '../types/probes.js';

/** The slice of `dns/promises.Resolver` the probe uses */
export interface DnsResolverLike {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
  reverse(ip: string): Promise<string[]>;
  cancel(): void;
}

export type ResolverFactory = (timeoutMs: number) => DnsResolverLike;

export const systemResolverFactory: ResolverFactory = (timeoutMs) =>
  new Resolver({ timeout: Math.max(1, Math.round(timeoutMs)), tries: 1 });

function familyFailure(error: string): FamilyFailure {
  return { success: false, error, errorKind: 'dns_resolution', addresses: [], count: 0 };
}

function familySuccess(addresses: readonly string[]): FamilyResult {
  const unique = [...new Set(addresses)];
  if (unique.length === 0) return familyFailure('No records found');
  return { success: true, addresses: unique, count: unique.length };
}

function literalFamily(host: string, family: AddressFamily): FamilyResult {
  const version = net.isIP(host);
  const wanted = family === 'ipv4' ? 4 : 6;
  if (version === wanted) return familySuccess([host]);
  return familyFailure(`Not applicable: ${host} is an IPv${version} address`);
}

async function resolveFamily(
  resolver: DnsResolverLike,
  hostname: string,
  family: AddressFamily
): Promise<FamilyResult> {
  try {
    const addresses = family === 'ipv4' ? await resolver.resolve4(hostname) : await resolver.resolve6(hostname);
    return familySuccess(addresses);
  } catch (error) {
    return familyFailure(errorMessage(error));
  }
}

/**
 * Resolves A and AAAA records independently. The host counts as resolved when
 * either family answers.
 */
export async function probeDns(
  hostname: string,
  ctx: ProbeContext,
  createResolver: ResolverFactory = systemResolverFactory
): Promise<DnsResult> {
  const start = performance.now();

  let ipv4: FamilyResult;
  let ipv6: FamilyResult;

  if (net.isIP(hostname) !== 0) {
    ipv4 = literalFamily(hostname, 'ipv4');
    ipv6 = literalFamily(hostname, 'ipv6');
  } else {
    let resolver: DnsResolverLike;
    try {
      resolver = createResolver(ctx.timeoutMs);
    } catch (error) {
      const failure = familyFailure(errorMessage(error));
      return {
        hostname,
        success: false,
        error: failure.error,
        errorKind: 'dns_resolution',
        responseTimeMs: elapsedSince(start),
        ipv4: failure,
        ipv6: failure,
      };
    }

    const onAbort = (): void => resolver.cancel();
    ctx.signal.addEventListener('abort', onAbort, { once: true });
    try {
      [ipv4, ipv6] = await Promise.all([
        resolveFamily(resolver, hostname, 'ipv4'),
        resolveFamily(resolver, hostname, 'ipv6'),
      ]);
    } finally {
      ctx.signal.removeEventListener('abort', onAbort);
    }
  }

  const responseTimeMs = elapsedSince(start);

  if (ipv4.success || ipv6.success) {
    return { hostname, success: true, responseTimeMs, ipv4, ipv6 };
  }

  return {
    hostname,
    success: false,
    error: ipv4.error,
    errorKind: 'dns_resolution',
    responseTimeMs,
    ipv4,
    ipv6,
  };
}

export async function reverseLookup(
  ipAddress: string,
  timeoutMs: number,
  createResolver: ResolverFactory = systemResolverFactory
): Promise<ReverseLookupResult> {
  if (net.isIP(ipAddress) === 0) {
    return { ipAddress, success: false, hostnames: [], error: `Not an IP address: ${ipAddress}` };
  }

  try {
    const hostnames = await createResolver(timeoutMs).reverse(ipAddress);
    return { ipAddress, success: true, hostnames: [...new Set(hostnames)] };
  } catch (error) {
    return { ipAddress, success: false, hostnames: [], error: errorMessage(error) };
  }
}
