import type { Logger } from 'winston';
import { probeDns, systemResolverFactory, type ResolverFactory } from './dns-probe.js';
import { HttpProbe, type HttpProbeOptions } from './http-probe.js';
import { createIcmpProbe, type IcmpProbe } from './icmp/icmp-probe.js';
import type { IcmpSocketFactory } from './icmp/raw-socket-ping.js';
import { probeTcp } from './tcp-probe.js';
import { probeTls } from './tls-probe.js';
import type { ProbeSet } from '../types/scan.js';

export interface ProbeSetOptions {
  timeoutSeconds?: number | undefined;
  resolverFactory?: ResolverFactory | undefined;
  http?: HttpProbeOptions | undefined;
  icmp?: IcmpProbe | undefined;
  icmpSocketFactory?: IcmpSocketFactory | undefined;
}

export interface NetworkProbeSet extends ProbeSet {
  readonly httpProbe: HttpProbe;
  readonly icmpProbe: IcmpProbe;
  close(): void;
}

/** Wires the network probes for one scan run */
export function createProbeSet(options: ProbeSetOptions, logger: Logger): NetworkProbeSet {
  const resolverFactory = options.resolverFactory ?? systemResolverFactory;
  const httpProbe = new HttpProbe(options.http);
  const icmpProbe =
    options.icmp ??
    createIcmpProbe({ timeoutMs: (options.timeoutSeconds ?? 5) * 1000, socketFactory: options.icmpSocketFactory });

  return {
    httpProbe,
    icmpProbe,

    async dns(host, ctx) {
      const result = await probeDns(host, ctx, resolverFactory);
      logger.debug('DNS probe finished', { host, success: result.success });
      return result;
    },

    async tcp(host, port, ctx) {
      const result = await probeTcp(host, port, ctx);
      logger.debug('TCP probe finished', { host, port, status: result.status });
      return result;
    },

    async http(host, port, ctx) {
      const result = await httpProbe.probe(host, port, ctx);
      logger.debug('HTTP probe finished', {
        host,
        port,
        status: result.success ? result.statusCode : result.errorKind,
      });
      return result;
    },

    async tls(host, port, ctx) {
      const result = await probeTls(host, port, ctx);
      logger.debug('TLS probe finished', {
        host,
        port,
        grade: result.success ? result.securityScore.grade : result.errorKind,
      });
      return result;
    },

    async icmp(host, ctx) {
      const result = await icmpProbe.probe(host, ctx);
      logger.debug('ICMP probe finished', { host, method: result.method, success: result.success });
      return result;
    },

    close() {
      httpProbe.destroy();
    },
  };
}
