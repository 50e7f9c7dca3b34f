import { errorMessage } from '../../errors.js';
import { abortableDelay } from '../../utils/delay.js';
import { RawSocketPing, type IcmpSocketFactory } from './raw-socket-ping.js';
import { SystemPing } from './system-ping.js';
import type {
  ContinuousPingResult,
  IcmpFailure,
  IcmpResult,
  PingStrategy,
  ProbeContext,
} from '../../types/probes.js';

export interface ContinuousPingOptions {
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
}

/**
 * Tries each ping strategy in order. The first success wins; when every
 * strategy fails the last failure is reported with method "none".
 */
export class IcmpProbe {
  private readonly strategies: readonly PingStrategy[];
  private readonly defaultTimeoutMs: number;

  constructor(strategies: readonly PingStrategy[], defaultTimeoutMs = 5000) {
    this.strategies = strategies;
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  async probe(host: string, ctx: ProbeContext): Promise<IcmpResult> {
    let last: IcmpFailure | null = null;

    for (const strategy of this.strategies) {
      let result: IcmpResult;
      try {
        result = await strategy.attempt(host, ctx);
      } catch (error) {
        result = {
          success: false,
          host,
          method: strategy.method,
          responseTimeMs: 0,
          error: errorMessage(error),
          errorKind: 'unexpected',
        };
      }

      if (result.success) return result;
      last = result;
      if (ctx.signal.aborted) break;
    }

    return {
      success: false,
      host,
      method: 'none',
      responseTimeMs: last?.responseTimeMs ?? 0,
      error: last?.error ?? 'All ping methods failed',
      errorKind: last?.errorKind ?? 'unexpected',
    };
  }

  /** Sends `count` pings `interval` seconds apart and summarises loss and RTT */
  async continuousPing(
    host: string,
    count = 4,
    interval = 1,
    options: ContinuousPingOptions = {}
  ): Promise<ContinuousPingResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const individualResults: IcmpResult[] = [];

    for (let i = 0; i < count; i++) {
      const controller = new AbortController();
      const onAbort = (): void => controller.abort();
      options.signal?.addEventListener('abort', onAbort, { once: true });
      try {
        individualResults.push(await this.probe(host, { timeoutMs, signal: controller.signal }));
      } finally {
        options.signal?.removeEventListener('abort', onAbort);
      }

      if (i < count - 1) {
        const slept = await abortableDelay(interval * 1000, options.signal);
        if (!slept) break;
      }
    }

    const times = individualResults.filter((result) => result.success).map((result) => result.responseTimeMs);
    const packetsSent = individualResults.length;
    const packetsReceived = times.length;

    return {
      host,
      packetsSent,
      packetsReceived,
      packetLossPercent: packetsSent === 0 ? 0 : ((packetsSent - packetsReceived) / packetsSent) * 100,
      responseTimes: {
        minMs: packetsReceived > 0 ? Math.min(...times) : 0,
        maxMs: packetsReceived > 0 ? Math.max(...times) : 0,
        avgMs: packetsReceived > 0 ? times.reduce((sum, t) => sum + t, 0) / packetsReceived : 0,
      },
      individualResults,
    };
  }
}

export interface DefaultIcmpProbeOptions {
  timeoutMs?: number | undefined;
  socketFactory?: IcmpSocketFactory | undefined;
}

/** System `ping` first, then a raw socket when a binding and root are available */
export function createIcmpProbe(options: DefaultIcmpProbeOptions = {}): IcmpProbe {
  return new IcmpProbe(
    [new SystemPing(), new RawSocketPing({ socketFactory: options.socketFactory })],
    options.timeoutMs
  );
}
