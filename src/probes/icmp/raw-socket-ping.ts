import { lookup } from 'dns/promises';
import { errorMessage } from '../../errors.js';
import { elapsedSince } from '../../utils/format.js';
import { buildEchoRequest, isEchoReply } from './icmp-packet.js';
import type { IcmpResult, PingStrategy, ProbeContext, ProbeErrorKind } from '../../types/probes.js';

/**
 * A raw IPv4 ICMP socket. Node has no built-in raw sockets, so the binding
 * comes from the caller (a native add-on or a test double).
 */
export interface IcmpSocket {
  send(packet: Buffer, address: string): Promise<void>;
  /** Next datagram including its IPv4 header, or null when `timeoutMs` passes */
  receive(timeoutMs: number, signal: AbortSignal): Promise<Buffer | null>;
  close(): void;
}

export type IcmpSocketFactory = () => IcmpSocket;

export interface RawSocketPingOptions {
  socketFactory?: IcmpSocketFactory | undefined;
  isPrivileged?: (() => boolean) | undefined;
  resolveAddress?: ((host: string) => Promise<string>) | undefined;
  identifier?: number | undefined;
}

function runningAsRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

async function resolveIpv4(host: string): Promise<string> {
  const { address } = await lookup(host, { family: 4 });
  return address;
}

export class RawSocketPing implements PingStrategy {
  readonly method = 'raw_socket' as const;
  private readonly socketFactory: IcmpSocketFactory | undefined;
  private readonly isPrivileged: () => boolean;
  private readonly resolveAddress: (host: string) => Promise<string>;
  private readonly identifier: number;
  private sequence = 0;

  constructor(options: RawSocketPingOptions = {}) {
    this.socketFactory = options.socketFactory;
    this.isPrivileged = options.isPrivileged ?? runningAsRoot;
    this.resolveAddress = options.resolveAddress ?? resolveIpv4;
    this.identifier = (options.identifier ?? process.pid) & 0xffff;
  }

  private failure(host: string, start: number, error: string, errorKind: ProbeErrorKind): IcmpResult {
    return { success: false, host, method: this.method, responseTimeMs: elapsedSince(start), error, errorKind };
  }

  async attempt(host: string, ctx: ProbeContext): Promise<IcmpResult> {
    const start = performance.now();

    if (!this.isPrivileged()) {
      return this.failure(host, start, 'Raw socket ping requires root privileges', 'subprocess_unavailable');
    }
    if (!this.socketFactory) {
      return this.failure(host, start, 'No raw ICMP socket binding available', 'subprocess_unavailable');
    }

    let socket: IcmpSocket | undefined;
    try {
      const destAddress = await this.resolveAddress(host);
      socket = this.socketFactory();

      this.sequence = (this.sequence + 1) & 0xffff;
      const sentAt = performance.now();
      await socket.send(buildEchoRequest(this.identifier, this.sequence), destAddress);

      const deadline = sentAt + ctx.timeoutMs;
      while (!ctx.signal.aborted) {
        const remaining = deadline - performance.now();
        if (remaining <= 0) break;

        const packet = await socket.receive(remaining, ctx.signal);
        if (packet === null) break;
        if (isEchoReply(packet, this.identifier)) {
          return { success: true, host, method: this.method, responseTimeMs: elapsedSince(sentAt), destAddress };
        }
      }
      return this.failure(host, start, 'No ICMP reply received', 'connection_timeout');
    } catch (error) {
      return this.failure(host, start, `Raw socket ping failed: ${errorMessage(error)}`, 'unexpected');
    } finally {
      socket?.close();
    }
  }
}
