import net from 'net';
import { elapsedSince } from '../utils/format.js';
import type { ProbeContext, ProbeErrorKind, TcpResult, TcpStatus } from '../types/probes.js';

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME']);

type FailureStatus = Exclude<TcpStatus, 'open'>;

function classify(code: string | undefined): { status: FailureStatus; errorKind: ProbeErrorKind } {
  if (code === 'ECONNREFUSED') return { status: 'refused', errorKind: 'connection_refused' };
  if (code === 'ETIMEDOUT') return { status: 'timeout', errorKind: 'connection_timeout' };
  if (code !== undefined && DNS_ERROR_CODES.has(code)) return { status: 'dns_error', errorKind: 'dns_resolution' };
  return { status: 'error', errorKind: 'unexpected' };
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/** Opens a TCP connection to host:port and closes it straight away */
export function probeTcp(host: string, port: number, ctx: ProbeContext): Promise<TcpResult> {
  const start = performance.now();

  return new Promise((resolve) => {
    const socket = new net.Socket();
    let settled = false;

    const finish = (result: TcpResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      ctx.signal.removeEventListener('abort', onAbort);
      socket.destroy();
      resolve(result);
    };

    const timedOut = (message: string): void => {
      finish({
        success: false,
        host,
        port,
        status: 'timeout',
        error: message,
        errorKind: 'connection_timeout',
        responseTimeMs: elapsedSince(start),
      });
    };

    const onAbort = (): void => timedOut('Probe aborted');
    const timer = setTimeout(() => timedOut(`Connection timeout after ${ctx.timeoutMs}ms`), ctx.timeoutMs);

    if (ctx.signal.aborted) {
      onAbort();
      return;
    }
    ctx.signal.addEventListener('abort', onAbort, { once: true });

    socket.once('connect', () => {
      finish({ success: true, host, port, status: 'open', responseTimeMs: elapsedSince(start) });
    });

    socket.once('error', (error: Error) => {
      const code = errorCode(error);
      const { status, errorKind } = classify(code);
      finish({
        success: false,
        host,
        port,
        status,
        error: status === 'refused' ? 'Connection refused' : error.message || code || 'Connection failed',
        errorKind,
        responseTimeMs: elapsedSince(start),
      });
    });

    socket.connect({ host, port });
  });
}
