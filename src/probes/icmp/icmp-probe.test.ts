import { describe, expect, it, vi } from 'vitest';
import { IcmpProbe } from './icmp-probe.js';
import { RawSocketPing, type IcmpSocket } from './raw-socket-ping.js';
import { SystemPing, pingArguments, type CommandOutcome, type CommandRunner } from './system-ping.js';
import type { IcmpResult, PingStrategy, ProbeContext } from '../../types/probes.js';

function context(timeoutMs = 1000): ProbeContext {
  return { timeoutMs, signal: new AbortController().signal };
}

function outcome(overrides: Partial<CommandOutcome>): CommandOutcome {
  return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...overrides };
}

function runnerReturning(result: CommandOutcome): CommandRunner {
  return vi.fn<CommandRunner>(() => Promise.resolve(result));
}

function replyPacket(identifier: number, type = 0): Buffer {
  const packet = Buffer.alloc(28);
  packet.writeUInt8(0x45, 0);
  packet.writeUInt8(type, 20);
  packet.writeUInt16BE(identifier, 24);
  return packet;
}

class FakeSocket implements IcmpSocket {
  readonly sent: Array<{ packet: Buffer; address: string }> = [];
  closed = false;

  constructor(private readonly replies: Array<Buffer | null>) {}

  send(packet: Buffer, address: string): Promise<void> {
    this.sent.push({ packet, address });
    return Promise.resolve();
  }

  receive(): Promise<Buffer | null> {
    return Promise.resolve(this.replies.shift() ?? null);
  }

  close(): void {
    this.closed = true;
  }
}

class ScriptedStrategy implements PingStrategy {
  readonly method = 'system_command' as const;
  calls = 0;

  constructor(private readonly rtts: Array<number | null>) {}

  attempt(host: string): Promise<IcmpResult> {
    const rtt = this.rtts[this.calls++] ?? null;
    if (rtt === null) {
      return Promise.resolve({
        success: false,
        host,
        method: this.method,
        responseTimeMs: 5,
        error: 'Request timed out',
        errorKind: 'connection_timeout',
      });
    }
    return Promise.resolve({ success: true, host, method: this.method, responseTimeMs: rtt });
  }
}

describe('pingArguments', () => {
  it('uses -c/-W seconds on Unix-like systems', () => {
    expect(pingArguments('example.test', 2500, 'linux')).toEqual(['-c', '1', '-W', '3', 'example.test']);
  });

  it('uses -n/-w milliseconds on Windows', () => {
    expect(pingArguments('example.test', 2500, 'win32')).toEqual(['-n', '1', '-w', '2500', 'example.test']);
  });
});

describe('SystemPing', () => {
  it('reports the parsed round-trip time on success', async () => {
    const runner = runnerReturning(outcome({ stdout: '64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=12.3 ms\n' }));
    const ping = new SystemPing({ runner, platform: 'linux' });

    const result = await ping.attempt('10.0.0.1', context(2000));

    expect(result).toEqual({
      success: true,
      host: '10.0.0.1',
      method: 'system_command',
      responseTimeMs: 12.3,
      rawOutput: '64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=12.3 ms',
    });
    expect(runner).toHaveBeenCalledWith('ping', ['-c', '1', '-W', '2', '10.0.0.1'], expect.objectContaining({ killAfterMs: 4000 }));
  });

  it('reports stderr on a non-zero exit', async () => {
    const ping = new SystemPing({ runner: runnerReturning(outcome({ exitCode: 1, stderr: 'network unreachable\n' })) });
    const result = await ping.attempt('10.0.0.1', context());

    expect(result).toMatchObject({ success: false, method: 'system_command', error: 'network unreachable', errorKind: 'connection_timeout' });
  });

  it('falls back to a generic message when stderr is empty', async () => {
    const ping = new SystemPing({ runner: runnerReturning(outcome({ exitCode: 1 })) });
    await expect(ping.attempt('10.0.0.1', context())).resolves.toMatchObject({ success: false, error: 'Ping failed' });
  });

  it('classifies unknown hosts as resolution failures', async () => {
    const ping = new SystemPing({ runner: runnerReturning(outcome({ exitCode: 2, stderr: 'ping: nowhere.test: Name or service not known' })) });
    await expect(ping.attempt('nowhere.test', context())).resolves.toMatchObject({ errorKind: 'dns_resolution' });
  });

  it('reports a timeout when the process had to be killed', async () => {
    const ping = new SystemPing({ runner: runnerReturning(outcome({ exitCode: null, timedOut: true })) });
    await expect(ping.attempt('10.0.0.1', context(3000))).resolves.toMatchObject({
      success: false,
      error: 'Ping timeout after 3s',
      errorKind: 'connection_timeout',
    });
  });

  it('reports a missing ping binary', async () => {
    const runner: CommandRunner = () => Promise.reject(Object.assign(new Error('spawn ping ENOENT'), { code: 'ENOENT' }));
    const ping = new SystemPing({ runner });

    await expect(ping.attempt('10.0.0.1', context())).resolves.toMatchObject({
      success: false,
      error: 'ping command not available',
      errorKind: 'subprocess_unavailable',
    });
  });
});

describe('RawSocketPing', () => {
  const resolveAddress = (): Promise<string> => Promise.resolve('192.0.2.10');

  it('requires root privileges', async () => {
    const ping = new RawSocketPing({ isPrivileged: () => false, socketFactory: () => new FakeSocket([]) });
    await expect(ping.attempt('192.0.2.10', context())).resolves.toMatchObject({
      success: false,
      method: 'raw_socket',
      error: 'Raw socket ping requires root privileges',
    });
  });

  it('needs a socket binding', async () => {
    const ping = new RawSocketPing({ isPrivileged: () => true });
    await expect(ping.attempt('192.0.2.10', context())).resolves.toMatchObject({
      error: 'No raw ICMP socket binding available',
      errorKind: 'subprocess_unavailable',
    });
  });

  it('skips unrelated packets until its own echo reply arrives', async () => {
    const socket = new FakeSocket([replyPacket(0x0bad), replyPacket(0x0042, 3), replyPacket(0x0042)]);
    const ping = new RawSocketPing({ isPrivileged: () => true, socketFactory: () => socket, resolveAddress, identifier: 0x0042 });

    const result = await ping.attempt('gateway.test', context());

    expect(result).toMatchObject({ success: true, method: 'raw_socket', destAddress: '192.0.2.10' });
    expect(socket.sent).toHaveLength(1);
    expect(socket.sent[0]?.address).toBe('192.0.2.10');
    expect(socket.sent[0]?.packet.readUInt16BE(4)).toBe(0x0042);
    expect(socket.closed).toBe(true);
  });

  it('reports a missing reply', async () => {
    const socket = new FakeSocket([null]);
    const ping = new RawSocketPing({ isPrivileged: () => true, socketFactory: () => socket, resolveAddress, identifier: 1 });

    await expect(ping.attempt('gateway.test', context())).resolves.toMatchObject({
      success: false,
      error: 'No ICMP reply received',
      errorKind: 'connection_timeout',
    });
    expect(socket.closed).toBe(true);
  });

  it('wraps resolution and socket errors', async () => {
    const ping = new RawSocketPing({
      isPrivileged: () => true,
      socketFactory: () => new FakeSocket([]),
      resolveAddress: () => Promise.reject(new Error('getaddrinfo ENOTFOUND gateway.test')),
    });

    await expect(ping.attempt('gateway.test', context())).resolves.toMatchObject({
      error: 'Raw socket ping failed: getaddrinfo ENOTFOUND gateway.test',
      errorKind: 'unexpected',
    });
  });
});

describe('IcmpProbe', () => {
  it('returns the first successful strategy', async () => {
    const failing = new ScriptedStrategy([null]);
    const succeeding = new ScriptedStrategy([4]);
    const probe = new IcmpProbe([failing, succeeding]);

    await expect(probe.probe('10.0.0.1', context())).resolves.toEqual({
      success: true,
      host: '10.0.0.1',
      method: 'system_command',
      responseTimeMs: 4,
    });
    expect(failing.calls).toBe(1);
  });

  it('reports the last failure with method none when every strategy fails', async () => {
    const probe = new IcmpProbe([
      new SystemPing({ runner: runnerReturning(outcome({ exitCode: 1, stderr: 'first' })) }),
      new RawSocketPing({ isPrivileged: () => false }),
    ]);

    await expect(probe.probe('10.0.0.1', context())).resolves.toMatchObject({
      success: false,
      method: 'none',
      error: 'Raw socket ping requires root privileges',
      errorKind: 'subprocess_unavailable',
    });
  });

  it('reports a generic failure when there are no strategies', async () => {
    await expect(new IcmpProbe([]).probe('10.0.0.1', context())).resolves.toMatchObject({
      success: false,
      method: 'none',
      error: 'All ping methods failed',
    });
  });

  it('turns a throwing strategy into a failure', async () => {
    const broken: PingStrategy = {
      method: 'raw_socket',
      attempt: () => Promise.reject(new Error('binding crashed')),
    };
    await expect(new IcmpProbe([broken]).probe('10.0.0.1', context())).resolves.toMatchObject({
      success: false,
      method: 'none',
      error: 'binding crashed',
      errorKind: 'unexpected',
    });
  });

  it('summarises loss and round-trip times over several pings', async () => {
    const probe = new IcmpProbe([new ScriptedStrategy([10, null, 30, null])]);
    const result = await probe.continuousPing('10.0.0.1', 4, 0);

    expect(result.packetsSent).toBe(4);
    expect(result.packetsReceived).toBe(2);
    expect(result.packetLossPercent).toBe(50);
    expect(result.responseTimes).toEqual({ minMs: 10, maxMs: 30, avgMs: 20 });
    expect(result.individualResults).toHaveLength(4);
  });

  it('reports zero times when nothing answers', async () => {
    const probe = new IcmpProbe([new ScriptedStrategy([null, null])]);
    const result = await probe.continuousPing('10.0.0.1', 2, 0);

    expect(result.packetLossPercent).toBe(100);
    expect(result.responseTimes).toEqual({ minMs: 0, maxMs: 0, avgMs: 0 });
  });
});
