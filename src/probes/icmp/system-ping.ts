import { spawn } from 'child_process';
import { errorMessage } from '../../errors.js';
import { elapsedSince } from '../../utils/format.js';
import { parsePingRtt } from './ping-output.js';
import type { IcmpResult, PingStrategy, ProbeContext, ProbeErrorKind } from '../../types/probes.js';

export interface CommandOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  /** The process is killed when this elapses */
  killAfterMs: number;
  signal: AbortSignal;
}

export type CommandRunner = (command: string, args: readonly string[], options: CommandOptions) => Promise<CommandOutcome>;

// Extra time the ping binary gets beyond its own -W deadline
const KILL_GRACE_MS = 2000;

const UNKNOWN_HOST_PATTERN = /unknown host|not known|could not find host|cannot resolve/i;

export const spawnCommand: CommandRunner = (command, args, { killAfterMs, signal }) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const kill = (): void => {
      child.kill('SIGKILL');
    };
    const timer = setTimeout(() => {
      timedOut = true;
      kill();
    }, killAfterMs);

    const cleanup = (): boolean => {
      if (settled) return false;
      settled = true;
      clearTimeout(timer);
      signal.removeEventListener('abort', kill);
      return true;
    };

    signal.addEventListener('abort', kill, { once: true });

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.once('error', (error) => {
      if (cleanup()) reject(error);
    });
    child.once('close', (exitCode) => {
      if (cleanup()) resolve({ exitCode, stdout, stderr, timedOut });
    });
  });

export function pingArguments(host: string, timeoutMs: number, platform: NodeJS.Platform): string[] {
  if (platform === 'win32') {
    return ['-n', '1', '-w', String(Math.max(1, Math.round(timeoutMs))), host];
  }
  return ['-c', '1', '-W', String(Math.max(1, Math.ceil(timeoutMs / 1000))), host];
}

export interface SystemPingOptions {
  platform?: NodeJS.Platform | undefined;
  runner?: CommandRunner | undefined;
  command?: string | undefined;
}

/** Echo request through the operating system's `ping` binary */
export class SystemPing implements PingStrategy {
  readonly method = 'system_command' as const;
  private readonly platform: NodeJS.Platform;
  private readonly runner: CommandRunner;
  private readonly command: string;

  constructor(options: SystemPingOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.runner = options.runner ?? spawnCommand;
    this.command = options.command ?? 'ping';
  }

  private failure(host: string, start: number, error: string, errorKind: ProbeErrorKind): IcmpResult {
    return { success: false, host, method: this.method, responseTimeMs: elapsedSince(start), error, errorKind };
  }

  async attempt(host: string, ctx: ProbeContext): Promise<IcmpResult> {
    const start = performance.now();

    let outcome: CommandOutcome;
    try {
      outcome = await this.runner(this.command, pingArguments(host, ctx.timeoutMs, this.platform), {
        killAfterMs: ctx.timeoutMs + KILL_GRACE_MS,
        signal: ctx.signal,
      });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return this.failure(host, start, `${this.command} command not available`, 'subprocess_unavailable');
      }
      return this.failure(host, start, errorMessage(error), 'unexpected');
    }

    if (outcome.timedOut || ctx.signal.aborted) {
      return this.failure(host, start, `Ping timeout after ${Math.ceil(ctx.timeoutMs / 1000)}s`, 'connection_timeout');
    }

    if (outcome.exitCode === 0) {
      const output = outcome.stdout.trim();
      return {
        success: true,
        host,
        method: this.method,
        responseTimeMs: parsePingRtt(output) ?? elapsedSince(start),
        rawOutput: output,
      };
    }

    const message = outcome.stderr.trim() || 'Ping failed';
    const kind: ProbeErrorKind = UNKNOWN_HOST_PATTERN.test(message) ? 'dns_resolution' : 'connection_timeout';
    return this.failure(host, start, message, kind);
  }
}
