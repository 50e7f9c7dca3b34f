import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { configFromEnv, loadConfig, readConfigFile } from './index.js';
import { ConfigurationError } from '../errors.js';

describe('configFromEnv', () => {
  it('reads NETPROBE_* variables and ignores the rest', () => {
    expect(
      configFromEnv({
        NETPROBE_TIMEOUT: '2.5',
        NETPROBE_MAX_CONCURRENT: '20',
        NETPROBE_SSL_CHECK: 'yes',
        NETPROBE_LOG_LEVEL: 'debug',
        HOME: '/home/probe',
      })
    ).toEqual({ timeoutSeconds: 2.5, maxConcurrent: 20, sslCheck: true, logLevel: 'debug' });
  });

  it('accepts 0 and false as a disabled TLS check', () => {
    expect(configFromEnv({ NETPROBE_SSL_CHECK: '0' })).toEqual({ sslCheck: false });
    expect(configFromEnv({ NETPROBE_SSL_CHECK: 'false' })).toEqual({ sslCheck: false });
  });

  it('rejects malformed values', () => {
    expect(() => configFromEnv({ NETPROBE_TIMEOUT: 'soon' })).toThrow(/Invalid environment configuration: NETPROBE_TIMEOUT/);
    expect(() => configFromEnv({ NETPROBE_SSL_CHECK: 'maybe' })).toThrow(ConfigurationError);
  });
});

describe('config files', () => {
  let dir = '';

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'netprobe-config-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(name: string, content: string): Promise<string> {
    const file = path.join(dir, name);
    await writeFile(file, content, 'utf8');
    return file;
  }

  it('uses defaults when nothing is set', async () => {
    await expect(loadConfig({ env: {} })).resolves.toEqual({
      config: {
        timeoutSeconds: 5,
        maxConcurrent: 50,
        sslCheck: false,
        monitorIntervalSeconds: 30,
        historyLimit: 100,
        logLevel: 'info',
      },
      targets: [],
    });
  });

  it('layers environment, file and overrides, later sources winning', async () => {
    const file = await writeConfig(
      'layers.json',
      JSON.stringify({
        timeoutSeconds: 3,
        maxConcurrent: 10,
        targets: [{ name: 'web', host: 'a.test', ports: [443] }, { host: 'b.test' }],
      })
    );

    const { config, targets } = await loadConfig({
      env: { NETPROBE_TIMEOUT: '2.5', NETPROBE_HISTORY_LIMIT: '5' },
      configFile: file,
      overrides: { timeoutSeconds: 1, maxConcurrent: undefined },
    });

    expect(config.timeoutSeconds).toBe(1);
    expect(config.maxConcurrent).toBe(10);
    expect(config.historyLimit).toBe(5);
    expect(targets).toEqual([
      { name: 'web', host: 'a.test', ports: [443] },
      { host: 'b.test', ports: [] },
    ]);
  });

  it('reports a missing file', async () => {
    await expect(readConfigFile(path.join(dir, 'missing.json'))).rejects.toThrow(/Cannot read config file/);
  });

  it('reports invalid JSON', async () => {
    const file = await writeConfig('broken.json', '{ "timeoutSeconds": ');
    await expect(readConfigFile(file)).rejects.toThrow(/is not valid JSON/);
  });

  it('reports settings that fail validation', async () => {
    const file = await writeConfig('invalid.json', JSON.stringify({ maxConcurrent: 0 }));
    await expect(readConfigFile(file)).rejects.toThrow(/Invalid config file .*maxConcurrent/);
  });

  it('validates the merged result', async () => {
    await expect(loadConfig({ env: {}, overrides: { maxConcurrent: 5000 } })).rejects.toThrow(
      /Invalid configuration: maxConcurrent/
    );
  });
});
