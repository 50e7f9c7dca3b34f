import { readFile } from 'fs/promises';
import type { ZodError } from 'zod';
import { ConfigurationError, errorMessage } from '../errors.js';
import {
  ConfigFileSchema,
  EnvConfigSchema,
  ProbeConfigSchema,
  type ConfigFile,
  type ProbeConfig,
  type ProbeConfigInput,
  type TargetConfig,
} from '../schemas/config.js';

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv | undefined;
  configFile?: string | undefined;
  /** Command-line values; these win over every other source */
  overrides?: Partial<ProbeConfigInput> | undefined;
}

export interface LoadedConfig {
  config: ProbeConfig;
  /** Targets listed in the config file, if any */
  targets: TargetConfig[];
}

export function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ');
}

function definedEntries<T extends object>(layer: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in layer) {
    if (layer[key] !== undefined) result[key] = layer[key];
  }
  return result;
}

/** Settings taken from NETPROBE_* environment variables */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<ProbeConfigInput> {
  const parsed = EnvConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment configuration: ${formatZodError(parsed.error)}`);
  }

  const vars = parsed.data;
  return definedEntries({
    timeoutSeconds: vars.NETPROBE_TIMEOUT,
    maxConcurrent: vars.NETPROBE_MAX_CONCURRENT,
    sslCheck: vars.NETPROBE_SSL_CHECK,
    monitorIntervalSeconds: vars.NETPROBE_MONITOR_INTERVAL,
    historyLimit: vars.NETPROBE_HISTORY_LIMIT,
    logLevel: vars.NETPROBE_LOG_LEVEL,
    logFile: vars.NETPROBE_LOG_FILE,
  });
}

export async function readConfigFile(path: string): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${path}: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Resolves settings from defaults, environment, config file and overrides,
 * later sources winning.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const fromEnv = configFromEnv(options.env ?? process.env);

  let fileTargets: TargetConfig[] = [];
  let fromFile: Partial<ProbeConfigInput> = {};
  if (options.configFile) {
    const { targets, ...settings } = await readConfigFile(options.configFile);
    fileTargets = targets ?? [];
    fromFile = definedEntries(settings);
  }

  const merged = { ...fromEnv, ...fromFile, ...definedEntries(options.overrides ?? {}) };
  const parsed = ProbeConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatZodError(parsed.error)}`);
  }

  return { config: parsed.data, targets: fileTargets };
}
