import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

// Settings the core consumes
export const ProbeConfigSchema = z.object({
  timeoutSeconds: z.number().positive().max(300).default(5),
  maxConcurrent: z.number().int().min(1).max(1000).default(50),
  sslCheck: z.boolean().default(false),
  monitorIntervalSeconds: z.number().positive().default(30),
  historyLimit: z.number().int().min(0).default(100),
  logLevel: LogLevelSchema.default('info'),
  logFile: z.string().min(1).optional(),
});

export const TargetConfigSchema = z.object({
  name: z.string().optional(),
  host: z.string().min(1),
  ports: z.array(z.number().int().min(1).max(65535)).default([]),
});

// JSON config file: any subset of the settings plus an optional target list
export const ConfigFileSchema = ProbeConfigSchema.partial().extend({
  targets: z.array(TargetConfigSchema).optional(),
});

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const EnvConfigSchema = z.object({
  NETPROBE_TIMEOUT: z.string().transform(Number).pipe(z.number().positive()).optional(),
  NETPROBE_MAX_CONCURRENT: z.string().transform(Number).pipe(z.number().int().min(1)).optional(),
  NETPROBE_SSL_CHECK: booleanString.optional(),
  NETPROBE_MONITOR_INTERVAL: z.string().transform(Number).pipe(z.number().positive()).optional(),
  NETPROBE_HISTORY_LIMIT: z.string().transform(Number).pipe(z.number().int().min(0)).optional(),
  NETPROBE_LOG_LEVEL: LogLevelSchema.optional(),
  NETPROBE_LOG_FILE: z.string().min(1).optional(),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ProbeConfig = z.infer<typeof ProbeConfigSchema>;
export type ProbeConfigInput = z.input<typeof ProbeConfigSchema>;
export type TargetConfig = z.infer<typeof TargetConfigSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type EnvConfig = z.infer<typeof EnvConfigSchema>;
