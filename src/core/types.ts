import { z } from 'zod';

// ===== Configuration =====

export const RiskLevelSchema = z.enum(['low', 'medium', 'high', 'critical']);
export type RiskLevel = z.infer<typeof RiskLevelSchema>;

const riskLevelTimeout = z.object({
  timeout: z.number().int().positive().default(1800),
}).default({});

export const UpliftConfigSchema = z.object({
  runtime: z.object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(7420),
    dataDir: z.string().optional(),
    adminKey: z.string().min(8).optional(),
    corsOrigins: z.array(z.string()).default(['*']),
    maxRequestBytes: z.number().int().positive().default(1024 * 1024),
  }).default({}),
  agents: z.object({
    directory: z.string().default('./agents'),
    autoDiscover: z.boolean().default(true),
    autoStart: z.boolean().default(false),
    restartOnFailure: z.boolean().default(true),
    maxRestartAttempts: z.number().int().min(0).default(3),
    healthCheckIntervalMs: z.number().int().min(0).default(60_000),
    stopTimeoutMs: z.number().int().positive().default(10_000),
  }).default({}),
  approvals: z.object({
    riskLevels: z.object({
      low: riskLevelTimeout,
      medium: riskLevelTimeout,
      high: riskLevelTimeout,
      critical: riskLevelTimeout,
    }).default({}),
    checkIntervalMs: z.number().int().min(0).default(60_000),
    pollIntervalMs: z.number().int().positive().default(5_000),
  }).default({}),
  memory: z.object({
    maxValueBytes: z.number().int().positive().default(256 * 1024),
    defaultQueryLimit: z.number().int().positive().default(20),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    pretty: z.boolean().default(false),
  }).default({}),
});

type ParsedConfig = z.infer<typeof UpliftConfigSchema>;

/** Configuration after loading: every path is absolute. */
export type UpliftConfig = Omit<ParsedConfig, 'runtime'> & {
  runtime: Omit<ParsedConfig['runtime'], 'dataDir'> & { dataDir: string };
};

/** Deep-partial shape accepted as programmatic overrides. */
export type ConfigOverrides = {
  [K in keyof ParsedConfig]?: Partial<ParsedConfig[K]>;
};
