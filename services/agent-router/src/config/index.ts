import { z } from 'zod';
import { formatIssues } from './schema.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServiceConfig {
  port: number;
  urlPrefix: string;
  agentConfigPath: string;
  projectEndpoint?: string;
  region: string;
  upstreamTimeoutMs: number;
  adminApiKey?: string;
  shutdownTimeoutMs: number;
  logLevel: LogLevel;
  nodeEnv: string;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5001),
  URL_PREFIX: z.string().default(''),
  AGENT_CONFIG_PATH: z.string().min(1).default('config/agents.yaml'),
  AZURE_AI_PROJECT_ENDPOINT: optionalString,
  // REGION_NAME is set by App Service itself (e.g. "East US")
  REGION_NAME: optionalString,
  AZURE_REGION: optionalString,
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  ADMIN_API_KEY: optionalString,
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  NODE_ENV: z.string().default('development'),
});

/**
 * Read the service settings from the environment (after dotenv has populated it).
 * Throws on values that do not parse, so a bad deployment fails at startup.
 */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid service configuration:\n  - ${formatIssues(parsed.error).join('\n  - ')}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    urlPrefix: values.URL_PREFIX.replace(/\/+$/, ''),
    agentConfigPath: values.AGENT_CONFIG_PATH,
    projectEndpoint: values.AZURE_AI_PROJECT_ENDPOINT,
    region: values.REGION_NAME ?? values.AZURE_REGION ?? 'local',
    upstreamTimeoutMs: values.UPSTREAM_TIMEOUT_MS,
    adminApiKey: values.ADMIN_API_KEY,
    shutdownTimeoutMs: values.SHUTDOWN_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
    nodeEnv: values.NODE_ENV,
  };
}
