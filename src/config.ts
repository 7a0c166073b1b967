/**
 * Server configuration, read from RAMPART_* environment variables.
 */

import { z } from 'zod';
import { LogLevel } from './logger';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

const EnvSchema = z.object({
  RAMPART_HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  RAMPART_LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.Info),
  RAMPART_AUTH_ISSUER: optionalString,
  RAMPART_AUTH_AUDIENCE: optionalString,
  RAMPART_AUTH_PUBLIC_KEY_FILE: optionalString,
  RAMPART_AUTH_HMAC_SECRET: optionalString,
  RAMPART_EVENTS_BUFFER_SIZE: z.coerce.number().int().positive().default(1024),
  RAMPART_DEFAULT_PROVIDER_NAME: z.string().min(1).default('forge'),
});

export interface AuthConfig {
  issuer?: string;
  audience?: string;
  publicKeyFile?: string;
  hmacSecret?: string;
}

export interface ServerConfig {
  httpPort: number;
  logLevel: LogLevel;
  auth: AuthConfig;
  eventsBufferSize: number;
  defaultProviderName: string;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Parse configuration; throws ConfigError naming every offending variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const parsed = result.data;
  return {
    httpPort: parsed.RAMPART_HTTP_PORT,
    logLevel: parsed.RAMPART_LOG_LEVEL,
    auth: {
      issuer: parsed.RAMPART_AUTH_ISSUER,
      audience: parsed.RAMPART_AUTH_AUDIENCE,
      publicKeyFile: parsed.RAMPART_AUTH_PUBLIC_KEY_FILE,
      hmacSecret: parsed.RAMPART_AUTH_HMAC_SECRET,
    },
    eventsBufferSize: parsed.RAMPART_EVENTS_BUFFER_SIZE,
    defaultProviderName: parsed.RAMPART_DEFAULT_PROVIDER_NAME,
  };
}
