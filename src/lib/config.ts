import { z } from 'zod';

import {
  DEFAULT_BIND_ADDRESS,
  DEFAULT_PAIRING_PORT,
  DEFAULT_RELAY_PORT,
} from '../constants.js';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export interface AgentConfig {
  bindAddress: string;
  relayPort: number;
  pairingPort: number;
  /** Directory holding the trust records; the strongbox container when unset */
  credentialsDir?: string;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<AgentConfig>;

const portSchema = z.coerce.number().int().min(0).max(65535);

const logLevelSchema = z.enum(LOG_LEVELS);

const configSchema = z
  .object({
    bindAddress: z.string().min(1).default(DEFAULT_BIND_ADDRESS),
    relayPort: portSchema.default(DEFAULT_RELAY_PORT),
    pairingPort: portSchema.default(DEFAULT_PAIRING_PORT),
    credentialsDir: z.string().min(1).optional(),
    logLevel: logLevelSchema.default('info'),
  })
  .refine(
    ({ relayPort, pairingPort }) => relayPort === 0 || relayPort !== pairingPort,
    { message: 'Relay and pairing ports must differ', path: ['pairingPort'] },
  );

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Resolves the agent configuration from environment variables, with
 * command-line overrides taking precedence.
 * @throws ConfigurationError when a value is invalid
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): AgentConfig {
  const raw = {
    bindAddress: overrides.bindAddress ?? nonEmpty(env.MEDIA_RELAY_BIND_ADDRESS),
    relayPort: overrides.relayPort ?? nonEmpty(env.MEDIA_RELAY_RELAY_PORT),
    pairingPort: overrides.pairingPort ?? nonEmpty(env.MEDIA_RELAY_PAIRING_PORT),
    credentialsDir:
      overrides.credentialsDir ?? nonEmpty(env.MEDIA_RELAY_CREDENTIALS_DIR),
    logLevel: overrides.logLevel ?? nonEmpty(env.LOG_LEVEL),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}
