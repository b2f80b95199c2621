import { z } from 'zod';
import { ConfigurationError } from './errors';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const ConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('warn')
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse({
    logLevel: env.BUILD_VALIDATOR_LOG_LEVEL || undefined
  });
  if (result.success) return result.data;

  const issues = result.error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  throw new ConfigurationError(`Invalid configuration: ${issues}`, {
    logLevel: env.BUILD_VALIDATOR_LOG_LEVEL
  });
}
